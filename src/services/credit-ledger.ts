import { log } from "../log.js";
import { systemClock, type Clock } from "./rate-limiter.js";

export interface BudgetStatus {
  date: string;
  dailyLimit: number;
  used: number;
  remaining: number;
  reserve: number;
  availableForBatch: number;
}

/**
 * Where the day's spend lives. The daemon and the CLI share one so that both
 * debit the same daily quota.
 */
export interface CreditUsageStore {
  /** Credits used on `date` (UTC, YYYY-MM-DD); 0 for a day with no charges. */
  getUsage(date: string): Promise<number>;
  /** Adds `credits` to `date` and returns that day's new total. */
  addUsage(date: string, credits: number): Promise<number>;
}

/** Single-process usage: keeps only the current day. */
export class MemoryCreditUsage implements CreditUsageStore {
  private date = "";
  private used = 0;

  async getUsage(date: string): Promise<number> {
    return date === this.date ? this.used : 0;
  }

  async addUsage(date: string, credits: number): Promise<number> {
    if (date !== this.date) {
      this.date = date;
      this.used = 0;
    }
    this.used += credits;
    return this.used;
  }
}

function utcDayKey(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Daily credit budget of a metered provider. `reserveFloor` credits are kept
 * back from batch work so ticker searches still succeed late in the day.
 * Usage is keyed by UTC date, so a new day starts at zero.
 */
export class CreditLedger {
  constructor(
    readonly dailyLimit: number,
    readonly reserveFloor: number,
    private readonly clock: Clock = systemClock,
    private readonly usage: CreditUsageStore = new MemoryCreditUsage(),
  ) {}

  async remaining(): Promise<number> {
    return this.dailyLimit - (await this.usage.getUsage(this.today()));
  }

  async availableForBatch(): Promise<number> {
    return Math.max(0, (await this.remaining()) - this.reserveFloor);
  }

  /** Debits `credits` exactly as requested; callers check `remaining()` first. */
  async charge(credits: number): Promise<void> {
    const used = await this.usage.addUsage(this.today(), credits);
    log.info(`Credits: -${credits} -> ${used}/${this.dailyLimit} used today`);
  }

  async status(): Promise<BudgetStatus> {
    const date = this.today();
    const used = await this.usage.getUsage(date);
    const remaining = this.dailyLimit - used;
    return {
      date,
      dailyLimit: this.dailyLimit,
      used,
      remaining,
      reserve: this.reserveFloor,
      availableForBatch: Math.max(0, remaining - this.reserveFloor),
    };
  }

  private today(): string {
    return utcDayKey(this.clock.now());
  }
}
