import cron from "node-cron";
import { config, isEmailConfigured, isSmsConfigured, isTwelveDataConfigured } from "./config.js";
import { createPool, initDb, PgAlertStore, PgCreditUsage } from "./db.js";
import { errorMessage, log } from "./log.js";
import { CreditLedger, type CreditUsageStore } from "./services/credit-ledger.js";
import { MoexClient } from "./services/moex-client.js";
import { createDefaultDispatcher } from "./services/notifier.js";
import { runFastCycle, runSlowCycle, type MonitorContext } from "./services/price-monitor.js";
import { SlidingWindowRateLimiter, systemClock } from "./services/rate-limiter.js";
import { TwelveDataClient } from "./services/twelvedata-client.js";
import { YahooClient } from "./services/yahoo-client.js";

/**
 * Runs one cycle and reports any failure. Never rejects: a failing store or
 * provider costs one tick, not the daemon. Overlapping runs of the same cycle
 * are allowed; each works from its own snapshot of the alerts.
 */
export async function runGuarded(name: string, cycle: () => Promise<unknown>): Promise<void> {
  try {
    await cycle();
  } catch (err) {
    log.error(`${name} cycle failed: ${errorMessage(err)}`);
  }
}

export function buildMonitorContext(
  store: MonitorContext["store"],
  usage?: CreditUsageStore,
): MonitorContext & { metered: TwelveDataClient } {
  const ledger = new CreditLedger(config.twelveData.dailyLimit, config.twelveData.reserveCredits, systemClock, usage);
  const limiter = new SlidingWindowRateLimiter(config.twelveData.maxRequestsPerMinute, systemClock);
  return {
    store,
    dispatcher: createDefaultDispatcher(),
    domestic: new MoexClient(),
    freeBatch: new YahooClient(),
    metered: new TwelveDataClient(ledger, limiter),
  };
}

export async function startScheduler(): Promise<void> {
  for (const [name, expr] of [["FAST_CYCLE_CRON", config.fastCycleCron], ["SLOW_CYCLE_CRON", config.slowCycleCron]]) {
    if (!cron.validate(expr)) throw new Error(`${name} is not a valid cron expression: ${expr}`);
  }

  const pool = createPool();
  await initDb(pool);
  const ctx = buildMonitorContext(new PgAlertStore(pool), new PgCreditUsage(pool));
  const budget = await ctx.metered.budgetStatus();

  console.log("Price Alert Monitor");
  console.log("===================");
  console.log(`Fast cycle: ${config.fastCycleCron}`);
  console.log(`Slow cycle: ${config.slowCycleCron}`);
  console.log(`TwelveData: ${isTwelveDataConfigured() ? `${budget.remaining}/${budget.dailyLimit} credits left today, ${budget.reserve} reserved` : "not configured"}`);
  console.log(`Email:      ${isEmailConfigured() ? "configured" : "not configured"}`);
  console.log(`SMS:        ${isSmsConfigured() ? "configured" : "not configured"}`);
  console.log();

  // Run the free tiers immediately on start; the metered tier waits for its schedule.
  void runGuarded("Fast", () => runFastCycle(ctx));

  cron.schedule(config.fastCycleCron, () => {
    void runGuarded("Fast", () => runFastCycle(ctx));
  });
  cron.schedule(config.slowCycleCron, () => {
    void runGuarded("Slow", () => runSlowCycle(ctx));
  });

  log.info("Scheduler running.");
}

// Allow standalone execution: npx tsx src/scheduler.ts
const isDirectRun = process.argv[1]?.includes("scheduler");
if (isDirectRun) {
  startScheduler().catch((err: unknown) => {
    log.error(`Scheduler failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
}
