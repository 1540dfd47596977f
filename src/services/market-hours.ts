import { config } from "../config.js";

/**
 * Trading sessions per exchange code. Only weekdays and fixed session hours
 * are modelled; exchange holidays are not.
 */
interface Session {
  timeZone: string;
  open: [number, number];
  close: [number, number];
  lunch?: [[number, number], [number, number]];
}

const NEW_YORK: Session = { timeZone: "America/New_York", open: [9, 30], close: [16, 0] };
const HONG_KONG: Session = {
  timeZone: "Asia/Hong_Kong",
  open: [9, 30],
  close: [16, 0],
  lunch: [[12, 0], [13, 0]],
};

const SESSIONS: Record<string, Session> = {
  MOEX: { timeZone: "Europe/Moscow", open: [10, 0], close: [18, 40] },
  NYSE: NEW_YORK,
  NASDAQ: NEW_YORK,
  "NYSE ARCA": NEW_YORK,
  "NYSE MKT": NEW_YORK,
  CBOE: NEW_YORK,
  HKEX: HONG_KONG,
  HKSE: HONG_KONG,
};

export const DOMESTIC_EXCHANGE = "MOEX";

/** Exchanges whose sessions gate the metered batch cycle. */
export const FOREIGN_GATE_EXCHANGES = ["NYSE", "HKEX"] as const;

export function isKnownExchange(exchange: string): boolean {
  return sessionFor(exchange) != null;
}

function sessionFor(exchange: string): Session | undefined {
  return SESSIONS[exchange.trim().toUpperCase()];
}

interface LocalTime {
  year: number;
  month: number;
  day: number;
  weekday: number; // 0 = Sunday
  minutes: number; // minutes since local midnight, fractional
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      weekday: "short",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function localTime(date: Date, timeZone: string): LocalTime {
  const parts = formatterFor(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "0";

  const hour = Number(part("hour")) % 24;
  const minute = Number(part("minute"));
  const second = Number(part("second"));
  return {
    year: Number(part("year")),
    month: Number(part("month")),
    day: Number(part("day")),
    weekday: WEEKDAYS[part("weekday")] ?? 0,
    minutes: hour * 60 + minute + second / 60,
  };
}

function isWeekend(weekday: number): boolean {
  return weekday === 0 || weekday === 6;
}

function toMinutes([h, m]: [number, number]): number {
  return h * 60 + m;
}

/**
 * True when the exchange is in its trading session at `now`, widened by the
 * configured buffer on both ends. Unknown exchanges are reported open.
 */
export function isMarketOpen(
  exchange: string,
  now: Date = new Date(),
  bufferMinutes: number = config.marketBufferMinutes,
): boolean {
  const session = sessionFor(exchange);
  if (!session) return true;

  const local = localTime(now, session.timeZone);
  if (isWeekend(local.weekday)) return false;

  if (local.minutes < toMinutes(session.open) - bufferMinutes) return false;
  if (local.minutes > toMinutes(session.close) + bufferMinutes) return false;

  if (session.lunch) {
    const [start, end] = session.lunch;
    if (local.minutes >= toMinutes(start) && local.minutes < toMinutes(end)) return false;
  }

  return true;
}

export function anyForeignMarketOpen(now: Date = new Date()): boolean {
  return FOREIGN_GATE_EXCHANGES.some((exchange) => isMarketOpen(exchange, now));
}

/** Offset of `timeZone` from UTC at `date`, in milliseconds. */
function zoneOffsetMs(date: Date, timeZone: string): number {
  const local = localTime(date, timeZone);
  const wallAsUtc = Date.UTC(local.year, local.month - 1, local.day) + Math.round(local.minutes * 60_000);
  return wallAsUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/**
 * Seconds until the next session starts, skipping weekends. While a market
 * trades this is the next session, not the current one; on exchanges with a
 * lunch break the afternoon reopen counts as a session start. Holidays are
 * not known, so the answer can be a trading day too early. Returns 0 for
 * unknown exchanges.
 */
export function secondsUntilOpen(exchange: string, now: Date = new Date()): number {
  const session = sessionFor(exchange);
  if (!session) return 0;

  const today = localTime(now, session.timeZone);
  const starts = [session.open, ...(session.lunch ? [session.lunch[1]] : [])].map((t) => toMinutes(t) * 60_000);

  for (let ahead = 0; ahead <= 7; ahead++) {
    const day = new Date(Date.UTC(today.year, today.month - 1, today.day + ahead));
    if (isWeekend(day.getUTCDay())) continue;

    for (const startMs of starts) {
      const wallAsUtc = day.getTime() + startMs;
      let instant = wallAsUtc - zoneOffsetMs(now, session.timeZone);
      // Re-resolve the offset at the candidate itself in case DST shifts in between.
      instant = wallAsUtc - zoneOffsetMs(new Date(instant), session.timeZone);

      if (instant > now.getTime()) {
        return Math.round((instant - now.getTime()) / 1000);
      }
    }
  }
  return 0;
}
