import type { MonitoredAlert } from "../types.js";
import { DOMESTIC_EXCHANGE, isMarketOpen } from "./market-hours.js";

export interface DueAlerts {
  domestic: MonitoredAlert[];
  foreign: MonitoredAlert[];
}

export function isDomestic(alert: Pick<MonitoredAlert, "exchange">): boolean {
  return alert.exchange.trim().toUpperCase() === DOMESTIC_EXCHANGE;
}

export function isDue(alert: MonitoredAlert, now: Date): boolean {
  const intervalSec = isDomestic(alert) ? alert.intervalDomesticSec : alert.intervalForeignSec;
  const last = alert.lastCheckedAt ? new Date(alert.lastCheckedAt).getTime() : 0;
  return now.getTime() - last >= intervalSec * 1000;
}

/** Splits active alerts whose refresh interval has elapsed into the two free tiers. */
export function selectDueAlerts(alerts: MonitoredAlert[], now: Date): DueAlerts {
  const due: DueAlerts = { domestic: [], foreign: [] };
  for (const alert of alerts) {
    if (!alert.active || !isDue(alert, now)) continue;
    if (isDomestic(alert)) due.domestic.push(alert);
    else due.foreign.push(alert);
  }
  return due;
}

/**
 * Foreign alerts for the metered tier. Each alert's own exchange must be in
 * session, since one batch spans exchanges with different hours.
 */
export function selectMeteredAlerts(alerts: MonitoredAlert[], now: Date): MonitoredAlert[] {
  return alerts.filter((a) => a.active && !isDomestic(a) && isMarketOpen(a.exchange, now));
}

export function uniqueTickers(alerts: { ticker: string }[]): string[] {
  return [...new Set(alerts.map((a) => a.ticker))];
}
