import { log } from "../log.js";
import type {
  AlertStore,
  CycleSummary,
  MonitoredAlert,
  NotificationDispatcher,
  PriceProvider,
} from "../types.js";
import { applyPrices } from "./alert-evaluator.js";
import { selectDueAlerts, selectMeteredAlerts, uniqueTickers } from "./due-selector.js";
import { anyForeignMarketOpen } from "./market-hours.js";

export interface MonitorContext {
  store: AlertStore;
  dispatcher: NotificationDispatcher;
  /** Free, one ticker per request. */
  domestic: PriceProvider;
  /** Free, many tickers per request. */
  freeBatch: PriceProvider;
  /** Credit-metered and rate-limited. */
  metered: PriceProvider;
}

async function refreshTier(
  ctx: MonitorContext,
  provider: PriceProvider,
  alerts: MonitoredAlert[],
  now: Date,
): Promise<{ updated: number; triggered: number }> {
  if (alerts.length === 0) return { updated: 0, triggered: 0 };

  const tickers = uniqueTickers(alerts);
  const prices = await provider.fetchMany(tickers);
  log.debug(`  ${provider.name}: ${prices.size}/${tickers.length} price(s) for ${alerts.length} alert(s)`);

  const events = await applyPrices(ctx, alerts, prices, now);
  return {
    updated: alerts.filter((a) => prices.has(a.ticker)).length,
    triggered: events.length,
  };
}

/**
 * Free tiers: every alert whose owner's refresh interval has elapsed. Foreign
 * tickers go out in one batch, domestic tickers one by one.
 */
export async function runFastCycle(ctx: MonitorContext, now: Date = new Date()): Promise<CycleSummary> {
  const alerts = await ctx.store.listActiveAlerts();
  const due = selectDueAlerts(alerts, now);
  const checked = due.domestic.length + due.foreign.length;
  if (checked === 0) {
    log.debug(`Fast cycle: nothing due (${alerts.length} active alert(s))`);
    return { checked: 0, updated: 0, triggered: 0 };
  }

  const foreign = await refreshTier(ctx, ctx.freeBatch, due.foreign, now);
  const domestic = await refreshTier(ctx, ctx.domestic, due.domestic, now);

  const summary: CycleSummary = {
    checked,
    updated: foreign.updated + domestic.updated,
    triggered: foreign.triggered + domestic.triggered,
  };
  log.info(
    `Fast cycle: ${summary.updated}/${summary.checked} alert(s) refreshed, ${summary.triggered} triggered`,
  );
  return summary;
}

/**
 * Metered tier: only alerts whose own exchange is in session. When every
 * foreign market is closed the cycle returns before touching the store or
 * the network, so no credits are spent.
 */
export async function runSlowCycle(ctx: MonitorContext, now: Date = new Date()): Promise<CycleSummary> {
  if (!anyForeignMarketOpen(now)) {
    log.info("Slow cycle: all foreign markets closed, skipping");
    return { checked: 0, updated: 0, triggered: 0 };
  }

  const alerts = selectMeteredAlerts(await ctx.store.listActiveAlerts(), now);
  if (alerts.length === 0) {
    log.info("Slow cycle: no alerts on an open foreign exchange");
    return { checked: 0, updated: 0, triggered: 0 };
  }

  const result = await refreshTier(ctx, ctx.metered, alerts, now);
  if (result.updated === 0) {
    log.info("Slow cycle: no prices returned (budget or provider unavailable)");
  }

  const summary: CycleSummary = { checked: alerts.length, ...result };
  log.info(`Slow cycle: ${summary.updated}/${summary.checked} alert(s) refreshed, ${summary.triggered} triggered`);
  return summary;
}
