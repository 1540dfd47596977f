import type { AlertStore, Direction, PriceAlert, PriceProvider, StockQuote } from "../types.js";
import { inferDirection } from "./alert-evaluator.js";
import { isDomestic } from "./due-selector.js";

export type DirectionChoice = Direction | "both";

export interface AlertTargets {
  target: number;
  /** Inferred from the current price when omitted. */
  direction?: DirectionChoice;
  /** Lower leg of a "both" bracket; `target` is then the upper leg. */
  lowerTarget?: number;
}

/**
 * Creates the alert(s) for a resolved quote. "both" opens a bracket: one
 * alert above `target` and one below `lowerTarget`, each firing on its own.
 */
export async function createAlerts(
  store: AlertStore,
  ownerId: string,
  quote: StockQuote,
  { target, direction, lowerTarget }: AlertTargets,
): Promise<PriceAlert[]> {
  const base = {
    ownerId,
    ticker: quote.ticker,
    exchange: quote.exchange,
    companyName: quote.companyName,
    currency: quote.currency,
    currentPrice: quote.price,
  };

  if (direction === "both") {
    if (lowerTarget == null) throw new RangeError("a both-ways alert needs a lower target");
    if (lowerTarget >= target) throw new RangeError("the lower target must be below the upper target");
    const above = await store.addAlert({ ...base, targetPrice: target, direction: "above" });
    const below = await store.addAlert({ ...base, targetPrice: lowerTarget, direction: "below" });
    return [above, below];
  }

  const alert = await store.addAlert({
    ...base,
    targetPrice: target,
    direction: direction ?? inferDirection(target, quote.price),
  });
  return [alert];
}

export interface FreeProviders {
  domestic: PriceProvider;
  freeBatch: PriceProvider;
}

export interface RetargetResult {
  direction: Direction;
  price?: number;
}

/**
 * Moves an alert to a new target and re-arms it. The fresh price comes from
 * the free provider of the alert's own exchange, so no metered credit is spent
 * and no other listing of the ticker is picked up.
 */
export async function moveTarget(
  store: AlertStore,
  providers: FreeProviders,
  alert: PriceAlert,
  target: number,
): Promise<RetargetResult> {
  const provider = isDomestic(alert) ? providers.domestic : providers.freeBatch;
  const quote = await provider.fetchOne(alert.ticker);
  const reference = quote?.price ?? alert.currentPrice;
  const direction = reference != null ? inferDirection(target, reference) : alert.direction;

  await store.retargetAlert(alert.id, alert.ownerId, target, direction, quote?.price);
  return { direction, price: quote?.price };
}

export interface Proximity {
  alert: PriceAlert;
  /** How far the price has come toward the target, capped at 100. */
  progressPct: number | null;
  /** |target - current| as a percentage of current. */
  distancePct: number | null;
}

export function proximity(alert: PriceAlert): Proximity {
  const current = alert.currentPrice;
  const target = alert.targetPrice;
  if (current == null || current <= 0 || target <= 0) {
    return { alert, progressPct: null, distancePct: null };
  }
  const progress = alert.direction === "above" ? (current / target) * 100 : (target / current) * 100;
  return {
    alert,
    progressPct: Math.min(100, progress),
    distancePct: Math.abs(((target - current) / current) * 100),
  };
}

/** Closest to firing first; alerts never priced go last. Uses stored prices only. */
export function rankByProximity(alerts: PriceAlert[]): Proximity[] {
  return alerts
    .map(proximity)
    .sort((a, b) => (a.distancePct ?? Infinity) - (b.distancePct ?? Infinity));
}

export function progressBar(pct: number, width = 12): string {
  const filled = Math.max(0, Math.min(width, Math.round((width * pct) / 100)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}
