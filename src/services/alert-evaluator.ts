import { errorMessage, log } from "../log.js";
import type { AlertStore, Direction, NotificationDispatcher, PriceAlert, TriggerEvent } from "../types.js";
import { isMarketOpen } from "./market-hours.js";

export function isTriggered(alert: Pick<PriceAlert, "direction" | "targetPrice">, price: number): boolean {
  return alert.direction === "above" ? price >= alert.targetPrice : price <= alert.targetPrice;
}

/** Direction for a new target given where the price is now. */
export function inferDirection(targetPrice: number, currentPrice: number): Direction {
  return targetPrice >= currentPrice ? "above" : "below";
}

export interface EvaluatorDeps {
  store: AlertStore;
  dispatcher: NotificationDispatcher;
}

/**
 * Records each fetched price, then fires the alerts whose target was crossed.
 * Prices are stored even when the market is closed, but only an open market
 * can trigger. A triggered alert is deactivated before the notification goes
 * out, and stays inactive if delivery fails.
 *
 * Store failures propagate and abort the remaining writes of the cycle.
 */
export async function applyPrices(
  deps: EvaluatorDeps,
  alerts: PriceAlert[],
  prices: Map<string, number>,
  now: Date,
): Promise<TriggerEvent[]> {
  const triggered: TriggerEvent[] = [];

  for (const alert of alerts) {
    const price = prices.get(alert.ticker);
    if (price == null) continue;

    await deps.store.updateAlertCheck(alert.id, price, now);

    if (!alert.active || !isMarketOpen(alert.exchange, now)) continue;
    if (!isTriggered(alert, price)) continue;

    await deps.store.deactivateAlert(alert.id);
    const event: TriggerEvent = {
      alert: { ...alert, active: false, currentPrice: price, lastCheckedAt: now.toISOString() },
      observedPrice: price,
    };
    triggered.push(event);

    let delivered = false;
    try {
      delivered = await deps.dispatcher.deliver(event);
    } catch (err) {
      log.error(`  Notification for ${alert.ticker} (${alert.id}) threw: ${errorMessage(err)}`);
    }
    if (!delivered) {
      log.error(`  Notification for ${alert.ticker} (${alert.id}) was not delivered; alert stays inactive`);
    }
  }

  return triggered;
}
