import type { TriggerEvent } from "../types.js";
import { currencySymbol } from "./exchanges.js";

export function formatTriggerMessage({ alert, observedPrice }: TriggerEvent): string {
  const sym = currencySymbol(alert.currency);
  return `${alert.ticker} (${alert.companyName}) at ${observedPrice.toFixed(2)} ${sym} is ${alert.direction} target ${alert.targetPrice.toFixed(2)} ${sym}`;
}
