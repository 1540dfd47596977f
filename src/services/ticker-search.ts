import { errorMessage, log } from "../log.js";
import type { PriceProvider, StockQuote } from "../types.js";
import { currencyForExchange, normalizeExchange } from "./exchanges.js";

const TICKER_PATTERN = /^[A-Z0-9.-]{1,20}$/;

export function normalizeTicker(raw: string): string | null {
  const ticker = raw.trim().toUpperCase();
  return TICKER_PATTERN.test(ticker) ? ticker : null;
}

/**
 * Resolves a ticker for alert creation by asking each provider in order
 * (domestic, then metered, then free batch). The first hit wins and is
 * normalized to the exchange and currency codes the monitor uses.
 */
export async function searchTicker(raw: string, chain: PriceProvider[]): Promise<StockQuote | null> {
  const ticker = normalizeTicker(raw);
  if (!ticker) return null;

  for (const provider of chain) {
    let quote: StockQuote | null;
    try {
      quote = await provider.fetchOne(ticker);
    } catch (err) {
      log.warn(`  ${provider.name} lookup for ${ticker} failed: ${errorMessage(err)}`);
      continue;
    }
    if (!quote) continue;

    const exchange = normalizeExchange(quote.exchange);
    log.debug(`  ${ticker} resolved by ${provider.name} on ${exchange}`);
    return {
      ticker: quote.ticker.toUpperCase(),
      companyName: quote.companyName || ticker,
      price: quote.price,
      currency: currencyForExchange(exchange, quote.currency),
      exchange,
    };
  }
  return null;
}
