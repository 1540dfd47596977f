import YahooFinance from "yahoo-finance2";
import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage, log } from "../log.js";
import type { PriceProvider, StockQuote } from "../types.js";
import { currencyForExchange, normalizeExchange } from "./exchanges.js";
import { parsePrice } from "./http.js";

const yf = new YahooFinance({
  queue: { concurrency: 1, timeout: 60 },
  suppressNotices: ["yahooSurvey"],
});

const DAILY_LOOKBACK_DAYS = 5;

/** A listing as Yahoo reports it; `price` is null when there is no live trade. */
export type YahooListing = Omit<StockQuote, "price"> & { price: number | null };

export interface YahooSource {
  /** Live quotes for many symbols in one request. Unknown symbols are left out. */
  quotes(tickers: string[]): Promise<YahooListing[]>;
  /** Last non-empty daily close over the recent lookback window. */
  dailyClose(ticker: string): Promise<number | null>;
}

async function withRetry<T>(run: () => Promise<T>, retries = 2): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await run();
    } catch (err) {
      if (errorMessage(err).includes("429") && attempt < retries) {
        const delay = (attempt + 1) * 2000;
        log.warn(`  Yahoo Finance 429, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${retries})`);
        await sleep(delay);
        continue;
      }
      throw err;
    }
  }
}

export const yahooSource: YahooSource = {
  async quotes(tickers) {
    const quotes = await withRetry(() => yf.quote(tickers));
    const quoteArray = Array.isArray(quotes) ? quotes : [quotes];
    const results: YahooListing[] = [];
    for (const q of quoteArray) {
      if (!q) continue;
      const exchange = normalizeExchange(q.exchange ?? "");
      results.push({
        ticker: q.symbol,
        companyName: q.longName || q.shortName || q.symbol,
        price: parsePrice(q.regularMarketPrice),
        currency: currencyForExchange(exchange, q.currency),
        exchange,
      });
    }
    return results;
  },

  async dailyClose(ticker) {
    const period1 = new Date(Date.now() - DAILY_LOOKBACK_DAYS * 24 * 60 * 60 * 1000);
    const chart = await withRetry(() => yf.chart(ticker, { period1, interval: "1d" }));
    for (let i = chart.quotes.length - 1; i >= 0; i--) {
      const price = parsePrice(chart.quotes[i]?.close);
      if (price != null) return price;
    }
    return null;
  },
};

/**
 * Yahoo Finance: free, no quota, many symbols per request. When the live
 * quote yields nothing for a ticker (closed market, no bar today) the last
 * daily close is used instead so a known price is still recorded.
 */
export class YahooClient implements PriceProvider {
  readonly name = "yahoo";

  constructor(private readonly source: YahooSource = yahooSource) {}

  async fetchMany(tickers: string[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    if (tickers.length === 0) return result;

    try {
      for (const q of await this.source.quotes(tickers)) {
        if (q.price != null && tickers.includes(q.ticker)) result.set(q.ticker, q.price);
      }
    } catch (err) {
      log.warn(`  Yahoo batch quote failed: ${errorMessage(err)}`);
    }

    const missing = tickers.filter((t) => !result.has(t));
    for (const ticker of missing) {
      try {
        const close = await this.source.dailyClose(ticker);
        if (close != null) result.set(ticker, close);
      } catch (err) {
        log.debug(`  Yahoo daily close for ${ticker} unavailable: ${errorMessage(err)}`);
      }
    }

    log.debug(`  Yahoo batch: ${result.size}/${tickers.length} prices`);
    return result;
  }

  async fetchOne(rawTicker: string): Promise<StockQuote | null> {
    const ticker = rawTicker.trim().toUpperCase();
    try {
      const [listing] = await this.source.quotes([ticker]);
      if (!listing) return null;
      const price = listing.price ?? (await this.source.dailyClose(ticker));
      if (price == null) return null;
      return { ...listing, price };
    } catch (err) {
      log.warn(`  Yahoo quote for ${ticker} failed: ${errorMessage(err)}`);
    }
    return null;
  }
}
