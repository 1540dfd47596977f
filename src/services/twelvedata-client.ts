import { z } from "zod";
import { config } from "../config.js";
import { errorMessage, log } from "../log.js";
import type { PriceProvider, StockQuote } from "../types.js";
import type { BudgetStatus, CreditLedger } from "./credit-ledger.js";
import { currencyForExchange, normalizeExchange } from "./exchanges.js";
import { fetchJson, JsonObjectSchema, PriceSchema, type FetchLike } from "./http.js";
import type { SlidingWindowRateLimiter } from "./rate-limiter.js";

export interface TwelveDataClientOptions {
  apiKey?: string;
  baseUrl?: string;
  chunkSize?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const ErrorBodySchema = z
  .object({
    code: z.number().optional(),
    status: z.string().optional(),
    message: z.string().optional(),
  })
  .refine((body) => body.code != null || body.status === "error");

/** One `/price` entry; the whole body for a single symbol. */
const PriceEntrySchema = z.object({ price: PriceSchema });

const QuoteSchema = z.object({
  symbol: z.string().optional(),
  name: z.string().optional(),
  exchange: z.string().optional(),
  currency: z.string().optional(),
  close: PriceSchema,
});

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Twelve Data. Every symbol in a request costs one credit whether or not a
 * price comes back, and both the daily credits and the requests per minute
 * are capped. Batch work may only spend what the ledger leaves above its
 * reserve floor.
 */
export class TwelveDataClient implements PriceProvider {
  readonly name = "twelvedata";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly chunkSize: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(
    private readonly ledger: CreditLedger,
    private readonly limiter: SlidingWindowRateLimiter,
    options: TwelveDataClientOptions = {},
  ) {
    this.apiKey = options.apiKey ?? config.twelveData.apiKey;
    this.baseUrl = options.baseUrl ?? config.twelveData.baseUrl;
    this.chunkSize = options.chunkSize ?? config.twelveData.chunkSize;
    this.timeoutMs = options.timeoutMs ?? config.twelveData.timeoutMs;
    this.fetchImpl = options.fetchImpl;
    if (this.chunkSize < 1) throw new RangeError("chunkSize must be at least 1");
  }

  budgetStatus(): Promise<BudgetStatus> {
    return this.ledger.status();
  }

  async fetchMany(requested: string[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    if (requested.length === 0) return result;
    if (!this.apiKey) {
      log.debug("TwelveData: no API key configured, batch skipped");
      return result;
    }

    const available = await this.ledger.availableForBatch();
    if (available <= 0) {
      log.info(
        `TwelveData batch: budget exhausted (${await this.ledger.remaining()} left, ${this.ledger.reserveFloor} reserved), skipping`,
      );
      return result;
    }

    let tickers = [...new Set(requested)];
    if (tickers.length > available) {
      log.info(`TwelveData batch: clipping ${tickers.length} -> ${available} tickers to fit budget`);
      tickers = tickers.slice(0, available);
    }

    const chunks = chunk(tickers, this.chunkSize);
    log.info(`TwelveData batch: ${tickers.length} tickers -> ${chunks.length} request(s) of up to ${this.chunkSize}`);

    const results = await Promise.all(
      chunks.map(async (group) => {
        await this.limiter.admit();
        const prices = await this.fetchChunk(group);
        await this.ledger.charge(group.length);
        return prices;
      }),
    );

    for (const prices of results) {
      for (const [ticker, price] of prices) result.set(ticker, price);
    }

    log.info(`TwelveData batch: got ${result.size}/${tickers.length} prices`);
    return result;
  }

  async fetchOne(rawTicker: string): Promise<StockQuote | null> {
    if (!this.apiKey) {
      log.warn("TwelveData: TWELVEDATA_API_KEY is not set");
      return null;
    }
    const ticker = rawTicker.trim().toUpperCase();
    if ((await this.ledger.remaining()) <= 0) {
      log.warn(`TwelveData: daily limit reached, quote for ${ticker} skipped`);
      return null;
    }

    await this.limiter.admit();
    let body: Record<string, unknown>;
    try {
      body = await fetchJson(this.name, this.url("quote", ticker), JsonObjectSchema, this.timeoutMs, this.fetchImpl);
    } catch (err) {
      log.warn(`TwelveData /quote ${ticker}: ${errorMessage(err)}`);
      return null;
    } finally {
      await this.ledger.charge(1);
    }

    const quote = QuoteSchema.safeParse(body);
    if (ErrorBodySchema.safeParse(body).success || !quote.success) {
      log.debug(`TwelveData /quote ${ticker} returned no quote`);
      return null;
    }

    const { symbol, name, close: price } = quote.data;
    if (price == null) return null;

    const exchange = normalizeExchange(quote.data.exchange ?? "");
    return {
      ticker: symbol || ticker,
      companyName: name || ticker,
      price,
      currency: currencyForExchange(exchange, quote.data.currency),
      exchange,
    };
  }

  private url(endpoint: "price" | "quote", symbols: string): string {
    const params = new URLSearchParams({ symbol: symbols, apikey: this.apiKey, format: "JSON" });
    return `${this.baseUrl}/${endpoint}?${params}`;
  }

  private async fetchChunk(tickers: string[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    let body: Record<string, unknown>;
    try {
      body = await fetchJson(this.name, this.url("price", tickers.join(",")), JsonObjectSchema, this.timeoutMs, this.fetchImpl);
    } catch (err) {
      log.warn(`TwelveData /price chunk [${tickers.join(", ")}]: ${errorMessage(err)}`);
      return result;
    }

    const error = ErrorBodySchema.safeParse(body);
    if (error.success) {
      log.warn(`TwelveData /price error: ${error.data.message ?? "unknown"}`);
      return result;
    }

    // One symbol: {"price": "189.30"}. Several: {"AAPL": {"price": "189.30"}, ...}
    const [only] = tickers;
    if (tickers.length === 1 && only != null) {
      const entry = PriceEntrySchema.safeParse(body);
      if (entry.success && entry.data.price != null) result.set(only, entry.data.price);
      return result;
    }

    for (const ticker of tickers) {
      const entry = PriceEntrySchema.safeParse(body[ticker]);
      if (entry.success && entry.data.price != null) result.set(ticker, entry.data.price);
    }
    return result;
  }
}
