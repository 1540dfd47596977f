import { z } from "zod";
import { config } from "../config.js";
import { errorMessage, log } from "../log.js";
import type { PriceProvider, StockQuote } from "../types.js";
import { fetchJson, PriceSchema, type FetchLike } from "./http.js";

export interface MoexClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const IssTableSchema = z.object({
  columns: z.array(z.string()),
  data: z.array(z.array(z.unknown())),
});

const IssResponseSchema = z.object({
  securities: IssTableSchema,
  marketdata: IssTableSchema,
});

const SecuritiesRowSchema = z.object({
  SECNAME: z.string().nullish(),
  SHORTNAME: z.string().nullish(),
  PREVPRICE: PriceSchema,
});

const MarketDataRowSchema = z.object({
  LAST: PriceSchema,
  CLOSEPRICE: PriceSchema,
  MARKETPRICE2: PriceSchema,
});

type IssTable = z.infer<typeof IssTableSchema>;

/** ISS sends column-oriented tables; the first data row keyed by column name. */
function firstRow(table: IssTable): Record<string, unknown> | null {
  const row = table.data[0];
  if (!row) return null;
  return Object.fromEntries(table.columns.map((col, i) => [col, row[i]]));
}

/**
 * Moscow Exchange ISS, main board (TQBR). Free and unthrottled, one request
 * per ticker; quotes are delayed by the exchange.
 */
export class MoexClient implements PriceProvider {
  readonly name = "moex";
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: MoexClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.moex.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.moex.timeoutMs;
    this.fetchImpl = options.fetchImpl;
  }

  async fetchOne(rawTicker: string): Promise<StockQuote | null> {
    const ticker = rawTicker.trim().toUpperCase();
    const params = new URLSearchParams({
      "iss.meta": "off",
      "iss.only": "securities,marketdata",
      "securities.columns": "SECID,SECNAME,SHORTNAME,PREVPRICE",
      "marketdata.columns": "SECID,LAST,CLOSEPRICE,MARKETPRICE2",
    });
    const url = `${this.baseUrl}/engines/stock/markets/shares/boards/TQBR/securities/${encodeURIComponent(ticker)}.json?${params}`;

    let body: z.infer<typeof IssResponseSchema>;
    try {
      body = await fetchJson(this.name, url, IssResponseSchema, this.timeoutMs, this.fetchImpl);
    } catch (err) {
      log.warn(`  MOEX request for ${ticker} failed: ${errorMessage(err)}`);
      return null;
    }

    const sec = SecuritiesRowSchema.safeParse(firstRow(body.securities));
    const md = MarketDataRowSchema.safeParse(firstRow(body.marketdata));
    if (!sec.success || !md.success) return null;

    // Last trade, then today's close, then the exchange's market price, then yesterday's.
    const price = md.data.LAST ?? md.data.CLOSEPRICE ?? md.data.MARKETPRICE2 ?? sec.data.PREVPRICE;
    if (price == null) return null;

    return {
      ticker,
      companyName: sec.data.SECNAME || sec.data.SHORTNAME || ticker,
      price,
      currency: "RUB",
      exchange: "MOEX",
    };
  }

  async fetchMany(tickers: string[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    for (const ticker of tickers) {
      const quote = await this.fetchOne(ticker);
      if (quote) result.set(ticker, quote.price);
    }
    return result;
  }
}
