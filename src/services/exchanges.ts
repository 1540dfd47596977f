// Provider-specific exchange names mapped onto the codes market-hours knows.
const EXCHANGE_ALIASES: Record<string, string> = {
  NMS: "NASDAQ",
  NGM: "NASDAQ",
  NCM: "NASDAQ",
  NASDAQGS: "NASDAQ",
  NASDAQGM: "NASDAQ",
  NASDAQCM: "NASDAQ",
  NYQ: "NYSE",
  PCX: "NYSE ARCA",
  NYSEARCA: "NYSE ARCA",
  ASE: "NYSE MKT",
  AMEX: "NYSE MKT",
  NYSEAMERICAN: "NYSE MKT",
  BTS: "CBOE",
  HKG: "HKEX",
  MCX: "MOEX",
};

const EXCHANGE_CURRENCY: Record<string, string> = {
  MOEX: "RUB",
  NASDAQ: "USD",
  NYSE: "USD",
  "NYSE ARCA": "USD",
  "NYSE MKT": "USD",
  CBOE: "USD",
  HKEX: "HKD",
  HKSE: "HKD",
};

export const CURRENCY_SYMBOLS: Record<string, string> = { RUB: "₽", USD: "$", HKD: "HK$" };

export function normalizeExchange(raw: string): string {
  const code = raw.trim().toUpperCase();
  return EXCHANGE_ALIASES[code] ?? EXCHANGE_ALIASES[code.replace(/\s+/g, "")] ?? code;
}

export function currencyForExchange(exchange: string, reported?: string): string {
  const currency = reported?.trim().toUpperCase();
  if (currency) return currency;
  return EXCHANGE_CURRENCY[normalizeExchange(exchange)] ?? "USD";
}

export function currencySymbol(currency: string): string {
  return CURRENCY_SYMBOLS[currency] ?? currency;
}
