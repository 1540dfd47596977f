import "dotenv/config";

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const config = {
  databaseUrl: process.env.DATABASE_URL || "postgresql://localhost:5432/price_alerts",
  smtp: {
    host: process.env.SMTP_HOST,
    port: numberEnv("SMTP_PORT", 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    fromNumber: process.env.TWILIO_FROM_NUMBER,
  },
  notifyEmail: process.env.NOTIFY_EMAIL,
  notifySms: process.env.NOTIFY_SMS,
  fastCycleCron: process.env.FAST_CYCLE_CRON || "*/30 * * * * *",
  slowCycleCron: process.env.SLOW_CYCLE_CRON || "0 0 */3 * * *",
  defaultIntervalDomesticSec: numberEnv("DEFAULT_INTERVAL_DOMESTIC_SEC", 60),
  defaultIntervalForeignSec: numberEnv("DEFAULT_INTERVAL_FOREIGN_SEC", 180),
  marketBufferMinutes: numberEnv("MARKET_BUFFER_MINUTES", 10),
  twelveData: {
    apiKey: process.env.TWELVEDATA_API_KEY || "",
    baseUrl: process.env.TWELVEDATA_BASE_URL || "https://api.twelvedata.com",
    dailyLimit: numberEnv("TWELVEDATA_DAILY_LIMIT", 800),
    reserveCredits: numberEnv("TWELVEDATA_RESERVE_CREDITS", 100),
    chunkSize: numberEnv("TWELVEDATA_CHUNK_SIZE", 8),
    maxRequestsPerMinute: numberEnv("TWELVEDATA_MAX_REQUESTS_PER_MIN", 8),
    timeoutMs: numberEnv("TWELVEDATA_TIMEOUT_MS", 15_000),
  },
  moex: {
    baseUrl: process.env.MOEX_BASE_URL || "https://iss.moex.com/iss",
    timeoutMs: numberEnv("MOEX_TIMEOUT_MS", 10_000),
  },
  logLevel: process.env.LOG_LEVEL === "debug" ? "debug" : "info",
};

export function isEmailConfigured(): boolean {
  return !!(config.smtp.host && config.smtp.user && config.smtp.pass && config.notifyEmail);
}

export function isSmsConfigured(): boolean {
  return !!(config.twilio.accountSid && config.twilio.authToken && config.twilio.fromNumber && config.notifySms);
}

export function isTwelveDataConfigured(): boolean {
  return config.twelveData.apiKey !== "";
}
