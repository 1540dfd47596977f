import pg from "pg";
import { randomUUID } from "node:crypto";
import { config } from "./config.js";
import type { CreditUsageStore } from "./services/credit-ledger.js";
import type {
  AlertStore,
  Direction,
  MonitoredAlert,
  NewAlert,
  OwnerSettings,
  PriceAlert,
} from "./types.js";

export function createPool(databaseUrl: string = config.databaseUrl): pg.Pool {
  const isLocal = databaseUrl.includes("localhost");
  const dbUrl = !isLocal && !databaseUrl.includes("sslmode=")
    ? databaseUrl + (databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
    : databaseUrl;

  return new pg.Pool({
    connectionString: dbUrl,
    ssl: isLocal ? false : { rejectUnauthorized: false },
  });
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS alerts (
      id              TEXT PRIMARY KEY,
      owner_id        TEXT NOT NULL,
      ticker          TEXT NOT NULL,
      exchange        TEXT NOT NULL,
      company_name    TEXT NOT NULL,
      target_price    DOUBLE PRECISION NOT NULL CHECK (target_price > 0),
      currency        TEXT NOT NULL,
      direction       TEXT NOT NULL CHECK (direction IN ('above', 'below')),
      current_price   DOUBLE PRECISION,
      last_checked_at TIMESTAMPTZ,
      active          BOOLEAN NOT NULL DEFAULT true,
      created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS alerts_active_idx ON alerts (active) WHERE active;

    CREATE TABLE IF NOT EXISTS owner_settings (
      owner_id              TEXT PRIMARY KEY,
      interval_domestic_sec INTEGER NOT NULL,
      interval_foreign_sec  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS credit_usage (
      day  DATE PRIMARY KEY,
      used INTEGER NOT NULL DEFAULT 0
    );
  `);
}

// ── Row mapping ─────────────────────────────────────────────────────────

type AlertRow = {
  id: string;
  ownerId: string;
  ticker: string;
  exchange: string;
  companyName: string;
  targetPrice: number;
  currency: string;
  direction: Direction;
  currentPrice: number | null;
  lastCheckedAt: Date | null;
  active: boolean;
  createdAt: Date;
};

type MonitoredAlertRow = AlertRow & {
  intervalDomesticSec: number;
  intervalForeignSec: number;
};

type SettingsRow = {
  ownerId: string;
  intervalDomesticSec: number;
  intervalForeignSec: number;
};

function rowToAlert(row: AlertRow): PriceAlert {
  return {
    id: row.id,
    ownerId: row.ownerId,
    ticker: row.ticker,
    exchange: row.exchange,
    companyName: row.companyName,
    targetPrice: row.targetPrice,
    currency: row.currency,
    direction: row.direction,
    currentPrice: row.currentPrice ?? undefined,
    lastCheckedAt: row.lastCheckedAt ? row.lastCheckedAt.toISOString() : undefined,
    active: row.active,
    createdAt: row.createdAt.toISOString(),
  };
}

const ALERT_COLUMNS = `
  a.id, a.owner_id AS "ownerId", a.ticker, a.exchange,
  a.company_name AS "companyName", a.target_price AS "targetPrice",
  a.currency, a.direction, a.current_price AS "currentPrice",
  a.last_checked_at AS "lastCheckedAt", a.active, a.created_at AS "createdAt"
`;

export class PgAlertStore implements AlertStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly defaults: Omit<OwnerSettings, "ownerId"> = {
      intervalDomesticSec: config.defaultIntervalDomesticSec,
      intervalForeignSec: config.defaultIntervalForeignSec,
    },
  ) {}

  // ── Monitoring ──────────────────────────────────────────────────────────

  async listActiveAlerts(): Promise<MonitoredAlert[]> {
    const { rows } = await this.pool.query<MonitoredAlertRow>(
      `SELECT ${ALERT_COLUMNS},
              COALESCE(s.interval_domestic_sec, $1) AS "intervalDomesticSec",
              COALESCE(s.interval_foreign_sec, $2)  AS "intervalForeignSec"
       FROM alerts a
       LEFT JOIN owner_settings s ON s.owner_id = a.owner_id
       WHERE a.active = true`,
      [this.defaults.intervalDomesticSec, this.defaults.intervalForeignSec],
    );
    return rows.map((row) => ({
      ...rowToAlert(row),
      intervalDomesticSec: row.intervalDomesticSec,
      intervalForeignSec: row.intervalForeignSec,
    }));
  }

  async getAlert(id: string): Promise<PriceAlert | null> {
    const { rows } = await this.pool.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM alerts a WHERE a.id = $1`,
      [id],
    );
    const row = rows[0];
    return row ? rowToAlert(row) : null;
  }

  async updateAlertCheck(id: string, price: number, at: Date): Promise<void> {
    await this.pool.query(
      `UPDATE alerts
       SET current_price = $1,
           last_checked_at = GREATEST(COALESCE(last_checked_at, $2), $2)
       WHERE id = $3`,
      [price, at, id],
    );
  }

  async deactivateAlert(id: string): Promise<void> {
    await this.pool.query(`UPDATE alerts SET active = false WHERE id = $1`, [id]);
  }

  // ── Owner settings ──────────────────────────────────────────────────────

  async getOwnerSettings(ownerId: string): Promise<OwnerSettings> {
    const { rows } = await this.pool.query<SettingsRow>(
      `SELECT owner_id AS "ownerId",
              interval_domestic_sec AS "intervalDomesticSec",
              interval_foreign_sec AS "intervalForeignSec"
       FROM owner_settings WHERE owner_id = $1`,
      [ownerId],
    );
    return rows[0] ?? { ownerId, ...this.defaults };
  }

  async upsertOwnerSettings(
    ownerId: string,
    patch: Partial<Omit<OwnerSettings, "ownerId">>,
  ): Promise<OwnerSettings> {
    const current = await this.getOwnerSettings(ownerId);
    const next: OwnerSettings = {
      ownerId,
      intervalDomesticSec: patch.intervalDomesticSec ?? current.intervalDomesticSec,
      intervalForeignSec: patch.intervalForeignSec ?? current.intervalForeignSec,
    };
    await this.pool.query(
      `INSERT INTO owner_settings (owner_id, interval_domestic_sec, interval_foreign_sec)
       VALUES ($1, $2, $3)
       ON CONFLICT (owner_id) DO UPDATE SET
         interval_domestic_sec = excluded.interval_domestic_sec,
         interval_foreign_sec  = excluded.interval_foreign_sec`,
      [next.ownerId, next.intervalDomesticSec, next.intervalForeignSec],
    );
    return next;
  }

  // ── Alert management ────────────────────────────────────────────────────

  async addAlert(alert: NewAlert): Promise<PriceAlert> {
    const id = randomUUID();
    const { rows } = await this.pool.query<AlertRow>(
      `WITH a AS (
         INSERT INTO alerts
           (id, owner_id, ticker, exchange, company_name, target_price, currency, direction, current_price)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING *
       )
       SELECT ${ALERT_COLUMNS} FROM a`,
      [
        id, alert.ownerId, alert.ticker.toUpperCase(), alert.exchange, alert.companyName,
        alert.targetPrice, alert.currency, alert.direction, alert.currentPrice ?? null,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error(`Insert of alert ${id} returned no row`);
    return rowToAlert(row);
  }

  async listAlerts(ownerId: string): Promise<PriceAlert[]> {
    const { rows } = await this.pool.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM alerts a WHERE a.owner_id = $1 ORDER BY a.created_at DESC`,
      [ownerId],
    );
    return rows.map(rowToAlert);
  }

  async removeAlert(id: string, ownerId: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `DELETE FROM alerts WHERE id = $1 AND owner_id = $2`,
      [id, ownerId],
    );
    return (rowCount ?? 0) > 0;
  }

  async retargetAlert(
    id: string,
    ownerId: string,
    targetPrice: number,
    direction: Direction,
    currentPrice: number | undefined,
  ): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `UPDATE alerts
       SET target_price = $1, direction = $2, current_price = COALESCE($3, current_price),
           active = true, last_checked_at = NULL
       WHERE id = $4 AND owner_id = $5`,
      [targetPrice, direction, currentPrice ?? null, id, ownerId],
    );
    return (rowCount ?? 0) > 0;
  }
}

// ── Metered credits ─────────────────────────────────────────────────────

type UsageRow = { used: number };

/** One row per UTC day; the daemon and the CLI debit the same row. */
export class PgCreditUsage implements CreditUsageStore {
  constructor(private readonly pool: pg.Pool) {}

  async getUsage(date: string): Promise<number> {
    const { rows } = await this.pool.query<UsageRow>(
      `SELECT used FROM credit_usage WHERE day = $1::date`,
      [date],
    );
    return rows[0]?.used ?? 0;
  }

  async addUsage(date: string, credits: number): Promise<number> {
    const { rows } = await this.pool.query<UsageRow>(
      `INSERT INTO credit_usage (day, used) VALUES ($1::date, $2)
       ON CONFLICT (day) DO UPDATE SET used = credit_usage.used + excluded.used
       RETURNING used`,
      [date, credits],
    );
    const row = rows[0];
    if (!row) throw new Error(`Credit usage update for ${date} returned no row`);
    return row.used;
  }
}
