export type Direction = "above" | "below";

export interface PriceAlert {
  id: string;
  ownerId: string;
  ticker: string;
  exchange: string;
  companyName: string;
  targetPrice: number;
  currency: string;
  direction: Direction;
  currentPrice?: number;
  lastCheckedAt?: string;
  active: boolean;
  createdAt: string;
}

/** An active alert joined with its owner's resolved refresh intervals. */
export interface MonitoredAlert extends PriceAlert {
  intervalDomesticSec: number;
  intervalForeignSec: number;
}

export interface OwnerSettings {
  ownerId: string;
  intervalDomesticSec: number;
  intervalForeignSec: number;
}

export interface NewAlert {
  ownerId: string;
  ticker: string;
  exchange: string;
  companyName: string;
  targetPrice: number;
  currency: string;
  direction: Direction;
  currentPrice?: number;
}

export interface StockQuote {
  ticker: string;
  companyName: string;
  price: number;
  currency: string;
  exchange: string;
}

export interface TriggerEvent {
  alert: PriceAlert;
  observedPrice: number;
}

/**
 * A quote source. `fetchOne` returns full metadata for a single ticker,
 * `fetchMany` only prices; tickers without a usable price are left out.
 * Provider failures become missing data. Only a failure to record spent
 * credits rejects.
 */
export interface PriceProvider {
  readonly name: string;
  fetchOne(ticker: string): Promise<StockQuote | null>;
  fetchMany(tickers: string[]): Promise<Map<string, number>>;
}

export interface AlertStore {
  listActiveAlerts(): Promise<MonitoredAlert[]>;
  getAlert(id: string): Promise<PriceAlert | null>;
  /** Records the observed price; `lastCheckedAt` only ever moves forward. */
  updateAlertCheck(id: string, price: number, at: Date): Promise<void>;
  deactivateAlert(id: string): Promise<void>;
  getOwnerSettings(ownerId: string): Promise<OwnerSettings>;
  upsertOwnerSettings(
    ownerId: string,
    patch: Partial<Omit<OwnerSettings, "ownerId">>,
  ): Promise<OwnerSettings>;
  addAlert(alert: NewAlert): Promise<PriceAlert>;
  listAlerts(ownerId: string): Promise<PriceAlert[]>;
  removeAlert(id: string, ownerId: string): Promise<boolean>;
  retargetAlert(
    id: string,
    ownerId: string,
    targetPrice: number,
    direction: Direction,
    currentPrice: number | undefined,
  ): Promise<boolean>;
}

export interface NotificationDispatcher {
  /** Resolves false on failure; never rejects. */
  deliver(event: TriggerEvent): Promise<boolean>;
}

export interface CycleSummary {
  checked: number;
  updated: number;
  triggered: number;
}
