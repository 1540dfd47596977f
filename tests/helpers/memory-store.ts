import { randomUUID } from "node:crypto";
import type {
  AlertStore,
  Direction,
  MonitoredAlert,
  NewAlert,
  OwnerSettings,
  PriceAlert,
} from "../../src/types.js";

/** In-process AlertStore with the same semantics as PgAlertStore. */
export class MemoryAlertStore implements AlertStore {
  readonly alerts = new Map<string, PriceAlert>();
  readonly settings = new Map<string, OwnerSettings>();

  constructor(
    private readonly defaults: Omit<OwnerSettings, "ownerId"> = { intervalDomesticSec: 60, intervalForeignSec: 180 },
  ) {}

  seed(...alerts: PriceAlert[]): void {
    for (const alert of alerts) this.alerts.set(alert.id, { ...alert });
  }

  get(id: string): PriceAlert | undefined {
    return this.alerts.get(id);
  }

  async listActiveAlerts(): Promise<MonitoredAlert[]> {
    const result: MonitoredAlert[] = [];
    for (const alert of this.alerts.values()) {
      if (!alert.active) continue;
      const s = await this.getOwnerSettings(alert.ownerId);
      result.push({ ...alert, intervalDomesticSec: s.intervalDomesticSec, intervalForeignSec: s.intervalForeignSec });
    }
    return result;
  }

  async getAlert(id: string): Promise<PriceAlert | null> {
    const alert = this.alerts.get(id);
    return alert ? { ...alert } : null;
  }

  async updateAlertCheck(id: string, price: number, at: Date): Promise<void> {
    const alert = this.alerts.get(id);
    if (!alert) return;
    alert.currentPrice = price;
    const next = at.toISOString();
    if (!alert.lastCheckedAt || next > alert.lastCheckedAt) alert.lastCheckedAt = next;
  }

  async deactivateAlert(id: string): Promise<void> {
    const alert = this.alerts.get(id);
    if (alert) alert.active = false;
  }

  async getOwnerSettings(ownerId: string): Promise<OwnerSettings> {
    return this.settings.get(ownerId) ?? { ownerId, ...this.defaults };
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
    this.settings.set(ownerId, next);
    return next;
  }

  async addAlert(input: NewAlert): Promise<PriceAlert> {
    const alert: PriceAlert = {
      ...input,
      id: randomUUID(),
      ticker: input.ticker.toUpperCase(),
      active: true,
      createdAt: new Date().toISOString(),
    };
    this.alerts.set(alert.id, alert);
    return { ...alert };
  }

  async listAlerts(ownerId: string): Promise<PriceAlert[]> {
    return [...this.alerts.values()].filter((a) => a.ownerId === ownerId).map((a) => ({ ...a }));
  }

  async removeAlert(id: string, ownerId: string): Promise<boolean> {
    const alert = this.alerts.get(id);
    if (!alert || alert.ownerId !== ownerId) return false;
    return this.alerts.delete(id);
  }

  async retargetAlert(
    id: string,
    ownerId: string,
    targetPrice: number,
    direction: Direction,
    currentPrice: number | undefined,
  ): Promise<boolean> {
    const alert = this.alerts.get(id);
    if (!alert || alert.ownerId !== ownerId) return false;
    alert.targetPrice = targetPrice;
    alert.direction = direction;
    alert.currentPrice = currentPrice ?? alert.currentPrice;
    alert.active = true;
    alert.lastCheckedAt = undefined;
    return true;
  }
}
