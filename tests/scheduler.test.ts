import { describe, it, expect, vi } from "vitest";
import { config } from "../src/config.js";
import { buildMonitorContext, runGuarded } from "../src/scheduler.js";
import { MemoryCreditUsage } from "../src/services/credit-ledger.js";
import { MemoryAlertStore } from "./helpers/memory-store.js";

describe("runGuarded", () => {
  it("resolves even when the cycle rejects", async () => {
    const cycle = vi.fn(async () => {
      throw new Error("database unavailable");
    });
    await expect(runGuarded("Fast", cycle)).resolves.toBeUndefined();
    expect(cycle).toHaveBeenCalledTimes(1);
  });

  it("runs a healthy cycle to completion", async () => {
    const cycle = vi.fn(async () => ({ checked: 0, updated: 0, triggered: 0 }));
    await runGuarded("Slow", cycle);
    expect(cycle).toHaveBeenCalledTimes(1);
  });
});

describe("buildMonitorContext", () => {
  it("wires the three providers around the given store", async () => {
    const store = new MemoryAlertStore();
    const ctx = buildMonitorContext(store);

    expect(ctx.store).toBe(store);
    expect([ctx.domestic.name, ctx.freeBatch.name, ctx.metered.name]).toEqual(["moex", "yahoo", "twelvedata"]);
    expect(await ctx.metered.budgetStatus()).toMatchObject({
      dailyLimit: config.twelveData.dailyLimit,
      used: 0,
      reserve: config.twelveData.reserveCredits,
    });
  });

  it("debits the credit usage store it is given", async () => {
    const usage = new MemoryCreditUsage();
    const today = new Date().toISOString().slice(0, 10);
    await usage.addUsage(today, 25);

    const ctx = buildMonitorContext(new MemoryAlertStore(), usage);

    expect((await ctx.metered.budgetStatus()).used).toBe(25);
  });
});
