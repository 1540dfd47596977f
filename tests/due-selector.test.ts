import { describe, it, expect } from "vitest";
import { isDue, selectDueAlerts, selectMeteredAlerts, uniqueTickers } from "../src/services/due-selector.js";
import { makeAlert } from "./helpers/fakes.js";

const T0 = new Date("2024-06-17T07:30:00Z");
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

describe("isDue", () => {
  it("is due when never checked", () => {
    expect(isDue(makeAlert({ exchange: "MOEX" }), T0)).toBe(true);
  });

  it("follows the owner's domestic interval", () => {
    const alert = makeAlert({ exchange: "MOEX", intervalDomesticSec: 60, lastCheckedAt: T0.toISOString() });
    expect(isDue(alert, at(30))).toBe(false);
    expect(isDue(alert, at(60))).toBe(true);
    expect(isDue(alert, at(61))).toBe(true);
  });

  it("uses the foreign interval for every other exchange", () => {
    const alert = makeAlert({ exchange: "NASDAQ", intervalForeignSec: 180, lastCheckedAt: T0.toISOString() });
    expect(isDue(alert, at(179))).toBe(false);
    expect(isDue(alert, at(180))).toBe(true);
  });
});

describe("selectDueAlerts", () => {
  it("splits due alerts into domestic and foreign tiers", () => {
    const sber = makeAlert({ id: "sber", ticker: "SBER", exchange: "MOEX" });
    const aapl = makeAlert({ id: "aapl", ticker: "AAPL", exchange: "NASDAQ" });
    const fresh = makeAlert({ id: "fresh", ticker: "GAZP", exchange: "MOEX", lastCheckedAt: at(-10).toISOString() });
    const off = makeAlert({ id: "off", ticker: "MSFT", active: false });

    const due = selectDueAlerts([sber, aapl, fresh, off], T0);

    expect(due.domestic.map((a) => a.id)).toEqual(["sber"]);
    expect(due.foreign.map((a) => a.id)).toEqual(["aapl"]);
  });
});

describe("selectMeteredAlerts", () => {
  // Monday 14:00 UTC: New York is open, Hong Kong is closed.
  const monday = new Date("2024-06-17T14:00:00Z");

  it("keeps only foreign alerts whose own exchange is in session", () => {
    const alerts = [
      makeAlert({ id: "nyse", ticker: "IBM", exchange: "NYSE" }),
      makeAlert({ id: "hk", ticker: "0700", exchange: "HKEX" }),
      makeAlert({ id: "moex", ticker: "SBER", exchange: "MOEX" }),
      makeAlert({ id: "otc", ticker: "XYZ", exchange: "OTC" }),
      makeAlert({ id: "off", ticker: "AAPL", exchange: "NASDAQ", active: false }),
    ];
    expect(selectMeteredAlerts(alerts, monday).map((a) => a.id)).toEqual(["nyse", "otc"]);
  });

  it("ignores the refresh interval", () => {
    const checkedJustNow = makeAlert({ exchange: "NASDAQ", lastCheckedAt: monday.toISOString() });
    expect(selectMeteredAlerts([checkedJustNow], monday)).toHaveLength(1);
  });
});

describe("uniqueTickers", () => {
  it("de-duplicates while keeping first-seen order", () => {
    const alerts = [{ ticker: "AAPL" }, { ticker: "MSFT" }, { ticker: "AAPL" }];
    expect(uniqueTickers(alerts)).toEqual(["AAPL", "MSFT"]);
  });
});
