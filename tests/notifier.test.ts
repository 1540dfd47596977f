import { describe, it, expect, vi } from "vitest";
import { ChannelDispatcher, type NotificationChannel } from "../src/services/notifier.js";
import { formatTriggerMessage } from "../src/services/trigger-message.js";
import type { TriggerEvent } from "../src/types.js";
import { makeAlert } from "./helpers/fakes.js";

const event: TriggerEvent = {
  alert: makeAlert({ targetPrice: 100, direction: "above", active: false }),
  observedPrice: 101.5,
};

function channel(name: string, fails = false) {
  return {
    name,
    send: vi.fn(async (_event: TriggerEvent) => {
      if (fails) throw new Error(`${name} unavailable`);
    }),
  } satisfies NotificationChannel;
}

describe("formatTriggerMessage", () => {
  it("describes the crossing with prices in the alert currency", () => {
    expect(formatTriggerMessage(event)).toBe("AAPL (Apple Inc.) at 101.50 $ is above target 100.00 $");
  });

  it("falls back to the currency code when no symbol is known", () => {
    const chf = { ...event, alert: { ...event.alert, ticker: "NESN", companyName: "Nestle", currency: "CHF" } };
    expect(formatTriggerMessage(chf)).toBe("NESN (Nestle) at 101.50 CHF is above target 100.00 CHF");
  });
});

describe("ChannelDispatcher", () => {
  it("delivers to every channel and succeeds when one does", async () => {
    const email = channel("Email", true);
    const sms = channel("SMS");

    expect(await new ChannelDispatcher([email, sms]).deliver(event)).toBe(true);
    expect(email.send).toHaveBeenCalledWith(event);
    expect(sms.send).toHaveBeenCalledWith(event);
  });

  it("reports failure when every channel fails", async () => {
    const dispatcher = new ChannelDispatcher([channel("Email", true), channel("SMS", true)]);
    await expect(dispatcher.deliver(event)).resolves.toBe(false);
  });

  it("reports failure with no channels configured", async () => {
    expect(await new ChannelDispatcher([]).deliver(event)).toBe(false);
  });
});
