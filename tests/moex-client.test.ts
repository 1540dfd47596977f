import { describe, it, expect, vi } from "vitest";
import { MoexClient } from "../src/services/moex-client.js";
import { jsonResponse } from "./helpers/fakes.js";

function issBody(sec: Record<string, unknown>, md: Record<string, unknown>) {
  const table = (row: Record<string, unknown>) => ({
    columns: Object.keys(row),
    data: [Object.values(row)],
  });
  return { securities: table(sec), marketdata: table(md) };
}

function clientWith(body: unknown, status = 200) {
  const fetchImpl = vi.fn(async (_url: string) => jsonResponse(body, status));
  return { fetchImpl, client: new MoexClient({ baseUrl: "https://iss.test/iss", timeoutMs: 1000, fetchImpl }) };
}

describe("MoexClient.fetchOne", () => {
  it("parses the last trade price and security name", async () => {
    const { client } = clientWith(
      issBody(
        { SECID: "SBER", SECNAME: "Sberbank", SHORTNAME: "Sber", PREVPRICE: 300 },
        { SECID: "SBER", LAST: 310.5, CLOSEPRICE: 309, MARKETPRICE2: 308 },
      ),
    );
    expect(await client.fetchOne("SBER")).toEqual({
      ticker: "SBER",
      companyName: "Sberbank",
      price: 310.5,
      currency: "RUB",
      exchange: "MOEX",
    });
  });

  it("falls back through close, market price and previous price", async () => {
    const noLast = clientWith(
      issBody({ SECID: "GAZP", SHORTNAME: "Gazprom", PREVPRICE: 150 }, { LAST: null, CLOSEPRICE: 0, MARKETPRICE2: 152.4 }),
    );
    const quote = await noLast.client.fetchOne("GAZP");
    expect(quote?.price).toBe(152.4);
    expect(quote?.companyName).toBe("Gazprom");

    const onlyPrev = clientWith(issBody({ SECID: "GAZP", PREVPRICE: 150 }, { LAST: null, CLOSEPRICE: null }));
    const prev = await onlyPrev.client.fetchOne("GAZP");
    expect(prev?.price).toBe(150);
    expect(prev?.companyName).toBe("GAZP");
  });

  it("returns null when the board has no row for the ticker", async () => {
    const { client } = clientWith({
      securities: { columns: ["SECID"], data: [] },
      marketdata: { columns: ["SECID", "LAST"], data: [] },
    });
    expect(await client.fetchOne("NOPE")).toBeNull();
  });

  it("returns null for a body that is not an ISS table set", async () => {
    expect(await clientWith({ securities: "oops" }).client.fetchOne("SBER")).toBeNull();
    expect(
      await clientWith({
        securities: { columns: ["SECID"], data: [["SBER"]] },
        marketdata: { columns: [1, 2], data: [[3, 4]] },
      }).client.fetchOne("SBER"),
    ).toBeNull();
  });

  it("returns null when no price field is usable", async () => {
    const { client } = clientWith(issBody({ SECID: "X", PREVPRICE: null }, { LAST: null }));
    expect(await client.fetchOne("X")).toBeNull();
  });

  it("returns null on HTTP errors and network failures", async () => {
    expect(await clientWith({}, 404).client.fetchOne("SBER")).toBeNull();

    const fetchImpl = vi.fn(async (_url: string): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    expect(await new MoexClient({ fetchImpl }).fetchOne("SBER")).toBeNull();
  });

  it("requests the TQBR board with the upper-cased ticker", async () => {
    const { client, fetchImpl } = clientWith(issBody({ SECNAME: "Lukoil" }, { LAST: 7000 }));
    const quote = await client.fetchOne(" lkoh ");
    expect(quote?.ticker).toBe("LKOH");
    const url = new URL(fetchImpl.mock.calls[0][0]);
    expect(url.pathname).toBe("/iss/engines/stock/markets/shares/boards/TQBR/securities/LKOH.json");
    expect(url.searchParams.get("iss.meta")).toBe("off");
  });
});

describe("MoexClient.fetchMany", () => {
  it("queries each ticker and leaves out the ones without a price", async () => {
    const prices: Record<string, number> = { SBER: 310.5, GAZP: 152.4 };
    const fetchImpl = vi.fn(async (url: string) => {
      const ticker = new URL(url).pathname.split("/").pop()?.replace(".json", "") ?? "";
      const price = prices[ticker];
      return price != null ? jsonResponse(issBody({ SECNAME: ticker }, { LAST: price })) : jsonResponse({}, 404);
    });
    const client = new MoexClient({ baseUrl: "https://iss.test/iss", fetchImpl });

    const result = await client.fetchMany(["SBER", "NOPE", "GAZP"]);

    expect(result).toEqual(new Map([["SBER", 310.5], ["GAZP", 152.4]]));
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });
});
