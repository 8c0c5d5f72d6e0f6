import { describe, it, expect } from "vitest";
import { formatAmount, parseBid } from "../../src/domain/services/currency";

describe("parseBid", () => {
  it("sums mixed tiers written highest first", () => {
    const result = parseBid("1m 50p 100g 500s");

    // 1,000,000 + 500,000 + 10,000 + 500
    expect(result).toEqual({ ok: true, amount: 1510500, display: "1m 51p 5g" });
  });

  it("rejects tiers out of order", () => {
    expect(parseBid("50g 1m")).toEqual({ ok: false, error: "INVALID_BID_FORMAT" });
  });

  it("rejects a repeated tier", () => {
    expect(parseBid("1m 1m").ok).toBe(false);
    expect(parseBid("5g 10g").ok).toBe(false);
  });

  it("accepts long unit names in any case", () => {
    expect(parseBid("1Mithril 2plat 3GOLD 4sil")).toEqual({
      ok: true,
      amount: 1020304,
      display: "1m 2p 3g 4s"
    });
    expect(parseBid("1mith")).toEqual({ ok: true, amount: 1000000, display: "1m" });
    expect(parseBid("5platinum")).toEqual({ ok: true, amount: 50000, display: "5p" });
    expect(parseBid("7silver")).toEqual({ ok: true, amount: 7, display: "7s" });
  });

  it("mixes long names with single letters", () => {
    expect(parseBid("10p 5gold")).toEqual({ ok: true, amount: 100500, display: "10p 5g" });
  });

  it("ignores surrounding and repeated whitespace", () => {
    expect(parseBid("  1m   5g ")).toEqual({ ok: true, amount: 1000500, display: "1m 5g" });
  });

  it("normalises the display independently of the typed tiers", () => {
    expect(parseBid("250s")).toEqual({ ok: true, amount: 250, display: "2g 50s" });
    expect(parseBid("150g")).toEqual({ ok: true, amount: 15000, display: "1p 50g" });
  });

  it("parses zero as a valid amount", () => {
    expect(parseBid("0s")).toEqual({ ok: true, amount: 0, display: "0s" });
  });

  it.each([
    [""],
    ["   "],
    ["m"],
    ["1.5m"],
    ["-5g"],
    ["+5g"],
    ["5 g"],
    ["5gx"],
    ["5x"],
    ["1plat5g"],
    ["100"]
  ])("rejects %j", (input) => {
    expect(parseBid(input)).toEqual({ ok: false, error: "INVALID_BID_FORMAT" });
  });
});

describe("formatAmount", () => {
  it("decomposes greedily and skips empty tiers", () => {
    expect(formatAmount(123456789)).toBe("123m 45p 67g 89s");
    expect(formatAmount(1000001)).toBe("1m 1s");
    expect(formatAmount(10000)).toBe("1p");
  });

  it("renders zero as silver", () => {
    expect(formatAmount(0)).toBe("0s");
  });

  it("produces text that parses back to the same amount", () => {
    for (const amount of [1, 99, 100, 10000, 1510500, 123456789]) {
      const parsed = parseBid(formatAmount(amount));
      expect(parsed).toEqual({ ok: true, amount, display: formatAmount(amount) });
    }
  });
});
