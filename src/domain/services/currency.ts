/**
 * Currency ladder for bids. Every amount is stored in silver, the base unit.
 */
type CurrencyCode = "m" | "p" | "g" | "s";

type Denomination = {
  code: CurrencyCode;
  value: number;
  aliases: string[];
};

// Highest tier first; parse order and display order both follow this list.
const DENOMINATIONS: readonly Denomination[] = [
  { code: "m", value: 1_000_000, aliases: ["mithril", "mith"] },
  { code: "p", value: 10_000, aliases: ["platinum", "plat"] },
  { code: "g", value: 100, aliases: ["gold"] },
  { code: "s", value: 1, aliases: ["silver", "sil"] }
];

const TOKEN_PATTERN = /^(\d+)([mpgs])$/;

export type ParsedBid =
  | { ok: true; amount: number; display: string }
  | { ok: false; error: "INVALID_BID_FORMAT" };

const invalidBid: ParsedBid = { ok: false, error: "INVALID_BID_FORMAT" };

function normalizeToken(token: string): string {
  for (const denomination of DENOMINATIONS) {
    for (const alias of denomination.aliases) {
      if (token.endsWith(alias) && /^\d+$/.test(token.slice(0, -alias.length))) {
        return `${token.slice(0, -alias.length)}${denomination.code}`;
      }
    }
  }
  return token;
}

function tierIndex(code: string): number {
  return DENOMINATIONS.findIndex((denomination) => denomination.code === code);
}

/**
 * Parses a bid such as `"1m 50p 100g 500s"` or `"2plat 5gold"` into silver.
 * Tiers must be written highest first and at most once each; any bad token
 * rejects the whole bid.
 */
export function parseBid(text: string): ParsedBid {
  const tokens = text.toLowerCase().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return invalidBid;
  }

  let total = 0;
  let lastTier = -1;
  for (const raw of tokens) {
    const match = TOKEN_PATTERN.exec(normalizeToken(raw));
    if (!match) {
      return invalidBid;
    }
    const tier = tierIndex(match[2]);
    if (tier <= lastTier) {
      return invalidBid;
    }
    lastTier = tier;
    total += Number(match[1]) * DENOMINATIONS[tier].value;
  }

  if (!Number.isSafeInteger(total)) {
    return invalidBid;
  }
  return { ok: true, amount: total, display: formatAmount(total) };
}

export function formatAmount(amount: number): string {
  const parts: string[] = [];
  let remainder = amount;
  for (const denomination of DENOMINATIONS) {
    const count = Math.floor(remainder / denomination.value);
    remainder -= count * denomination.value;
    if (count > 0) {
      parts.push(`${count}${denomination.code}`);
    }
  }
  return parts.length > 0 ? parts.join(" ") : "0s";
}
