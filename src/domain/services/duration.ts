const DURATION_PATTERN = /^(\d+)([mh])$/;

const UNIT_MS = {
  m: 60_000,
  h: 3_600_000
} as const;

export type ParsedDuration =
  | { ok: true; ms: number }
  | { ok: false; error: "INVALID_DURATION_FORMAT" };

export function parseDuration(text: string): ParsedDuration {
  const match = DURATION_PATTERN.exec(text.toLowerCase());
  if (!match) {
    return { ok: false, error: "INVALID_DURATION_FORMAT" };
  }
  const unit = match[2] === "h" ? "h" : "m";
  const ms = Number(match[1]) * UNIT_MS[unit];
  if (!Number.isSafeInteger(ms)) {
    return { ok: false, error: "INVALID_DURATION_FORMAT" };
  }
  return { ok: true, ms };
}
