/**
 * Integer id coercion shared by roster, seat and relation normalization.
 */

const INTEGER_RE = /^[+-]?\d+$/;

/** Integer numbers and integer strings ("7", " 07 ", "+3") become numbers; anything else is null. */
export function toInteger(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!INTEGER_RE.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

export function parseIdList(raw: string | readonly number[] | null | undefined): {
  ids: number[];
  invalid: string[];
} {
  if (raw === null || raw === undefined) return { ids: [], invalid: [] };
  const tokens = Array.isArray(raw)
    ? raw.map((v) => String(v))
    : String(raw)
        .split(/[,\s]+/)
        .map((s) => s.trim())
        .filter(Boolean);

  const ids: number[] = [];
  const invalid: string[] = [];
  for (const token of tokens) {
    const n = toInteger(token);
    if (n === null) invalid.push(token);
    else ids.push(n);
  }
  return { ids, invalid };
}
