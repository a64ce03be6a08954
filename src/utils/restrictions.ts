// src/utils/restrictions.ts
import type { ID, ValidationError } from "./seatingAlgorithm.engine";
import { parseIdList, toInteger } from "./ids";

export type RowColValue = string | readonly number[] | null;

export interface RestrictionInput {
  studentId: unknown;
  rows?: RowColValue;
  cols?: RowColValue;
}

export interface PositionLimits {
  rows: ReadonlySet<number> | null;
  cols: ReadonlySet<number> | null;
}

export type ShortcutAxis = "rows" | "cols";
export type ShortcutMode = "none" | "front" | "back" | "left" | "right";

export interface ShortcutInput {
  students: readonly unknown[];
  axis: ShortcutAxis;
  mode: ShortcutMode;
  n: number;
}

/**
 * "1,2,3" / "1 2 3" → {1,2,3}. Blank means unrestricted (null).
 * A single bad token voids the whole field, which then also reads as unrestricted.
 */
export function parseRowColSet(value: RowColValue | undefined): { values: Set<number> | null; invalid: string[] } {
  const { ids, invalid } = parseIdList(value);
  if (invalid.length > 0 || ids.length === 0) return { values: null, invalid };
  return { values: new Set(ids), invalid };
}

export function normalizeRestrictions(
  raw: readonly RestrictionInput[],
  roster: ReadonlySet<ID>,
): { limits: Map<ID, PositionLimits>; errors: ValidationError[] } {
  const limits = new Map<ID, PositionLimits>();
  const errors: ValidationError[] = [];

  for (const r of raw) {
    const sid = toInteger(r.studentId);
    if (sid === null || !roster.has(sid)) {
      errors.push({
        kind: "unknown_student",
        message: `Ignored restriction for unknown student: ${String(r.studentId)}`,
        details: { restriction: r },
      });
      continue;
    }

    const rows = parseRowColSet(r.rows);
    const cols = parseRowColSet(r.cols);
    for (const [axis, parsed] of [["rows", rows], ["cols", cols]] as const) {
      if (parsed.invalid.length > 0) {
        errors.push({
          kind: "invalid_restriction",
          message: `Student ${sid}: ${axis} "${parsed.invalid.join(", ")}" not understood, left unrestricted`,
          details: { studentId: sid, axis, invalid: parsed.invalid },
        });
      }
    }
    limits.set(sid, { rows: rows.values, cols: cols.values });
  }

  return { limits, errors };
}

/**
 * Quick range for the first (front/left) or last (back/right) n rows or columns,
 * as the comma string a restriction field holds. "none" clears the field.
 */
export function shortcutRange(mode: ShortcutMode, n: number, max: number): string {
  if (mode === "none") return "";
  const count = Math.floor(n);
  const from = mode === "front" || mode === "left" ? 1 : Math.max(max - count + 1, 1);
  const to = mode === "front" || mode === "left" ? Math.min(count, max) : max;
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out.join(",");
}

export function applyShortcut(
  restrictions: readonly RestrictionInput[],
  studentIds: readonly ID[],
  axis: ShortcutAxis,
  mode: ShortcutMode,
  n: number,
  bounds: { maxRow: number; maxCol: number },
): RestrictionInput[] {
  const value = shortcutRange(mode, n, axis === "rows" ? bounds.maxRow : bounds.maxCol);
  const patch: Pick<RestrictionInput, ShortcutAxis> = axis === "rows" ? { rows: value } : { cols: value };
  const targets = new Set(studentIds);
  const out = restrictions.map((r): RestrictionInput => {
    const sid = toInteger(r.studentId);
    return sid !== null && targets.has(sid) ? { ...r, ...patch } : { ...r };
  });

  const present = new Set(out.map((r) => toInteger(r.studentId)));
  for (const sid of studentIds) {
    if (!present.has(sid)) out.push({ studentId: sid, ...patch });
  }
  return out;
}
