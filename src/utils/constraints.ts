/**
 * Per-student constraint records and the pairwise adjacency rules between students
 */

import type { ConstraintsMap, ID, StudentConstraint, ValidationError } from "./seatingAlgorithm.engine";
import type { PositionLimits } from "./restrictions";
import { toInteger } from "./ids";

export type RelationKind = "adjacent" | "non-adjacent";

export interface RelationInput {
  studentA: unknown;
  studentB: unknown;
  kind: unknown;
}

export interface Relation {
  a: ID;
  b: ID;
  kind: RelationKind;
}

const RELATION_KINDS: readonly RelationKind[] = ["adjacent", "non-adjacent"];

const isRelationKind = (v: unknown): v is RelationKind =>
  typeof v === "string" && (RELATION_KINDS as readonly string[]).includes(v);

export function createStudentConstraint(id: ID, limits?: PositionLimits): StudentConstraint {
  return {
    id,
    allowedRows: limits?.rows ?? null,
    allowedCols: limits?.cols ?? null,
    mustBeAdjacentTo: new Set(),
    mustNotAdjacentTo: new Set(),
  };
}

export const getRelation = (m: ConstraintsMap, a: ID, b: ID): RelationKind | "" => {
  const sc = m.get(a);
  if (sc?.mustBeAdjacentTo.has(b)) return "adjacent";
  if (sc?.mustNotAdjacentTo.has(b)) return "non-adjacent";
  return "";
};

/** Records the rule on both students. Self pairs and students without a record are ignored. */
export function addRelation(m: Map<ID, StudentConstraint>, a: ID, b: ID, kind: RelationKind): void {
  if (a === b) return;
  const sa = m.get(a);
  const sb = m.get(b);
  if (!sa || !sb) return;
  if (kind === "adjacent") {
    sa.mustBeAdjacentTo.add(b);
    sb.mustBeAdjacentTo.add(a);
  } else {
    sa.mustNotAdjacentTo.add(b);
    sb.mustNotAdjacentTo.add(a);
  }
}

/**
 * Keep well-formed rules between two distinct roster students. Everything else is
 * dropped and reported as a warning.
 */
export function normalizeRelations(
  raw: readonly RelationInput[],
  roster: ReadonlySet<ID>,
): { relations: Relation[]; errors: ValidationError[] } {
  const relations: Relation[] = [];
  const errors: ValidationError[] = [];

  for (const r of raw) {
    const a = toInteger(r.studentA);
    const b = toInteger(r.studentB);
    if (a === null || b === null) {
      errors.push({
        kind: "invalid_relation",
        message: `Ignored rule with non-integer student ids: ${String(r.studentA)}-${String(r.studentB)}`,
        details: { relation: r },
      });
      continue;
    }
    if (!isRelationKind(r.kind)) {
      errors.push({
        kind: "unknown_relation_kind",
        message: `Ignored rule ${a}-${b} with unknown type: ${String(r.kind)}`,
        details: { relation: r },
      });
      continue;
    }
    if (a === b) {
      errors.push({ kind: "self_reference_ignored", message: `Ignored self reference in ${r.kind}: ${a}` });
      continue;
    }
    if (!roster.has(a) || !roster.has(b)) {
      errors.push({ kind: "unknown_student", message: `Unknown student in ${r.kind}: ${a}-${b}` });
      continue;
    }
    relations.push({ a, b, kind: r.kind });
  }

  return { relations, errors };
}

export function buildConstraints(
  studentIds: readonly ID[],
  limits: ReadonlyMap<ID, PositionLimits>,
  relations: readonly Relation[],
): Map<ID, StudentConstraint> {
  const m = new Map<ID, StudentConstraint>();
  for (const sid of studentIds) m.set(sid, createStudentConstraint(sid, limits.get(sid)));
  for (const { a, b, kind } of relations) addRelation(m, a, b, kind);
  return m;
}
