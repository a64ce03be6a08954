/*
 * Seating ENGINE: adjacency index, placement checks, backtracking solver
 * and distinct multi-layout generation.
 *  - Synchronous and side-effect free: every call owns its own RNG and working state.
 *  - "must be adjacent" always means left-right neighbours in the same row.
 *  - "must not be adjacent" means the 8-neighbourhood (strict) or left-right only (relaxed).
 */

import seedrandom from "seedrandom";

export type ID = number;

export interface Seat {
  readonly id: ID;
  readonly row: number;
  readonly col: number;
}

export interface StudentConstraint {
  id: ID;
  allowedRows: ReadonlySet<number> | null; // null = no row restriction
  allowedCols: ReadonlySet<number> | null;
  mustBeAdjacentTo: Set<ID>;
  mustNotAdjacentTo: Set<ID>;
}

export type ConstraintsMap = ReadonlyMap<ID, StudentConstraint>;
export type Assignment = Map<ID, ID>; // studentId -> seatId
export type AdjacencyMap = ReadonlyMap<ID, ReadonlySet<ID>>;

export interface AdjacencyIndex {
  adjacentLR: AdjacencyMap;
  adjacentBox: AdjacencyMap;
}

export type ConflictKind =
  | "invalid_student_id"
  | "duplicate_student"
  | "empty_roster"
  | "invalid_seat"
  | "duplicate_seat"
  | "invalid_relation"
  | "self_reference_ignored"
  | "unknown_relation_kind"
  | "unknown_student"
  | "invalid_restriction"
  | "roster_exceeds_seats"
  | "no_allowed_seat"
  | "must_and_cannot_conflict"
  | "adjacency_degree_violation"
  | "adjacency_closed_loop"
  | "adjacency_chain_too_long"
  | "invalid_layout_count"
  | "layout_count_clamped"
  | "relaxed_fallback"
  | "partial_result"
  | "no_solution";

export interface ValidationError {
  kind: ConflictKind;
  message: string;
  details?: Record<string, unknown>;
}

export type RandomSource = () => number;

export class RNG {
  constructor(private readonly source: RandomSource = Math.random) {}
  next(): number {
    return this.source();
  }
  shuffle<T>(arr: T[]): void {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
  }
}

/** Seeded generator when a seed is given, `Math.random` otherwise. */
export function createRng(seed?: string | number | null): RNG {
  if (seed === undefined || seed === null || seed === "") return new RNG();
  return new RNG(seedrandom(String(seed)));
}

export function buildAdjacencyIndex(seats: readonly Seat[]): AdjacencyIndex {
  const adjacentLR = new Map<ID, Set<ID>>();
  const adjacentBox = new Map<ID, Set<ID>>();
  for (const s of seats) {
    if (adjacentLR.has(s.id)) throw new Error(`Duplicate seat id in layout: ${s.id}`);
    adjacentLR.set(s.id, new Set());
    adjacentBox.set(s.id, new Set());
  }

  for (const s1 of seats) {
    for (const s2 of seats) {
      if (s1.id === s2.id) continue;
      const dr = Math.abs(s1.row - s2.row);
      const dc = Math.abs(s1.col - s2.col);
      if (dr === 0 && dc === 1) adjacentLR.get(s1.id)?.add(s2.id);
      if (dr <= 1 && dc <= 1) adjacentBox.get(s1.id)?.add(s2.id);
    }
  }
  return { adjacentLR, adjacentBox };
}

function neighbours(map: AdjacencyMap, a: ID, b: ID): boolean {
  return map.get(a)?.has(b) ?? false;
}

export function isSeatAllowed(seat: Seat, sc: StudentConstraint | undefined): boolean {
  if (!sc) return true;
  if (sc.allowedRows !== null && !sc.allowedRows.has(seat.row)) return false;
  if (sc.allowedCols !== null && !sc.allowedCols.has(seat.col)) return false;
  return true;
}

/**
 * Would seating `studentId` at `seatId` break any constraint, given the students
 * already placed? Checks the student's own position limits, its own relations to
 * placed students, and relations placed students declare about it.
 * Never mutates `assignment`.
 */
export function isPlacementLegal(
  assignment: ReadonlyMap<ID, ID>,
  studentId: ID,
  seatId: ID,
  seatById: ReadonlyMap<ID, Seat>,
  constraints: ConstraintsMap,
  adjacency: AdjacencyIndex,
  strict: boolean,
): boolean {
  const seat = seatById.get(seatId);
  if (!seat) return false;
  const sc = constraints.get(studentId);
  if (!isSeatAllowed(seat, sc)) return false;

  const { adjacentLR, adjacentBox } = adjacency;
  const forbidden = strict ? adjacentBox : adjacentLR;

  if (sc) {
    for (const other of sc.mustBeAdjacentTo) {
      const otherSeat = assignment.get(other);
      if (otherSeat !== undefined && !neighbours(adjacentLR, seatId, otherSeat)) return false;
    }
    for (const other of sc.mustNotAdjacentTo) {
      const otherSeat = assignment.get(other);
      if (otherSeat !== undefined && neighbours(forbidden, seatId, otherSeat)) return false;
    }
  }

  for (const [other, otherSeat] of assignment) {
    const osc = constraints.get(other);
    if (!osc) continue;
    if (osc.mustBeAdjacentTo.has(studentId) && !neighbours(adjacentLR, otherSeat, seatId)) return false;
    if (osc.mustNotAdjacentTo.has(studentId) && neighbours(forbidden, otherSeat, seatId)) return false;
  }

  return true;
}

export function constraintWeight(sc: StudentConstraint | undefined): number {
  if (!sc) return 0;
  let score = 0;
  if (sc.allowedRows !== null) score += 2;
  if (sc.allowedCols !== null) score += 2;
  score += 3 * sc.mustBeAdjacentTo.size;
  score += 3 * sc.mustNotAdjacentTo.size;
  return score;
}

/** Most-constrained first. Stable, so ties keep the incoming order. */
export function orderByConstraintWeight(students: readonly ID[], constraints: ConstraintsMap): ID[] {
  return students
    .map((id) => ({ id, w: constraintWeight(constraints.get(id)) }))
    .sort((a, b) => b.w - a.w)
    .map((x) => x.id);
}

export interface SolveOptions {
  rng?: RNG;
  maxSteps?: number;
  deadline?: number; // epoch ms
}

export interface SolveResult {
  assignment: Assignment | null;
  steps: number;
  aborted: boolean;
}

export function solveOneAssignment(
  students: readonly ID[],
  seats: readonly Seat[],
  constraints: ConstraintsMap,
  adjacency: AdjacencyIndex,
  strict: boolean,
  options: SolveOptions = {},
): SolveResult {
  const rng = options.rng ?? new RNG();
  const maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;
  const deadline = options.deadline ?? Number.POSITIVE_INFINITY;

  const order = orderByConstraintWeight(students, constraints);
  const seatById = new Map<ID, Seat>(seats.map((s) => [s.id, s]));
  const assignment: Assignment = new Map();
  const used = new Set<ID>();
  let steps = 0;
  let aborted = false;

  function backtrack(idx: number): boolean {
    if (idx === order.length) return true;

    const sid = order[idx];
    const sc = constraints.get(sid);
    const candidates: ID[] = [];
    for (const seat of seats) {
      if (used.has(seat.id)) continue;
      if (!isSeatAllowed(seat, sc)) continue;
      candidates.push(seat.id);
    }
    rng.shuffle(candidates);

    for (const seatId of candidates) {
      if (!isPlacementLegal(assignment, sid, seatId, seatById, constraints, adjacency, strict)) continue;

      steps++;
      if (steps > maxSteps || Date.now() > deadline) {
        aborted = true;
        return false;
      }

      assignment.set(sid, seatId);
      used.add(seatId);
      if (backtrack(idx + 1)) return true;
      assignment.delete(sid);
      used.delete(seatId);
      if (aborted) return false;
    }

    return false;
  }

  const ok = backtrack(0);
  return { assignment: ok ? assignment : null, steps, aborted };
}

export function canonicalKey(assignment: ReadonlyMap<ID, ID>): string {
  return Array.from(assignment)
    .sort((a, b) => a[0] - b[0])
    .map(([sid, seatId]) => `${sid}:${seatId}`)
    .join(",");
}

/** Same mapping, iterated in ascending student id order. */
export function canonicalize(assignment: ReadonlyMap<ID, ID>): Assignment {
  return new Map(Array.from(assignment).sort((a, b) => a[0] - b[0]));
}

export interface GenerateOptions {
  rng?: RNG;
  attemptsPerLayout?: number;
  maxStepsPerRun?: number;
  timeBudgetMs?: number | null;
}

export interface GenerateReturn {
  layouts: Assignment[];
  attempts: number;
  duplicates: number;
  aborted: number;
}

export const DEFAULT_ATTEMPTS_PER_LAYOUT = 30;

/**
 * Collect up to `count` distinct assignments in at most `count * attemptsPerLayout`
 * solver runs. Never switches strictness; callers decide on fallback.
 */
export function generateMultipleLayouts(
  count: number,
  students: readonly ID[],
  seats: readonly Seat[],
  constraints: ConstraintsMap,
  adjacency: AdjacencyIndex,
  strict: boolean,
  options: GenerateOptions = {},
): GenerateReturn {
  const rng = options.rng ?? new RNG();
  const maxAttempts = Math.max(0, count) * (options.attemptsPerLayout ?? DEFAULT_ATTEMPTS_PER_LAYOUT);
  const deadline =
    options.timeBudgetMs === undefined || options.timeBudgetMs === null
      ? undefined
      : Date.now() + options.timeBudgetMs;

  const order = students.slice();
  const layouts: Assignment[] = [];
  const seen = new Set<string>();
  let attempts = 0;
  let duplicates = 0;
  let aborted = 0;

  while (layouts.length < count && attempts < maxAttempts) {
    if (deadline !== undefined && Date.now() > deadline) break;
    attempts++;
    rng.shuffle(order);

    const result = solveOneAssignment(order, seats, constraints, adjacency, strict, {
      rng,
      maxSteps: options.maxStepsPerRun,
      deadline,
    });
    if (result.aborted) aborted++;
    if (!result.assignment) continue;

    const key = canonicalKey(result.assignment);
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    layouts.push(canonicalize(result.assignment));
  }

  return { layouts, attempts, duplicates, aborted };
}
