/*
 * src/utils/unsatisfiableValidator.ts
 * Detects constraint sets no seating can satisfy, in either strictness mode, before the solver runs
 */

import {
  isSeatAllowed,
  type AdjacencyIndex,
  type ConstraintsMap,
  type ID,
  type Seat,
  type ValidationError,
} from "./seatingAlgorithm.engine";
import { longestRowRun } from "./layout";

export function detectUnsatisfiableConstraints(
  studentIds: readonly ID[],
  seats: readonly Seat[],
  constraints: ConstraintsMap,
  adjacency: AdjacencyIndex,
): ValidationError[] {
  const errors: ValidationError[] = [];

  if (studentIds.length > seats.length) {
    errors.push({
      kind: "roster_exceeds_seats",
      message: `${studentIds.length} students but only ${seats.length} seats.`,
      details: { students: studentIds.length, seats: seats.length },
    });
  }

  const maxDegree = Math.max(0, ...Array.from(adjacency.adjacentLR.values(), (s) => s.size));

  for (const sid of studentIds) {
    const sc = constraints.get(sid);
    if (!sc) continue;

    if (!seats.some((seat) => isSeatAllowed(seat, sc))) {
      errors.push({
        kind: "no_allowed_seat",
        message: `Student ${sid} has no seat matching the allowed rows/columns.`,
        details: { studentId: sid },
      });
    }

    for (const other of sc.mustBeAdjacentTo) {
      if (other > sid && sc.mustNotAdjacentTo.has(other)) {
        errors.push({
          kind: "must_and_cannot_conflict",
          message: `Students ${sid} and ${other} are required both to sit together and apart.`,
          details: { pair: [sid, other] },
        });
      }
    }

    if (sc.mustBeAdjacentTo.size > maxDegree) {
      errors.push({
        kind: "adjacency_degree_violation",
        message: `Student ${sid} must sit beside ${sc.mustBeAdjacentTo.size} students, but no seat has more than ${maxDegree} left/right neighbours.`,
        details: { studentId: sid, degree: sc.mustBeAdjacentTo.size, maxDegree },
      });
    }
  }

  errors.push(...checkMustChains(studentIds, seats, constraints));
  return errors;
}

/*
 * Left/right neighbours form straight lines, so every group joined by "must be
 * adjacent" rules has to be a simple chain that fits in one unbroken run of seats.
 */
function checkMustChains(studentIds: readonly ID[], seats: readonly Seat[], constraints: ConstraintsMap): ValidationError[] {
  const errors: ValidationError[] = [];
  const longestRun = longestRowRun(seats);
  const visited = new Set<ID>();

  for (const start of studentIds) {
    if (visited.has(start)) continue;
    const component: ID[] = [];
    const queue: ID[] = [start];
    visited.add(start);
    let head = 0;
    let degreeSum = 0;
    while (head < queue.length) {
      const u = queue[head++];
      component.push(u);
      const partners = constraints.get(u)?.mustBeAdjacentTo ?? new Set<ID>();
      degreeSum += partners.size;
      for (const v of partners) {
        if (!visited.has(v)) {
          visited.add(v);
          queue.push(v);
        }
      }
    }
    if (component.length < 2) continue;

    const edges = degreeSum / 2;
    if (edges >= component.length) {
      errors.push({
        kind: "adjacency_closed_loop",
        message: `Students ${component.join(", ")} form a closed loop of side-by-side rules.`,
        details: { ids: component },
      });
    } else if (component.length > longestRun) {
      errors.push({
        kind: "adjacency_chain_too_long",
        message: `Students ${component.join(", ")} must sit in one row of ${component.length} seats, but the longest row run is ${longestRun}.`,
        details: { ids: component, longestRun },
      });
    }
  }
  return errors;
}
