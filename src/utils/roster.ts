/*
 * Roster normalization: integer, unique student ids are a hard precondition of the engine.
 */

import type { ID, ValidationError } from "./seatingAlgorithm.engine";
import { toInteger } from "./ids";

export interface StudentInput {
  id: unknown;
  name?: unknown;
}

export interface Student {
  id: ID;
  name: string;
}

export function normalizeRoster(raw: readonly StudentInput[]): { students: Student[]; errors: ValidationError[] } {
  const students: Student[] = [];
  const errors: ValidationError[] = [];
  const ids = new Set<ID>();

  for (const s of raw) {
    const id = toInteger(s.id);
    if (id === null) {
      errors.push({
        kind: "invalid_student_id",
        message: `Student id must be an integer: ${String(s.id)}`,
        details: { student: s },
      });
      continue;
    }
    if (ids.has(id)) {
      errors.push({ kind: "duplicate_student", message: `Duplicate student id: ${id}`, details: { id } });
      continue;
    }
    ids.add(id);
    const name = s.name === undefined || s.name === null ? "" : String(s.name).trim();
    students.push({ id, name });
  }

  if (raw.length === 0) errors.push({ kind: "empty_roster", message: "No students to seat" });
  return { students, errors };
}
