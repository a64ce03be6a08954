import type { Assignment, ConflictKind } from "../utils/seatingAlgorithm.engine";
import type { SeatInput } from "../utils/layout";
import type { StudentInput } from "../utils/roster";
import type { RestrictionInput, ShortcutInput } from "../utils/restrictions";
import type { RelationInput } from "../utils/constraints";
import type { SeatingConfig } from "../lib/config";

export type Strictness = "strict" | "relaxed";

export interface SeatingPlan {
  id: string;          // uuid, stable for the lifetime of the result
  index: number;       // 1-based position in the result
  strictness: Strictness;
  assignment: Assignment; // studentId -> seatId, ascending student id
}

export interface SeatingError {
  type: "error" | "warn";
  kind: ConflictKind;
  message: string;
}

export interface SeatingRequest {
  students: StudentInput[];
  seats?: SeatInput[];           // default classroom when omitted
  restrictions?: RestrictionInput[];
  shortcuts?: ShortcutInput[];   // applied to restrictions before parsing
  relations?: RelationInput[];
  count?: number;                // default 5
  seed?: string | number;
  options?: Partial<SeatingConfig>;
}

export interface SeatingResult {
  plans: SeatingPlan[];
  errors: SeatingError[];
  strictness: Strictness | null; // null when no plan was produced
}
