export {
  RNG,
  createRng,
  buildAdjacencyIndex,
  isSeatAllowed,
  isPlacementLegal,
  constraintWeight,
  orderByConstraintWeight,
  solveOneAssignment,
  generateMultipleLayouts,
  canonicalKey,
  canonicalize,
  DEFAULT_ATTEMPTS_PER_LAYOUT,
} from "./utils/seatingAlgorithm.engine";
export type {
  ID,
  Seat,
  StudentConstraint,
  ConstraintsMap,
  Assignment,
  AdjacencyMap,
  AdjacencyIndex,
  ConflictKind,
  ValidationError,
  RandomSource,
  SolveOptions,
  SolveResult,
  GenerateOptions,
  GenerateReturn,
} from "./utils/seatingAlgorithm.engine";

export { generateSeatingPlans, generatePlanSummary, mapErrorType, DEFAULT_LAYOUT_COUNT } from "./utils/seatingAlgorithm";
export { buildDefaultSeats, buildGridSeats, normalizeSeats, getLayoutBounds, longestRowRun } from "./utils/layout";
export type { SeatInput } from "./utils/layout";
export { normalizeRoster } from "./utils/roster";
export type { Student, StudentInput } from "./utils/roster";
export { parseRowColSet, normalizeRestrictions, shortcutRange, applyShortcut } from "./utils/restrictions";
export type {
  RestrictionInput,
  PositionLimits,
  ShortcutInput,
  ShortcutAxis,
  ShortcutMode,
} from "./utils/restrictions";
export {
  addRelation,
  buildConstraints,
  createStudentConstraint,
  getRelation,
  normalizeRelations,
} from "./utils/constraints";
export type { Relation, RelationInput, RelationKind } from "./utils/constraints";
export { detectUnsatisfiableConstraints } from "./utils/unsatisfiableValidator";
export { buildSeatGrid, formatSeatLabel } from "./utils/formatters";
export type { SeatCell } from "./utils/formatters";
export { loadConfig, mergeConfig, DEFAULT_CONFIG } from "./lib/config";
export type { SeatingConfig } from "./lib/config";
export type { SeatingPlan, SeatingError, SeatingRequest, SeatingResult, Strictness } from "./types";
