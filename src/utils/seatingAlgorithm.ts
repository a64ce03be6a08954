/*
 * Adapter over engine: raw request -> validated engine input -> plans.
 * Owns the strict-then-relaxed fallback; surfaces engine diagnostics as {type,kind,message}.
 */

import { v4 as uuidv4 } from "uuid";
import type { SeatingError, SeatingPlan, SeatingRequest, SeatingResult, Strictness } from "../types";
import * as Engine from "./seatingAlgorithm.engine";
import { buildDefaultSeats, getLayoutBounds, normalizeSeats } from "./layout";
import { normalizeRoster, type Student } from "./roster";
import { applyShortcut, normalizeRestrictions, type RestrictionInput, type ShortcutInput } from "./restrictions";
import { buildConstraints, normalizeRelations } from "./constraints";
import { detectUnsatisfiableConstraints } from "./unsatisfiableValidator";
import { buildSeatGrid } from "./formatters";
import { toInteger } from "./ids";
import { loadConfig, mergeConfig } from "../lib/config";
import { createLogger } from "../lib/logger";

export const DEFAULT_LAYOUT_COUNT = 5;

export function generateSeatingPlans(request: SeatingRequest): SeatingResult {
  const config = mergeConfig(loadConfig(), request.options);
  const log = createLogger("seatingAlgorithm", config.debug);
  log.time("SeatingGeneration");
  try {
    const { students, errors: rosterErrors } = normalizeRoster(request.students ?? []);
    const { seats, errors: seatErrors } = request.seats
      ? normalizeSeats(request.seats)
      : { seats: buildDefaultSeats(), errors: [] };
    const roster = new Set(students.map((s) => s.id));

    const { restrictions: restrictionInput, errors: shortcutErrors } = applyShortcuts(
      request.restrictions ?? [],
      request.shortcuts ?? [],
      getLayoutBounds(seats),
    );
    const { limits, errors: restrictionErrors } = normalizeRestrictions(restrictionInput, roster);
    const { relations, errors: relationErrors } = normalizeRelations(request.relations ?? [], roster);
    const { count, errors: countErrors } = resolveCount(request.count, config.maxLayouts);

    const inputErrors = [
      ...rosterErrors,
      ...seatErrors,
      ...shortcutErrors,
      ...restrictionErrors,
      ...relationErrors,
      ...countErrors,
    ];
    if (inputErrors.some((e) => mapErrorType(e.kind) === "error")) {
      log.error("Rejected input", inputErrors);
      return { plans: [], errors: inputErrors.map(toSeatingError), strictness: null };
    }

    const studentIds = students.map((s) => s.id);
    const constraints = buildConstraints(studentIds, limits, relations);
    const adjacency = Engine.buildAdjacencyIndex(seats);
    log.info("Input summary", {
      students: studentIds.length,
      seats: seats.length,
      relations: relations.length,
      restricted: limits.size,
      count,
    });

    const unsatisfiable = detectUnsatisfiableConstraints(studentIds, seats, constraints, adjacency);
    if (unsatisfiable.length > 0) {
      log.error("Constraints cannot be satisfied", unsatisfiable);
      return { plans: [], errors: [...inputErrors, ...unsatisfiable].map(toSeatingError), strictness: null };
    }

    const seed = request.seed ?? config.seed;
    const engineOptions: Engine.GenerateOptions = {
      rng: Engine.createRng(seed),
      attemptsPerLayout: config.attemptsPerLayout,
      maxStepsPerRun: config.maxStepsPerRun,
      timeBudgetMs: config.timeBudgetMs,
    };

    const diagnostics: Engine.ValidationError[] = [];
    let strictness: Strictness = "strict";
    let run = Engine.generateMultipleLayouts(count, studentIds, seats, constraints, adjacency, true, engineOptions);
    log.info("Strict run", { found: run.layouts.length, attempts: run.attempts, duplicates: run.duplicates });

    if (run.layouts.length === 0) {
      diagnostics.push({
        kind: "relaxed_fallback",
        message: hitSearchLimit(run)
          ? "Every strict attempt hit the search limit; retried with left/right separation only."
          : relations.some((r) => r.kind === "non-adjacent")
            ? "No layout keeps separated students out of each other's surrounding seats; only left/right separation was enforced."
            : "No strict layout was found; retried with left/right separation only.",
        details: { attempts: run.attempts, aborted: run.aborted },
      });
      log.warn("Falling back to left/right separation");
      strictness = "relaxed";
      run = Engine.generateMultipleLayouts(count, studentIds, seats, constraints, adjacency, false, engineOptions);
      log.info("Relaxed run", { found: run.layouts.length, attempts: run.attempts, duplicates: run.duplicates });
    }

    if (run.layouts.length === 0) {
      diagnostics.push({
        kind: "no_solution",
        message: hitSearchLimit(run)
          ? "No valid seating was found before the search limit was reached. Raise SEATING_MAX_STEPS or SEATING_TIME_BUDGET_MS, or loosen some rules."
          : "No valid seating could be generated with the current settings. Loosen some rules and try again.",
        details: { attempts: run.attempts, aborted: run.aborted },
      });
    } else if (run.layouts.length < count) {
      diagnostics.push({
        kind: "partial_result",
        message: `Only ${run.layouts.length} of ${count} distinct layouts were found.`,
        details: { attempts: run.attempts, duplicates: run.duplicates, aborted: run.aborted },
      });
    }

    const plans: SeatingPlan[] = run.layouts.map((assignment, i) => ({
      id: uuidv4(),
      index: i + 1,
      strictness,
      assignment,
    }));

    return {
      plans,
      errors: [...inputErrors, ...diagnostics].map(toSeatingError),
      strictness: plans.length > 0 ? strictness : null,
    };
  } finally {
    log.timeEnd("SeatingGeneration");
  }
}

/** A run where no trial finished on its own: every attempt was cut off, or the time budget ran out first. */
function hitSearchLimit(run: Engine.GenerateReturn): boolean {
  return run.attempts === 0 || run.aborted === run.attempts;
}

function applyShortcuts(
  restrictions: RestrictionInput[],
  shortcuts: readonly ShortcutInput[],
  bounds: { maxRow: number; maxCol: number },
): { restrictions: RestrictionInput[]; errors: Engine.ValidationError[] } {
  let out = restrictions;
  const errors: Engine.ValidationError[] = [];
  for (const sc of shortcuts) {
    if (sc.mode !== "none" && (!Number.isInteger(sc.n) || sc.n < 1)) {
      errors.push({
        kind: "invalid_restriction",
        message: `Ignored ${sc.mode} shortcut on ${sc.axis}: count must be a positive integer, got ${sc.n}`,
        details: { shortcut: sc },
      });
      continue;
    }
    const ids = sc.students.map(toInteger).filter((id): id is number => id !== null);
    out = applyShortcut(out, ids, sc.axis, sc.mode, sc.n, bounds);
  }
  return { restrictions: out, errors };
}

function resolveCount(
  raw: number | undefined,
  maxLayouts: number,
): { count: number; errors: Engine.ValidationError[] } {
  if (raw === undefined) return { count: Math.min(DEFAULT_LAYOUT_COUNT, maxLayouts), errors: [] };
  if (!Number.isInteger(raw) || raw < 1) {
    return {
      count: 0,
      errors: [{ kind: "invalid_layout_count", message: `Layout count must be a positive integer, got ${raw}` }],
    };
  }
  if (raw > maxLayouts) {
    return {
      count: maxLayouts,
      errors: [{ kind: "layout_count_clamped", message: `At most ${maxLayouts} layouts per request; generating ${maxLayouts}.` }],
    };
  }
  return { count: raw, errors: [] };
}

/**
 * One text block per plan: a line per row, front row first.
 * "." marks a gap in the layout, "(empty)" a seat nobody was given.
 */
export function generatePlanSummary(
  plan: SeatingPlan,
  students: readonly Student[],
  seats: readonly Engine.Seat[],
): string {
  const names = new Map(students.map((s) => [s.id, s.name]));
  const grid = buildSeatGrid(plan.assignment, seats, names);
  const mode = plan.strictness === "strict" ? "strict separation" : "left/right separation";

  let summary = `Seating Plan ${plan.index} (${mode})\n`;
  grid.forEach((cells, i) => {
    const line = cells.map((c) => (c === null ? "." : c === "" ? "(empty)" : c)).join(" | ");
    summary += `Row ${i + 1}: ${line}\n`;
  });
  return summary;
}

function toSeatingError(e: Engine.ValidationError): SeatingError {
  return { type: mapErrorType(e.kind), kind: e.kind, message: e.message };
}

export function mapErrorType(kind: Engine.ConflictKind): "error" | "warn" {
  switch (kind) {
    case "invalid_student_id":
    case "duplicate_student":
    case "empty_roster":
    case "invalid_seat":
    case "duplicate_seat":
    case "roster_exceeds_seats":
    case "no_allowed_seat":
    case "must_and_cannot_conflict":
    case "adjacency_degree_violation":
    case "adjacency_closed_loop":
    case "adjacency_chain_too_long":
    case "invalid_layout_count":
    case "no_solution":
      return "error";
    case "invalid_relation":
    case "self_reference_ignored":
    case "unknown_relation_kind":
    case "unknown_student":
    case "invalid_restriction":
    case "layout_count_clamped":
    case "relaxed_fallback":
    case "partial_result":
      return "warn";
  }
}
