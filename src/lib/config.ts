import { DEFAULT_ATTEMPTS_PER_LAYOUT } from "../utils/seatingAlgorithm.engine";

export interface SeatingConfig {
  seed: string | null;
  debug: boolean;
  attemptsPerLayout: number;
  maxStepsPerRun: number;
  timeBudgetMs: number | null;
  maxLayouts: number;
}

export const DEFAULT_CONFIG: SeatingConfig = {
  seed: null,
  debug: false,
  attemptsPerLayout: DEFAULT_ATTEMPTS_PER_LAYOUT,
  maxStepsPerRun: 200_000,
  timeBudgetMs: null,
  maxLayouts: 20,
};

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (Number.isInteger(n) && n > 0) return n;
  console.warn(`[config] Ignoring ${key}=${JSON.stringify(raw)}, expected a positive integer`);
  return fallback;
}

/**
 * Reads SEED_RANDOM, SEATING_DEBUG, SEATING_ATTEMPTS_PER_LAYOUT, SEATING_MAX_STEPS,
 * SEATING_TIME_BUDGET_MS and SEATING_MAX_LAYOUTS.
 */
export function loadConfig(env: Env = process.env): SeatingConfig {
  const seed = env.SEED_RANDOM?.trim();
  const debug = /^(1|true|yes|on)$/i.test(env.SEATING_DEBUG?.trim() ?? "");
  const budget = positiveInt(env, "SEATING_TIME_BUDGET_MS", 0);

  return {
    seed: seed ? seed : DEFAULT_CONFIG.seed,
    debug,
    attemptsPerLayout: positiveInt(env, "SEATING_ATTEMPTS_PER_LAYOUT", DEFAULT_CONFIG.attemptsPerLayout),
    maxStepsPerRun: positiveInt(env, "SEATING_MAX_STEPS", DEFAULT_CONFIG.maxStepsPerRun),
    timeBudgetMs: budget > 0 ? budget : DEFAULT_CONFIG.timeBudgetMs,
    maxLayouts: positiveInt(env, "SEATING_MAX_LAYOUTS", DEFAULT_CONFIG.maxLayouts),
  };
}

const isPositiveInt = (v: number | undefined): v is number => v !== undefined && Number.isInteger(v) && v > 0;

/**
 * Apply per-request overrides. Fields left undefined keep the base value, and
 * numeric overrides that are not positive integers are ignored.
 */
export function mergeConfig(base: SeatingConfig, overrides: Partial<SeatingConfig> = {}): SeatingConfig {
  const { seed, debug, attemptsPerLayout, maxStepsPerRun, timeBudgetMs, maxLayouts } = overrides;
  return {
    seed: seed === undefined ? base.seed : seed,
    debug: debug ?? base.debug,
    attemptsPerLayout: isPositiveInt(attemptsPerLayout) ? attemptsPerLayout : base.attemptsPerLayout,
    maxStepsPerRun: isPositiveInt(maxStepsPerRun) ? maxStepsPerRun : base.maxStepsPerRun,
    timeBudgetMs: timeBudgetMs === null || isPositiveInt(timeBudgetMs) ? timeBudgetMs : base.timeBudgetMs,
    maxLayouts: isPositiveInt(maxLayouts) ? maxLayouts : base.maxLayouts,
  };
}
