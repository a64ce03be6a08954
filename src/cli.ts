import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import type { SeatingRequest } from "./types";
import { generatePlanSummary, generateSeatingPlans } from "./utils/seatingAlgorithm";
import { buildDefaultSeats, normalizeSeats } from "./utils/layout";
import { normalizeRoster } from "./utils/roster";
import type { RowColValue, ShortcutInput, ShortcutMode } from "./utils/restrictions";
import { describeError } from "./utils/errorUtils";
import { toInteger } from "./utils/ids";

export interface CliIO {
  readFile: (path: string) => string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const USAGE = "Usage: seat <request.json> [--count N] [--seed S] [--json]";

const SHORTCUT_MODES: readonly ShortcutMode[] = ["none", "front", "back", "left", "right"];

const defaultIO: CliIO = {
  readFile: (path) => readFileSync(path, "utf8"),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function toRowCol(value: unknown): RowColValue {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return value.map(String).join(",");
  return null;
}

function toShortcut(r: Record<string, unknown>): ShortcutInput | null {
  const { axis, students } = r;
  const mode = SHORTCUT_MODES.find((m) => m === r.mode);
  const n = toInteger(r.n);
  if ((axis !== "rows" && axis !== "cols") || !mode || !Array.isArray(students)) return null;
  if (n === null || (mode !== "none" && n < 1)) return null;
  return { students, axis, mode, n };
}

/** Build a request from parsed JSON. Shapes the adapter cannot read are reported and skipped. */
export function toSeatingRequest(doc: unknown, io: CliIO): SeatingRequest | null {
  if (!isRecord(doc) || !Array.isArray(doc.students)) return null;

  const shortcuts: ShortcutInput[] = [];
  for (const r of records(doc.shortcuts)) {
    const sc = toShortcut(r);
    if (sc) shortcuts.push(sc);
    else io.stderr(`WARN: Ignored shortcut ${JSON.stringify(r)}\n`);
  }

  const { count, seed } = doc;
  let fileCount: number | undefined;
  if (typeof count === "number") {
    fileCount = count;
  } else if (count !== undefined && count !== null) {
    const n = toInteger(count);
    if (n === null) io.stderr(`WARN: Ignored count ${JSON.stringify(count)}\n`);
    else fileCount = n;
  }

  return {
    students: records(doc.students).map((r) => ({ id: r.id, name: r.name })),
    seats: Array.isArray(doc.seats) ? records(doc.seats).map((r) => ({ id: r.id, row: r.row, col: r.col })) : undefined,
    restrictions: records(doc.restrictions).map((r) => ({
      studentId: r.studentId,
      rows: toRowCol(r.rows),
      cols: toRowCol(r.cols),
    })),
    shortcuts,
    relations: records(doc.relations).map((r) => ({ studentA: r.studentA, studentB: r.studentB, kind: r.kind })),
    count: fileCount,
    seed: typeof seed === "string" || typeof seed === "number" ? seed : undefined,
  };
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      count: { type: "string" },
      seed: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export function runCli(argv: string[], io: CliIO = defaultIO): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    io.stderr(`${describeError(e)}\n${USAGE}\n`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }
  if (positionals.length !== 1) {
    io.stderr(`${USAGE}\n`);
    return 2;
  }

  let count: number | undefined;
  if (values.count !== undefined) {
    const n = toInteger(values.count);
    if (n === null) {
      io.stderr(`--count must be an integer, got "${values.count}"\n`);
      return 2;
    }
    count = n;
  }

  let doc: unknown;
  try {
    doc = JSON.parse(io.readFile(positionals[0]));
  } catch (e) {
    io.stderr(`Could not read ${positionals[0]}: ${describeError(e)}\n`);
    return 1;
  }

  const request = toSeatingRequest(doc, io);
  if (!request) {
    io.stderr(`${positionals[0]}: expected a JSON object with a "students" array\n`);
    return 1;
  }
  if (count !== undefined) request.count = count;
  if (values.seed !== undefined) request.seed = values.seed;

  const result = generateSeatingPlans(request);
  for (const e of result.errors) io.stderr(`${e.type.toUpperCase()}: ${e.message}\n`);

  if (values.json) {
    const out = {
      strictness: result.strictness,
      plans: result.plans.map((p) => ({
        id: p.id,
        index: p.index,
        strictness: p.strictness,
        seats: Array.from(p.assignment, ([studentId, seatId]) => ({ studentId, seatId })),
      })),
    };
    io.stdout(`${JSON.stringify(out, null, 2)}\n`);
  } else {
    const { students } = normalizeRoster(request.students);
    const seats = request.seats ? normalizeSeats(request.seats).seats : buildDefaultSeats();
    for (const plan of result.plans) io.stdout(`${generatePlanSummary(plan, students, seats)}\n`);
  }

  return result.plans.length > 0 ? 0 : 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = runCli(process.argv.slice(2));
}
