/**
 * Utility functions for seat layouts
 */

import type { ID, Seat, ValidationError } from "./seatingAlgorithm.engine";
import { toInteger } from "./ids";

export interface SeatInput {
  id?: unknown;
  row: unknown;
  col: unknown;
}

/**
 * Default classroom: a 6 x 6 grid (ids 1-36, row-major) with one extra seat
 * behind column 2 (id 37, row 7).
 */
export function buildDefaultSeats(): Seat[] {
  const seats = buildGridSeats(6, 6);
  seats.push({ id: seats.length + 1, row: 7, col: 2 });
  return seats;
}

export function buildGridSeats(rows: number, cols: number): Seat[] {
  const seats: Seat[] = [];
  let id = 1;
  for (let r = 1; r <= rows; r++) {
    for (let c = 1; c <= cols; c++) {
      seats.push({ id: id++, row: r, col: c });
    }
  }
  return seats;
}

/**
 * Validate raw seat records. A record without an id takes the lowest positive id
 * no other record claims, so in a list without explicit ids ids follow list order.
 */
export function normalizeSeats(raw: readonly SeatInput[]): { seats: Seat[]; errors: ValidationError[] } {
  const seats: Seat[] = [];
  const errors: ValidationError[] = [];
  const ids = new Set<ID>();
  const positions = new Set<string>();
  const claimed = new Set<ID>();
  for (const s of raw) {
    const id = toInteger(s.id);
    if (id !== null) claimed.add(id);
  }
  let nextFree = 1;

  raw.forEach((s, i) => {
    let id: ID | null;
    if (s.id === undefined || s.id === null) {
      while (claimed.has(nextFree)) nextFree++;
      id = nextFree;
      claimed.add(id);
    } else {
      id = toInteger(s.id);
    }
    const row = toInteger(s.row);
    const col = toInteger(s.col);
    if (id === null || id < 1 || row === null || row < 1 || col === null || col < 1) {
      errors.push({
        kind: "invalid_seat",
        message: `Seat #${i + 1} needs a positive integer id, row and column`,
        details: { seat: s },
      });
      return;
    }
    if (ids.has(id)) {
      errors.push({ kind: "duplicate_seat", message: `Duplicate seat id: ${id}`, details: { id } });
      return;
    }
    const pos = `${row}:${col}`;
    if (positions.has(pos)) {
      errors.push({
        kind: "duplicate_seat",
        message: `Two seats share row ${row}, column ${col}`,
        details: { id, row, col },
      });
      return;
    }
    ids.add(id);
    positions.add(pos);
    seats.push({ id, row, col });
  });

  return { seats, errors };
}

export function getLayoutBounds(seats: readonly Seat[]): { maxRow: number; maxCol: number } {
  return {
    maxRow: Math.max(0, ...seats.map((s) => s.row)),
    maxCol: Math.max(0, ...seats.map((s) => s.col)),
  };
}

/** Longest stretch of consecutive columns occupied by seats within a single row. */
export function longestRowRun(seats: readonly Seat[]): number {
  const colsByRow = new Map<number, number[]>();
  for (const s of seats) {
    const cols = colsByRow.get(s.row) ?? [];
    cols.push(s.col);
    colsByRow.set(s.row, cols);
  }

  let best = 0;
  for (const cols of colsByRow.values()) {
    cols.sort((a, b) => a - b);
    let run = 0;
    for (let i = 0; i < cols.length; i++) {
      run = i > 0 && cols[i] === cols[i - 1] + 1 ? run + 1 : 1;
      best = Math.max(best, run);
    }
  }
  return best;
}
