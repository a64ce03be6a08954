import type { ID, Seat } from "./seatingAlgorithm.engine";
import { getLayoutBounds } from "./layout";

/** null = no seat at that position, "" = seat left empty. */
export type SeatCell = string | null;

export function formatSeatLabel(studentId: ID, name: string | undefined): string {
  return `${studentId} ${name ?? ""}`.trim();
}

/**
 * Project an assignment onto a row x column matrix (row 1 first), one cell per
 * position of the layout's bounding box.
 */
export function buildSeatGrid(
  assignment: ReadonlyMap<ID, ID>,
  seats: readonly Seat[],
  names: ReadonlyMap<ID, string>,
): SeatCell[][] {
  const { maxRow, maxCol } = getLayoutBounds(seats);
  const grid: SeatCell[][] = Array.from({ length: maxRow }, () => Array<SeatCell>(maxCol).fill(null));
  const seatById = new Map(seats.map((s) => [s.id, s]));

  for (const s of seats) grid[s.row - 1][s.col - 1] = "";
  for (const [sid, seatId] of assignment) {
    const seat = seatById.get(seatId);
    if (seat) grid[seat.row - 1][seat.col - 1] = formatSeatLabel(sid, names.get(sid));
  }
  return grid;
}

