import type { ConstraintsMap, ID, Seat } from '../seatingAlgorithm.engine';

/** Independent check of a finished assignment, computed from seat geometry. */
export function findViolations(
  assignment: ReadonlyMap<ID, ID>,
  seats: readonly Seat[],
  constraints: ConstraintsMap,
  strict: boolean,
): string[] {
  const byId = new Map(seats.map((s) => [s.id, s]));
  const seatOf = (sid: ID): Seat | undefined => {
    const seatId = assignment.get(sid);
    return seatId === undefined ? undefined : byId.get(seatId);
  };
  const out: string[] = [];
  const used = new Set<ID>();

  for (const [sid, seatId] of assignment) {
    if (used.has(seatId)) out.push(`seat ${seatId} used twice`);
    used.add(seatId);
    const seat = byId.get(seatId);
    if (!seat) {
      out.push(`student ${sid} on unknown seat ${seatId}`);
      continue;
    }
    const sc = constraints.get(sid);
    if (!sc) continue;
    if (sc.allowedRows && !sc.allowedRows.has(seat.row)) out.push(`student ${sid} in row ${seat.row}`);
    if (sc.allowedCols && !sc.allowedCols.has(seat.col)) out.push(`student ${sid} in col ${seat.col}`);

    for (const other of sc.mustBeAdjacentTo) {
      const os = seatOf(other);
      if (os && !(os.row === seat.row && Math.abs(os.col - seat.col) === 1)) {
        out.push(`students ${sid} and ${other} not side by side`);
      }
    }
    for (const other of sc.mustNotAdjacentTo) {
      const os = seatOf(other);
      if (!os) continue;
      const dr = Math.abs(os.row - seat.row);
      const dc = Math.abs(os.col - seat.col);
      const near = strict ? dr <= 1 && dc <= 1 : dr === 0 && dc === 1;
      if (near) out.push(`students ${sid} and ${other} too close`);
    }
  }
  return out;
}

export const seat = (id: ID, row: number, col: number): Seat => ({ id, row, col });
