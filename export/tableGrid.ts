// ─────────────────────────────────────────────────────────────
// Table Grid — Lay out the rendered units of one table
// ─────────────────────────────────────────────────────────────

import { RenderedUnit } from "../schema/templateSchema";

export interface TableRun {
  rows: RenderedUnit[][];          // ordered by row, cells ordered by column
  next: number;                    // first unit after the table
}

/**
 * Collect the consecutive units of the table starting at `start`.
 * A unit whose cell is already taken moves down to the next free row,
 * so a repeatable slot adds rows instead of piling into one.
 */
export function collectTableRun(units: readonly RenderedUnit[], start: number): TableRun {
  const tableIndex = units[start]?.style?.table?.tableIndex;
  const grid = new Map<number, Map<number, RenderedUnit>>();
  let i = start;

  while (i < units.length) {
    const table = units[i].style?.table;
    if (!table || table.tableIndex !== tableIndex) break;
    let row = table.row;
    while (grid.get(row)?.has(table.column)) row++;
    const cells = grid.get(row) ?? new Map<number, RenderedUnit>();
    cells.set(table.column, units[i]);
    grid.set(row, cells);
    i++;
  }

  const rows = [...grid.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, cells]) => [...cells.entries()].sort(([a], [b]) => a - b).map(([, unit]) => unit));
  return { rows, next: i };
}
