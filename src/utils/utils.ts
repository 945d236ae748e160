import type { Cell, CellState } from "../types/types";

export const idOf = (cols: number, r: number, c: number) => r * cols + c;
export const rcOf = (cols: number, id: number): Cell => ({
  r: Math.floor(id / cols),
  c: id % cols,
});

export const sameCell = (a: Cell, b: Cell) => a.r === b.r && a.c === b.c;

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// down, up, right, left; expansion order is part of the tie-break contract
export const DELTAS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

// In-bounds orthogonal neighbours of a cell
export function neighbors(rows: number, cols: number, cell: Cell): Cell[] {
  const out: Cell[] = [];
  for (const [dr, dc] of DELTAS) {
    const nr = cell.r + dr,
      nc = cell.c + dc;
    if (nr >= 0 && nr < rows && nc >= 0 && nc < cols) out.push({ r: nr, c: nc });
  }
  return out;
}

export function carvePathToGoal(
  cells: CellState[][],
  start: Cell,
  goal: Cell
) {
  const rows = cells.length;
  const cols = rows ? cells[0].length : 0;
  if (!rows || !cols) return;
  // BFS that ignores walls, then we open a path along the found route
  const prev = new Int32Array(rows * cols).fill(-1);
  const startId = idOf(cols, start.r, start.c);
  const goalId = idOf(cols, goal.r, goal.c);
  const q: number[] = [startId];
  prev[startId] = startId;

  for (let head = 0; head < q.length; head++) {
    const v = q[head];
    if (v === goalId) break;
    for (const nb of neighbors(rows, cols, rcOf(cols, v))) {
      const id = idOf(cols, nb.r, nb.c);
      if (prev[id] !== -1) continue;
      prev[id] = v;
      q.push(id);
    }
  }

  if (prev[goalId] === -1) return;

  let cur = goalId;
  while (cur !== startId) {
    const { r, c } = rcOf(cols, cur);
    cells[r][c] = "free";
    cur = prev[cur];
  }
  cells[start.r][start.c] = "free";
}
