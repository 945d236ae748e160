import type { Cell, Grid } from "../types/types";
import { assertCell, isFree, validateGrid } from "../utils/grid";
import { idOf, neighbors, rcOf } from "../utils/utils";

// Unweighted baseline: the first time BFS reaches the goal is a shortest route.
export function bfsPath(grid: Grid, start: Cell, goal: Cell): Cell[] {
  const size = validateGrid(grid);
  const { rows, cols } = size;
  assertCell(size, start, "start");
  assertCell(size, goal, "goal");
  if (!isFree(grid, start) || !isFree(grid, goal)) return [];

  const startId = idOf(cols, start.r, start.c);
  const goalId = idOf(cols, goal.r, goal.c);
  const parents = new Int32Array(rows * cols).fill(-1);
  parents[startId] = startId;
  const openQ: number[] = [startId];

  for (let head = 0; head < openQ.length; head++) {
    const n = openQ[head];
    if (n === goalId) {
      const path: Cell[] = [];
      let cur = goalId;
      while (cur !== startId) {
        path.push(rcOf(cols, cur));
        cur = parents[cur];
      }
      path.push(rcOf(cols, startId));
      return path.reverse();
    }
    for (const m of neighbors(rows, cols, rcOf(cols, n))) {
      const mId = idOf(cols, m.r, m.c);
      if (parents[mId] !== -1 || !isFree(grid, m)) continue;
      parents[mId] = n;
      openQ.push(mId);
    }
  }
  return [];
}

/** Shortest step count, or null when unreachable. */
export function bfsDistance(grid: Grid, start: Cell, goal: Cell): number | null {
  const path = bfsPath(grid, start, goal);
  return path.length ? path.length - 1 : null;
}
