import type { Cell, CellState } from "../../types/types";
import { rngLCG } from "../utils";

const fill = (rows: number, cols: number, state: CellState): CellState[][] =>
  Array.from({ length: rows }, () => Array<CellState>(cols).fill(state));

// ---------- Map Generation ----------
export function generateEmpty(rows: number, cols: number) {
  return fill(rows, cols, "free");
}

// independent coin flip per cell; start and goal are always left open
export function generateRandom(
  rows: number,
  cols: number,
  density: number,
  seed: number,
  start: Cell,
  goal: Cell
) {
  const cells = fill(rows, cols, "free");
  const R = rngLCG(seed);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (R.next().value < density) cells[r][c] = "blocked";
    }
  }
  cells[start.r][start.c] = "free";
  cells[goal.r][goal.c] = "free";
  return cells;
}

// Maze via DFS backtracker
export function generateMaze(rows: number, cols: number, seed: number) {
  const cells = fill(rows, cols, "blocked");
  const R = rngLCG(seed);

  // passages are carved on a lattice of "rooms" at odd coordinates
  const isRoom = (r: number, c: number) =>
    r > 0 && r < rows - 1 && c > 0 && c < cols - 1 && r % 2 === 1 && c % 2 === 1;

  const visited = new Set<string>();
  const stack: Cell[] = [];

  let sr = 1,
    sc = 1;
  if (rows <= 2 || cols <= 2) {
    sr = 0;
    sc = 0;
  }

  stack.push({ r: sr, c: sc });
  visited.add(`${sr},${sc}`);
  cells[sr][sc] = "free";

  const cellDirs: [number, number][] = [
    [2, 0],
    [-2, 0],
    [0, 2],
    [0, -2],
  ];

  while (stack.length) {
    const cur = stack[stack.length - 1];

    // shuffle directions for randomness
    for (let i = cellDirs.length - 1; i > 0; i--) {
      const j = Math.floor(R.next().value * (i + 1));
      [cellDirs[i], cellDirs[j]] = [cellDirs[j], cellDirs[i]];
    }

    let moved = false;

    for (const [dr, dc] of cellDirs) {
      const nr = cur.r + dr;
      const nc = cur.c + dc;
      if (!isRoom(nr, nc)) continue;
      if (visited.has(`${nr},${nc}`)) continue;

      visited.add(`${nr},${nc}`);
      cells[nr][nc] = "free";
      // open the wall between the two rooms
      cells[cur.r + dr / 2][cur.c + dc / 2] = "free";

      stack.push({ r: nr, c: nc });
      moved = true;
      break;
    }

    if (!moved) stack.pop();
  }

  return cells;
}
