import { InvalidInputError } from "../errors/errors";
import type { Cell, CellState, Grid } from "../types/types";
import { idOf } from "./utils";

export interface GridSize {
  rows: number;
  cols: number;
}

const FREE_CHAR = ".";
const BLOCKED_CHAR = "#";
const PATH_CHAR = "*";

const isCellState = (v: unknown): v is CellState =>
  v === "free" || v === "blocked";

/**
 * Checks that the grid is a non-empty rectangle of known cell states and
 * returns its dimensions.
 */
export function validateGrid(grid: Grid): GridSize {
  if (grid.length === 0) {
    throw new InvalidInputError("grid must have at least one row");
  }
  const rows = grid.length;
  const cols = grid[0].length;
  if (cols === 0) throw new InvalidInputError("grid must have at least one column");
  for (let r = 0; r < rows; r++) {
    const row = grid[r];
    if (row.length !== cols) {
      throw new InvalidInputError(
        `grid is not rectangular: row ${r} has ${row.length} cells, expected ${cols}`
      );
    }
    for (let c = 0; c < cols; c++) {
      if (!isCellState(row[c])) {
        throw new InvalidInputError(`unknown cell state at (${r},${c})`);
      }
    }
  }
  return { rows, cols };
}

export const inBounds = ({ rows, cols }: GridSize, cell: Cell) =>
  cell.r >= 0 && cell.r < rows && cell.c >= 0 && cell.c < cols;

export function assertCell(size: GridSize, cell: Cell, label: string) {
  if (!Number.isInteger(cell.r) || !Number.isInteger(cell.c)) {
    throw new InvalidInputError(`${label} must have integer coordinates`);
  }
  if (!inBounds(size, cell)) {
    throw new InvalidInputError(
      `${label} (${cell.r},${cell.c}) is outside the ${size.rows}x${size.cols} grid`
    );
  }
}

export const isFree = (grid: Grid, cell: Cell) =>
  grid[cell.r][cell.c] === "free";

// "." free, "#" blocked, one string per row
export function parseGrid(lines: readonly string[]): CellState[][] {
  const cells = lines.map((line, r) =>
    Array.from(line, (ch, c): CellState => {
      if (ch === FREE_CHAR) return "free";
      if (ch === BLOCKED_CHAR) return "blocked";
      throw new InvalidInputError(`unexpected character '${ch}' at (${r},${c})`);
    })
  );
  validateGrid(cells);
  return cells;
}

export function formatGrid(grid: Grid, path: readonly Cell[] = []): string[] {
  const { cols } = validateGrid(grid);
  const onPath = new Set(path.map((p) => idOf(cols, p.r, p.c)));
  return grid.map((row, r) =>
    row
      .map((state, c) => {
        if (onPath.has(idOf(cols, r, c))) return PATH_CHAR;
        return state === "blocked" ? BLOCKED_CHAR : FREE_CHAR;
      })
      .join("")
  );
}
