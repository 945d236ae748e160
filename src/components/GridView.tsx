import React, { useMemo } from "react";
import type { Cell, Grid } from "../types/types";
import { map_color_constants } from "../utils/constants";
import { validateGrid } from "../utils/grid";
import { idOf } from "../utils/utils";

const { emptyColor, wallColor, finalPathColor, startGoalColor, endGoalColor } =
  map_color_constants;

type CellKind = "free" | "blocked" | "path" | "start" | "goal";

const kindColor: Record<CellKind, string> = {
  free: emptyColor,
  blocked: wallColor,
  path: finalPathColor,
  start: startGoalColor,
  goal: endGoalColor,
};

export interface GridViewProps {
  grid: Grid;
  path?: readonly Cell[];
  start?: Cell;
  goal?: Cell;
  cellSize?: number; // px
}

export default function GridView({ grid, path = [], start, goal, cellSize = 16 }: GridViewProps) {
  const { rows, cols } = validateGrid(grid);
  const onPath = useMemo(
    () => new Set(path.map((p) => idOf(cols, p.r, p.c))),
    [path, cols]
  );

  const kindOf = (r: number, c: number): CellKind => {
    if (start && start.r === r && start.c === c) return "start";
    if (goal && goal.r === r && goal.c === c) return "goal";
    if (onPath.has(idOf(cols, r, c))) return "path";
    return grid[r][c];
  };

  return (
    <div
      className="grid-view"
      role="grid"
      aria-rowcount={rows}
      aria-colcount={cols}
      style={{
        display: "grid",
        gridTemplateColumns: `repeat(${cols}, ${cellSize}px)`,
        gap: 1,
      }}
    >
      {grid.map((row, r) =>
        row.map((_, c) => {
          const kind = kindOf(r, c);
          return (
            <div
              key={idOf(cols, r, c)}
              role="gridcell"
              data-kind={kind}
              style={{ width: cellSize, height: cellSize, background: kindColor[kind] }}
            />
          );
        })
      )}
    </div>
  );
}
