import type { Cell, HeuristicFn, HeuristicType } from "../../types/types";

export const manhattan = (a: Cell, b: Cell) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);

export const chebyshev = (a: Cell, b: Cell) =>
  Math.max(Math.abs(a.r - b.r), Math.abs(a.c - b.c));

export const euclidean = (a: Cell, b: Cell) => {
  const dr = a.r - b.r;
  const dc = a.c - b.c;
  return Math.sqrt(dr * dr + dc * dc);
};

// All three never exceed the 4-connected step count, so A* stays optimal.
export function buildHeuristic(
  goal: Cell,
  type: HeuristicType | HeuristicFn = "Manhattan"
): (cell: Cell) => number {
  if (typeof type === "function") return (cell: Cell) => type(cell, goal);

  switch (type) {
    case "Chebyshev":
      return (cell: Cell) => chebyshev(cell, goal);
    case "Euclidean":
      return (cell: Cell) => euclidean(cell, goal);
    default:
      return (cell: Cell) => manhattan(cell, goal);
  }
}
