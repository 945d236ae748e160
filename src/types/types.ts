export type Cell = { r: number; c: number };

export type CellState = "free" | "blocked";

export type Grid = ReadonlyArray<ReadonlyArray<CellState>>;

export type MapType = "Empty" | "Random" | "Maze";

export type HeuristicType = "Manhattan" | "Chebyshev" | "Euclidean";

export type HeuristicFn = (cell: Cell, goal: Cell) => number;
