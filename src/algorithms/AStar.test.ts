import { describe, expect, it } from "vitest";
import { algoAStar, findPath, searchPath } from "./AStar";
import { bfsDistance } from "./BFS";
import {
  ERR,
  InvalidInputError,
  PathfindingError,
  SearchAbortedError,
  SearchLimitError,
} from "../errors/errors";
import type { Cell, Grid, HeuristicType } from "../types/types";
import { parseGrid } from "../utils/grid";
import { generateEmpty, generateRandom } from "../utils/mapGen/mapGen";

const expectValidPath = (grid: Grid, path: Cell[], start: Cell, goal: Cell) => {
  expect(path[0]).toEqual(start);
  expect(path[path.length - 1]).toEqual(goal);
  for (const p of path) expect(grid[p.r][p.c]).toBe("free");
  for (let i = 1; i < path.length; i++) {
    const step = Math.abs(path[i].r - path[i - 1].r) + Math.abs(path[i].c - path[i - 1].c);
    expect(step).toBe(1);
  }
};

// ring around a blocked centre, a blocked column, then an unreachable strip
const ringGrid = parseGrid(["...#.", ".#.#.", "...#."]);

describe("findPath", () => {
  it("follows the tie-break order on an open 3x3 grid", () => {
    const path = findPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 });

    expect(path).toEqual([
      { r: 0, c: 0 },
      { r: 1, c: 0 },
      { r: 2, c: 0 },
      { r: 2, c: 1 },
      { r: 2, c: 2 },
    ]);
  });

  it("returns an empty path when a full wall separates start and goal", () => {
    const grid = parseGrid(["...", "###", "..."]);

    expect(findPath(grid, { r: 0, c: 0 }, { r: 2, c: 2 })).toEqual([]);
  });

  it("routes through the only gap in a wall", () => {
    const grid = parseGrid([".....", "###.#", "....."]);
    const start = { r: 0, c: 0 };
    const goal = { r: 2, c: 0 };

    const path = findPath(grid, start, goal);

    expect(path).toHaveLength(9);
    expect(path).toContainEqual({ r: 1, c: 3 });
    expectValidPath(grid, path, start, goal);
  });

  it("returns the single cell when start equals goal", () => {
    expect(findPath(generateEmpty(3, 3), { r: 1, c: 1 }, { r: 1, c: 1 })).toEqual([
      { r: 1, c: 1 },
    ]);
  });

  it("rejects a start outside the grid", () => {
    expect(() => findPath(generateEmpty(3, 3), { r: -1, c: 0 }, { r: 2, c: 2 })).toThrow(
      InvalidInputError
    );
  });

  it("rejects a goal outside the grid", () => {
    expect(() => findPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 0, c: 3 })).toThrow(
      "goal (0,3) is outside the 3x3 grid"
    );
  });

  it("rejects non-integer coordinates", () => {
    expect(() => findPath(generateEmpty(3, 3), { r: 0.5, c: 0 }, { r: 2, c: 2 })).toThrow(
      "start must have integer coordinates"
    );
  });

  it("rejects empty and ragged grids", () => {
    expect(() => findPath([], { r: 0, c: 0 }, { r: 0, c: 0 })).toThrow(InvalidInputError);
    expect(() => findPath([[]], { r: 0, c: 0 }, { r: 0, c: 0 })).toThrow(InvalidInputError);
    expect(() =>
      findPath([["free", "free"], ["free"]], { r: 0, c: 0 }, { r: 1, c: 0 })
    ).toThrow("grid is not rectangular: row 1 has 1 cells, expected 2");
  });

  it("reports no path for a blocked start or goal", () => {
    const grid = parseGrid(["#..", "...", "..#"]);

    expect(findPath(grid, { r: 0, c: 0 }, { r: 1, c: 1 })).toEqual([]);
    expect(findPath(grid, { r: 1, c: 1 }, { r: 2, c: 2 })).toEqual([]);
    expect(findPath(grid, { r: 0, c: 0 }, { r: 0, c: 0 })).toEqual([]);
  });

  it("carries error codes on thrown errors", () => {
    try {
      findPath(generateEmpty(2, 2), { r: 5, c: 5 }, { r: 0, c: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PathfindingError);
      expect(err).toMatchObject({ code: ERR.INVALID_INPUT, name: "InvalidInputError" });
    }
  });

  it("matches the BFS distance on seeded random maps", () => {
    const start = { r: 0, c: 0 };
    const goal = { r: 11, c: 14 };
    let reachable = 0;

    for (let seed = 1; seed <= 30; seed++) {
      const grid = generateRandom(12, 15, 0.3, seed, start, goal);
      const path = findPath(grid, start, goal);
      const expected = bfsDistance(grid, start, goal);

      if (expected === null) {
        expect(path).toEqual([]);
        continue;
      }
      reachable++;
      expect(path.length - 1).toBe(expected);
      expectValidPath(grid, path, start, goal);
      expect(findPath(grid, start, goal)).toEqual(path);
    }
    expect(reachable).toBeGreaterThan(0);
  });

  it.each<HeuristicType>(["Manhattan", "Chebyshev", "Euclidean"])(
    "stays optimal with the %s heuristic",
    (heuristic) => {
      const start = { r: 0, c: 0 };
      const goal = { r: 9, c: 9 };
      for (let seed = 100; seed < 110; seed++) {
        const grid = generateRandom(10, 10, 0.25, seed, start, goal);
        const expected = bfsDistance(grid, start, goal);
        expect(searchPath(grid, start, goal, { heuristic }).cost).toBe(expected);
      }
    }
  );
});

describe("searchPath", () => {
  it("reports statistics for a found path", () => {
    const result = searchPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 });

    expect(result.found).toBe(true);
    expect(result.cost).toBe(4);
    expect(result.nodesExpanded).toBe(5);
    expect(result.staleSkipped).toBe(0);
    expect(result.runtimeMs).toBeGreaterThanOrEqual(0);
  });

  it("relaxes a queued node in place when a cheaper route appears", () => {
    // (0,1) looks expensive, so the long way round reaches (0,2) first
    const heuristic = (cell: Cell) =>
      cell.r === 0 && cell.c === 1 ? 10 : cell.r === 0 && cell.c === 2 ? 50 : 0;
    const grid = parseGrid(["...", ".#.", "..."]);

    const result = searchPath(grid, { r: 0, c: 0 }, { r: 0, c: 2 }, { heuristic });

    expect(result.path).toEqual([
      { r: 0, c: 0 },
      { r: 0, c: 1 },
      { r: 0, c: 2 },
    ]);
    expect(result.cost).toBe(2);
    expect(result.nodesExpanded).toBe(8);
  });

  it("skips superseded frontier entries once a position is finalized", () => {
    const heuristic = (cell: Cell) =>
      cell.r === 0 && cell.c === 1 ? 10 : cell.r === 0 && cell.c === 2 ? 50 : 0;

    const result = searchPath(ringGrid, { r: 0, c: 0 }, { r: 1, c: 4 }, { heuristic });

    expect(result.found).toBe(false);
    expect(result.cost).toBeNull();
    expect(result.nodesExpanded).toBe(8);
    expect(result.staleSkipped).toBe(1);
  });

  it("throws when the iteration budget is exceeded", () => {
    const grid = generateEmpty(3, 3);

    expect(() =>
      searchPath(grid, { r: 0, c: 0 }, { r: 2, c: 2 }, { maxIterations: 3 })
    ).toThrow(SearchLimitError);
    expect(searchPath(grid, { r: 0, c: 0 }, { r: 2, c: 2 }, { maxIterations: 5 }).found).toBe(
      true
    );
  });

  it("throws when the frontier grows past its cap", () => {
    expect(() =>
      searchPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 }, { maxFrontier: 1 })
    ).toThrow("search exceeded maxFrontier (1)");
  });

  it("rejects non-positive limits", () => {
    expect(() =>
      searchPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 }, { maxIterations: 0 })
    ).toThrow("maxIterations must be a positive integer");
  });

  it("stops when the signal is already aborted", () => {
    const controller = new AbortController();
    controller.abort();

    expect(() =>
      searchPath(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 }, { signal: controller.signal })
    ).toThrow(SearchAbortedError);
  });
});

describe("algoAStar", () => {
  it("yields one step per expansion and returns the result", () => {
    const gen = algoAStar(generateEmpty(3, 3), { r: 0, c: 0 }, { r: 2, c: 2 });
    const visited: Cell[] = [];

    let step = gen.next();
    while (!step.done) {
      visited.push(step.value.current);
      step = gen.next();
    }

    expect(visited).toEqual([
      { r: 0, c: 0 },
      { r: 1, c: 0 },
      { r: 2, c: 0 },
      { r: 2, c: 1 },
      { r: 2, c: 2 },
    ]);
    expect(step.value.path).toHaveLength(5);
  });

  it("validates input before the first step", () => {
    expect(() => algoAStar(generateEmpty(2, 2), { r: 2, c: 0 }, { r: 0, c: 0 })).toThrow(
      InvalidInputError
    );
  });

  it("can be cancelled between steps", () => {
    const controller = new AbortController();
    const gen = algoAStar(
      generateEmpty(3, 3),
      { r: 0, c: 0 },
      { r: 2, c: 2 },
      { signal: controller.signal }
    );

    expect(gen.next().done).toBe(false);
    controller.abort();

    expect(() => gen.next()).toThrow("search aborted after 1 expansions");
  });
});
