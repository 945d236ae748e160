import { SearchAbortedError, SearchLimitError, InvalidInputError } from "../errors/errors";
import type {
  SearchNode,
  SearchOptions,
  SearchResult,
  SearchStep,
} from "../interfaces/interfaces";
import type { Cell, Grid } from "../types/types";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { assertCell, isFree, validateGrid, type GridSize } from "../utils/grid";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { idOf, neighbors, sameCell } from "../utils/utils";

// One frontier entry per push; a position may have several, only the first pop counts.
interface FrontierEntry {
  f: number;
  h: number;
  seq: number;
  index: number; // arena index
}

// lowest f, then lowest h, then earliest insertion
const frontierLess = (a: FrontierEntry, b: FrontierEntry) =>
  a.f !== b.f ? a.f < b.f : a.h !== b.h ? a.h < b.h : a.seq < b.seq;

function checkLimit(value: number | undefined, name: string) {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidInputError(`${name} must be a positive integer`);
  }
}

function reconstructPath(arena: readonly SearchNode[], index: number): Cell[] {
  const path: Cell[] = [];
  let cur: number | null = index;
  while (cur !== null) {
    const node: SearchNode = arena[cur];
    path.push({ ...node.position });
    cur = node.predecessor;
  }
  return path.reverse();
}

/**
 * A* over a 4-connected unit-cost grid, one snapshot per expansion.
 *
 * Input is validated eagerly, before the generator is handed back. A blocked
 * start or goal is not an error: the search finishes with no path.
 */
export function algoAStar(
  grid: Grid,
  start: Cell,
  goal: Cell,
  options: SearchOptions = {}
): Generator<SearchStep, SearchResult, void> {
  const size = validateGrid(grid);
  assertCell(size, start, "start");
  assertCell(size, goal, "goal");
  checkLimit(options.maxIterations, "maxIterations");
  checkLimit(options.maxFrontier, "maxFrontier");
  return runAStar(grid, size, start, goal, options);
}

function* runAStar(
  grid: Grid,
  { rows, cols }: GridSize,
  start: Cell,
  goal: Cell,
  options: SearchOptions
): Generator<SearchStep, SearchResult, void> {
  const begin = performance.now();
  const meta = { nodesExpanded: 0, staleSkipped: 0, peakFrontier: 0 };
  const finish = (path: Cell[]): SearchResult => ({
    found: path.length > 0,
    path,
    cost: path.length ? path.length - 1 : null,
    ...meta,
    runtimeMs: performance.now() - begin,
  });

  if (!isFree(grid, start) || !isFree(grid, goal)) return finish([]);
  if (sameCell(start, goal)) return finish([{ ...start }]);

  const heuristic = buildHeuristic(goal, options.heuristic);
  const arena: SearchNode[] = [];
  const registry = new Map<number, number>(); // position id -> arena index
  const finalized = new Uint8Array(rows * cols);
  const heap = new MinHeap<FrontierEntry>(frontierLess);
  let seq = 0;

  const h0 = heuristic(start);
  arena.push({ position: { ...start }, g: 0, h: h0, f: h0, predecessor: null });
  registry.set(idOf(cols, start.r, start.c), 0);
  heap.push({ f: h0, h: h0, seq: seq++, index: 0 });
  meta.peakFrontier = 1;

  let iterations = 0;
  while (heap.size()) {
    if (options.signal?.aborted) {
      throw new SearchAbortedError(meta.nodesExpanded);
    }
    if (options.maxIterations !== undefined && ++iterations > options.maxIterations) {
      throw new SearchLimitError("maxIterations", options.maxIterations);
    }

    const entry = heap.pop();
    if (!entry) break;
    const current = arena[entry.index];
    const curId = idOf(cols, current.position.r, current.position.c);
    if (finalized[curId]) {
      meta.staleSkipped++;
      continue;
    }
    finalized[curId] = 1;
    meta.nodesExpanded++;

    yield {
      current: { ...current.position },
      g: current.g,
      f: current.f,
      nodesExpanded: meta.nodesExpanded,
      frontierSize: heap.size(),
    };

    if (sameCell(current.position, goal)) {
      return finish(reconstructPath(arena, entry.index));
    }

    for (const m of neighbors(rows, cols, current.position)) {
      if (!isFree(grid, m)) continue;
      const mId = idOf(cols, m.r, m.c);
      if (finalized[mId]) continue;

      const tentative = current.g + 1;
      let index = registry.get(mId);
      if (index === undefined) {
        const h = heuristic(m);
        index = arena.length;
        arena.push({ position: m, g: tentative, h, f: tentative + h, predecessor: entry.index });
        registry.set(mId, index);
      } else {
        const known = arena[index];
        if (tentative >= known.g) continue;
        known.g = tentative;
        known.h = heuristic(m);
        known.f = tentative + known.h;
        known.predecessor = entry.index;
      }

      const node = arena[index];
      heap.push({ f: node.f, h: node.h, seq: seq++, index });
      if (options.maxFrontier !== undefined && heap.size() > options.maxFrontier) {
        throw new SearchLimitError("maxFrontier", options.maxFrontier);
      }
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, heap.size());
  }

  return finish([]);
}

/** Runs the search to completion and reports statistics alongside the path. */
export function searchPath(
  grid: Grid,
  start: Cell,
  goal: Cell,
  options?: SearchOptions
): SearchResult {
  const gen = algoAStar(grid, start, goal, options);
  let step = gen.next();
  while (!step.done) step = gen.next();
  return step.value;
}

/**
 * Shortest 4-connected path from `start` to `goal`, both included.
 * Returns `[]` when the goal cannot be reached.
 */
export function findPath(
  grid: Grid,
  start: Cell,
  goal: Cell,
  options?: SearchOptions
): Cell[] {
  return searchPath(grid, start, goal, options).path;
}
