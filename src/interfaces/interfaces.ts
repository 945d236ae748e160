import type { Cell, HeuristicFn, HeuristicType, MapType } from "../types/types";

export interface SearchNode {
  position: Cell;
  g: number;
  h: number;
  f: number;
  predecessor: number | null; // arena index, null for the start node
}

export interface SearchOptions {
  heuristic?: HeuristicType | HeuristicFn;
  maxIterations?: number; // frontier pops
  maxFrontier?: number;
  signal?: AbortSignal;
}

export interface SearchStep {
  current: Cell; // node popped this tick
  g: number;
  f: number;
  nodesExpanded: number;
  frontierSize: number;
}

export interface SearchResult {
  found: boolean;
  path: Cell[];
  cost: number | null;
  nodesExpanded: number;
  staleSkipped: number;
  peakFrontier: number;
  runtimeMs: number;
}

export interface RunConfig {
  rows: number;
  cols: number;
  mapType: MapType;
  density: number; // for Random
  seed: number;
}
