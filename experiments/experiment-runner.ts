// experiments/experiment-runner.ts
//
// Offline experiments for the grid path finder.
// Runs A* with each heuristic on many empty/random/maze maps, checks every
// path against the BFS baseline and writes a CSV with timings, expansions,
// frontier size, path length and optimality.
//
// Run with:
//   npm run experiments
//
// EXPERIMENT_TRIALS and EXPERIMENT_OUTPUT override the trial count and CSV path.

import { writeFileSync } from "fs";
import { searchPath } from "../src/algorithms/AStar";
import { bfsDistance } from "../src/algorithms/BFS";
import type { RunConfig, SearchResult } from "../src/interfaces/interfaces";
import type { Cell, CellState, HeuristicType, MapType } from "../src/types/types";
import { generateEmpty, generateMaze, generateRandom } from "../src/utils/mapGen/mapGen";
import { carvePathToGoal } from "../src/utils/utils";

// ---------- Experiment parameters ----------
const OUTPUT_CSV = process.env.EXPERIMENT_OUTPUT ?? "experiments/results.csv";

// how many seeds per configuration
const NUM_TRIALS = Number(process.env.EXPERIMENT_TRIALS ?? 20);

// grid sizes to test (rows x cols)
const SIZES: [number, number][] = [
  [32, 32],
  [64, 64],
  [48, 96],
];

const MAP_TYPES: MapType[] = ["Empty", "Random", "Maze"];

// densities for Random maps
const DENSITIES = [0.2, 0.35];

const HEURISTICS: HeuristicType[] = ["Manhattan", "Chebyshev", "Euclidean"];

interface TrialRow {
  config: RunConfig;
  heuristic: HeuristicType;
  result: SearchResult;
  baseline: number | null;
}

// ---------- Map building ----------
function buildMap(config: RunConfig): { cells: CellState[][]; start: Cell; goal: Cell } {
  const { rows, cols, mapType, density, seed } = config;
  const start: Cell = { r: 0, c: 0 };
  const goal: Cell = { r: rows - 1, c: cols - 1 };

  if (mapType === "Empty") return { cells: generateEmpty(rows, cols), start, goal };

  if (mapType === "Random") {
    let cells = generateRandom(rows, cols, density, seed, start, goal);
    for (let attempt = 1; attempt < 30 && bfsDistance(cells, start, goal) === null; attempt++) {
      cells = generateRandom(rows, cols, density, seed + attempt, start, goal);
    }
    if (bfsDistance(cells, start, goal) === null) carvePathToGoal(cells, start, goal);
    return { cells, start, goal };
  }

  // first and last open rooms of the maze
  const cells = generateMaze(rows, cols, seed);
  const open: Cell[] = [];
  cells.forEach((row, r) =>
    row.forEach((state, c) => {
      if (state === "free") open.push({ r, c });
    })
  );
  if (open.length >= 2) return { cells, start: open[0], goal: open[open.length - 1] };
  cells[start.r][start.c] = "free";
  cells[goal.r][goal.c] = "free";
  carvePathToGoal(cells, start, goal);
  return { cells, start, goal };
}

function runTrial(config: RunConfig): TrialRow[] {
  const { cells, start, goal } = buildMap(config);
  const baseline = bfsDistance(cells, start, goal);
  return HEURISTICS.map((heuristic) => ({
    config,
    heuristic,
    result: searchPath(cells, start, goal, { heuristic }),
    baseline,
  }));
}

const toCsv = (trial: number, { config, heuristic, result, baseline }: TrialRow) =>
  [
    trial.toString(),
    config.rows.toString(),
    config.cols.toString(),
    config.mapType,
    config.density.toString(),
    config.seed.toString(),
    heuristic,
    result.runtimeMs.toFixed(4),
    result.nodesExpanded.toString(),
    result.staleSkipped.toString(),
    result.peakFrontier.toString(),
    result.cost == null ? "" : result.cost.toString(),
    result.found ? "1" : "0",
    baseline == null ? "" : result.cost === baseline ? "1" : "0",
  ].join(",");

// ---------- Main experiment loop ----------
function main() {
  const rows: string[] = [
    [
      "trial",
      "rows",
      "cols",
      "mapType",
      "density",
      "seed",
      "heuristic",
      "runtimeMs",
      "nodesExpanded",
      "staleSkipped",
      "peakFrontier",
      "pathCost",
      "found",
      "optimal",
    ].join(","),
  ];

  let trialIndex = 0;
  let suboptimal = 0;

  for (const [r, c] of SIZES) {
    for (const mapType of MAP_TYPES) {
      for (const density of mapType === "Random" ? DENSITIES : [0]) {
        for (let t = 0; t < NUM_TRIALS; t++) {
          const config: RunConfig = { rows: r, cols: c, mapType, density, seed: 1000 * trialIndex + t };
          for (const row of runTrial(config)) {
            if (row.baseline !== row.result.cost) suboptimal++;
            rows.push(toCsv(trialIndex, row));
          }
          trialIndex++;
          console.log(
            `Done trial ${trialIndex} :: ${r}x${c}, map=${mapType}, density=${density}, seed=${config.seed}`
          );
        }
      }
    }
  }

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\nWrote ${rows.length - 1} rows to ${OUTPUT_CSV}`);
  if (suboptimal > 0) {
    console.error(`${suboptimal} runs disagreed with the BFS baseline`);
    process.exitCode = 1;
  }
}

main();
