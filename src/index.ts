export { algoAStar, findPath, searchPath } from "./algorithms/AStar";
export { bfsDistance, bfsPath } from "./algorithms/BFS";
export { default as GridView } from "./components/GridView";
export type { GridViewProps } from "./components/GridView";
export {
  ERR,
  InvalidInputError,
  PathfindingError,
  SearchAbortedError,
  SearchLimitError,
} from "./errors/errors";
export type { ErrorCode } from "./errors/errors";
export type {
  RunConfig,
  SearchNode,
  SearchOptions,
  SearchResult,
  SearchStep,
} from "./interfaces/interfaces";
export type {
  Cell,
  CellState,
  Grid,
  HeuristicFn,
  HeuristicType,
  MapType,
} from "./types/types";
export { formatGrid, parseGrid, validateGrid } from "./utils/grid";
export {
  buildHeuristic,
  chebyshev,
  euclidean,
  manhattan,
} from "./utils/heuristic/buildHeuristic";
export { generateEmpty, generateMaze, generateRandom } from "./utils/mapGen/mapGen";
