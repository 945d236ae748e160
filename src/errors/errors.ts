export const ERR = {
  INVALID_INPUT: 1001,
  SEARCH_LIMIT: 1002,
  SEARCH_ABORTED: 1003,
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export class PathfindingError extends Error {
  constructor(public code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends PathfindingError {
  constructor(message: string) {
    super(ERR.INVALID_INPUT, message);
  }
}

export class SearchLimitError extends PathfindingError {
  constructor(
    public limit: "maxIterations" | "maxFrontier",
    public value: number
  ) {
    super(ERR.SEARCH_LIMIT, `search exceeded ${limit} (${value})`);
  }
}

export class SearchAbortedError extends PathfindingError {
  constructor(public nodesExpanded: number) {
    super(ERR.SEARCH_ABORTED, `search aborted after ${nodesExpanded} expansions`);
  }
}
