export type Cell = { r: number; c: number };

export type PuzzleSize = 2 | 3;

export type Move = "UP" | "DOWN" | "LEFT" | "RIGHT";

export type AlgoKey = "BFS" | "DFS" | "A*";

export type SearchOutcome = "FOUND" | "EXHAUSTED";

// N×N arrangement as it travels over the wire and through the UI
export type Grid = number[][];

export type PuzzleErrorKind =
  | "MalformedBoard"
  | "UnsupportedSize"
  | "UnknownAlgorithm"
  | "BadRequest";
