import type { AlgoKey, Grid, Move, SearchOutcome } from "../types/types";
import type { Board } from "../puzzle/board";

export interface SearchNode {
  board: Board;
  pathCost: number; // moves from start
  parent: number | null; // index into the search's node arena
  heuristic: number; // Manhattan distance, A* only (0 otherwise)
  move: Move | null; // move that produced this node
}

export interface SearchResult {
  algorithm: AlgoKey;
  outcome: SearchOutcome;
  success: boolean;
  solutionPath: Board[]; // start..goal inclusive, empty if not found
  solutionDepth: number; // -1 if not found
  moves: Move[];
  nodesExpanded: number;
  maxFrontierSize: number;
  elapsedMs: number;
  message?: string;
}

export interface SolverConfig {
  depthLimit: number; // DFS only
  shuffleMoves: number;
}

export interface SolvabilityReport {
  solvable: boolean;
  inversions: number;
  blankRowFromBottom: number; // 1-indexed
  reason: string | null;
}

// Body of POST /solve as the app sends it; the server treats it as unknown
export interface SolveRequest {
  board: Grid;
  algorithm: AlgoKey;
}

// JSON payloads exchanged with the /solve endpoint
export interface SolvedPayload {
  success: boolean;
  algorithm: AlgoKey;
  solution_path: Grid[];
  solution_depth: number;
  moves: Move[];
  nodes_expanded: number;
  time_taken: number; // seconds
  max_queue_size?: number;
  max_stack_size?: number;
  message?: string;
}

export interface ErrorPayload {
  success: false;
  error: string;
  error_type: string;
  algorithm?: string;
  size?: number;
  inversions?: number;
}

export type SolveResponse =
  | { ok: true; payload: SolvedPayload }
  | { ok: false; payload: ErrorPayload };

export interface HealthPayload {
  status: "healthy";
  supported_sizes: string[];
}
