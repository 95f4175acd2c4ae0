import type {
  ErrorPayload,
  SearchResult,
  SolvedPayload,
  SolveResponse,
  SolverConfig,
} from "../interfaces/interfaces";
import type { AlgoKey } from "../types/types";
import { runAStar } from "../algorithms/AStar";
import { runBFS } from "../algorithms/BFS";
import { runDFS } from "../algorithms/DFS";
import { resolveSolverConfig } from "../config";
import { Board } from "../puzzle/board";
import { isPuzzleError, PuzzleError } from "../puzzle/errors";
import { checkSolvability } from "../puzzle/solvability";
import { parseAlgorithm } from "../puzzle/validate";

// Runs one engine to completion. No solvability check here.
export function solve(
  start: Board,
  algorithm: AlgoKey,
  config: SolverConfig = resolveSolverConfig()
): SearchResult {
  switch (algorithm) {
    case "BFS":
      return runBFS(start);
    case "DFS":
      return runDFS(start, config.depthLimit);
    case "A*":
      return runAStar(start);
  }
}

const toSeconds = (ms: number) => Math.round(ms * 10) / 10000;

export function toPayload(result: SearchResult): SolvedPayload {
  const frontier =
    result.algorithm === "DFS"
      ? { max_stack_size: result.maxFrontierSize }
      : { max_queue_size: result.maxFrontierSize };
  return {
    success: result.success,
    algorithm: result.algorithm,
    solution_path: result.solutionPath.map((b) => b.toGrid()),
    solution_depth: result.solutionDepth,
    moves: result.moves,
    nodes_expanded: result.nodesExpanded,
    time_taken: toSeconds(result.elapsedMs),
    ...frontier,
    ...(result.message ? { message: result.message } : {}),
  };
}

export function errorPayload(e: PuzzleError): ErrorPayload {
  return {
    success: false,
    error: e.message,
    error_type: e.kind,
    ...e.details,
  };
}

function parseRequest(request: unknown): { board: Board; algorithm: AlgoKey } {
  if (typeof request !== "object" || request === null || Array.isArray(request)) {
    throw new PuzzleError("BadRequest", "Request body must be a JSON object.");
  }
  if (!("board" in request)) {
    throw new PuzzleError("BadRequest", "Request body is missing `board`.");
  }
  const board = Board.fromGrid(request.board);
  const algorithm = parseAlgorithm("algorithm" in request ? request.algorithm : undefined);
  return { board, algorithm };
}

/**
 * Request-level entry: validate, check parity, search, serialize.
 * Unsolvable boards come back as an error payload and are never searched.
 */
export function solvePuzzle(
  request: unknown,
  config: SolverConfig = resolveSolverConfig()
): SolveResponse {
  let parsed: { board: Board; algorithm: AlgoKey };
  try {
    parsed = parseRequest(request);
  } catch (e) {
    if (isPuzzleError(e)) return { ok: false, payload: errorPayload(e) };
    throw e;
  }
  const { board, algorithm } = parsed;

  const report = checkSolvability(board);
  if (!report.solvable) {
    return {
      ok: false,
      payload: {
        success: false,
        error: report.reason ?? "This puzzle configuration is not solvable.",
        error_type: "Unsolvable",
        algorithm,
        size: board.size,
        inversions: report.inversions,
      },
    };
  }
  return { ok: true, payload: toPayload(solve(board, algorithm, config)) };
}
