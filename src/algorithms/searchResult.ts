import type { SearchNode, SearchResult } from "../interfaces/interfaces";
import type { AlgoKey } from "../types/types";
import type { Board } from "../puzzle/board";
import { boardsOf, reconstructPath } from "../utils/utils";

export interface SearchMeta {
  nodesExpanded: number;
  peakFrontier: number;
}

export const startNode = (board: Board, heuristic = 0): SearchNode => ({
  board,
  pathCost: 0,
  parent: null,
  heuristic,
  move: null,
});

export function foundResult(
  algorithm: AlgoKey,
  nodes: SearchNode[],
  goal: number,
  meta: SearchMeta,
  begin: number
): SearchResult {
  const path = reconstructPath(nodes, goal);
  const result: SearchResult = {
    algorithm,
    outcome: "FOUND",
    success: true,
    solutionPath: boardsOf(path),
    solutionDepth: path.length - 1,
    moves: path.flatMap((n) => (n.move ? [n.move] : [])),
    nodesExpanded: meta.nodesExpanded,
    maxFrontierSize: meta.peakFrontier,
    elapsedMs: performance.now() - begin,
  };
  return Object.freeze(result);
}

export function exhaustedResult(
  algorithm: AlgoKey,
  meta: SearchMeta,
  begin: number,
  message = "Search space exhausted without reaching the goal."
): SearchResult {
  const result: SearchResult = {
    algorithm,
    outcome: "EXHAUSTED",
    success: false,
    solutionPath: [],
    solutionDepth: -1,
    moves: [],
    nodesExpanded: meta.nodesExpanded,
    maxFrontierSize: meta.peakFrontier,
    elapsedMs: performance.now() - begin,
    message,
  };
  return Object.freeze(result);
}
