import type { SearchNode, SearchResult } from "../interfaces/interfaces";
import { DEFAULT_SOLVER_CONFIG } from "../config";
import { goalBoard, type Board } from "../puzzle/board";
import { successors } from "../puzzle/successors";
import { exhaustedResult, foundResult, startNode } from "./searchResult";

/**
 * Depth-limited DFS. Boards are marked visited when pushed, for the whole
 * run, so this finds some solution within `depthLimit` (not the shallowest)
 * or none.
 */
export function runDFS(
  start: Board,
  depthLimit: number = DEFAULT_SOLVER_CONFIG.depthLimit,
  goal: Board = goalBoard(start.size)
): SearchResult {
  const nodes: SearchNode[] = [startNode(start)];
  const stack: number[] = [0];
  const visited = new Set<string>([start.key]);
  const meta = { nodesExpanded: 0, peakFrontier: 1 };
  const begin = performance.now();

  for (let n = stack.pop(); n !== undefined; n = stack.pop()) {
    const cur = nodes[n];
    meta.nodesExpanded++;

    if (cur.board.equals(goal)) {
      return foundResult("DFS", nodes, n, meta, begin);
    }
    if (cur.pathCost >= depthLimit) continue;

    // reversed so UP is popped first
    for (const { move, board } of successors(cur.board).reverse()) {
      if (visited.has(board.key)) continue;
      visited.add(board.key);
      nodes.push({ board, pathCost: cur.pathCost + 1, parent: n, heuristic: 0, move });
      stack.push(nodes.length - 1);
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, stack.length);
  }
  return exhaustedResult(
    "DFS",
    meta,
    begin,
    `No solution found within depth limit of ${depthLimit}`
  );
}
