import type { SearchNode, SearchResult } from "../interfaces/interfaces";
import { goalBoard, type Board } from "../puzzle/board";
import { successors } from "../puzzle/successors";
import { exhaustedResult, foundResult, startNode } from "./searchResult";

/**
 * Breadth-first search over blank moves. FIFO order with unit edge costs
 * means the first goal dequeued is at minimum depth.
 */
export function runBFS(start: Board, goal: Board = goalBoard(start.size)): SearchResult {
  const nodes: SearchNode[] = [startNode(start)];
  // queue of arena indices; `head` is the next one to dequeue
  const openQ: number[] = [0];
  let head = 0;
  const visited = new Set<string>([start.key]);
  const meta = { nodesExpanded: 0, peakFrontier: 1 };
  const begin = performance.now();

  while (head < openQ.length) {
    const n = openQ[head++];
    const cur = nodes[n];
    meta.nodesExpanded++;

    if (cur.board.equals(goal)) {
      return foundResult("BFS", nodes, n, meta, begin);
    }
    for (const { move, board } of successors(cur.board)) {
      if (visited.has(board.key)) continue;
      visited.add(board.key);
      nodes.push({ board, pathCost: cur.pathCost + 1, parent: n, heuristic: 0, move });
      openQ.push(nodes.length - 1);
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, openQ.length - head);
  }
  return exhaustedResult("BFS", meta, begin);
}
