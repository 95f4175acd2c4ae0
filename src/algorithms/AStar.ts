import type { SearchNode, SearchResult } from "../interfaces/interfaces";
import { goalBoard, type Board } from "../puzzle/board";
import { successors } from "../puzzle/successors";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { exhaustedResult, foundResult, startNode } from "./searchResult";

/**
 * A* on f = g + h with the Manhattan heuristic. Equal f values pop in
 * push order. Entries whose cost was beaten after they were pushed are
 * skipped on pop instead of being removed from the heap.
 */
export function runAStar(start: Board, goal: Board = goalBoard(start.size)): SearchResult {
  const h = buildHeuristic(goal);
  const heap = new MinHeap<number>();
  const nodes: SearchNode[] = [startNode(start, h(start))];
  const g = new Map<string, number>([[start.key, 0]]);
  const meta = { nodesExpanded: 0, peakFrontier: 1 };
  const begin = performance.now();

  heap.push(nodes[0].heuristic, 0);
  for (let n = heap.pop(); n !== undefined; n = heap.pop()) {
    const cur = nodes[n];
    if ((g.get(cur.board.key) ?? Infinity) < cur.pathCost) continue;
    meta.nodesExpanded++;

    if (cur.board.equals(goal)) {
      return foundResult("A*", nodes, n, meta, begin);
    }
    for (const { move, board } of successors(cur.board)) {
      const ng = cur.pathCost + 1;
      if (ng >= (g.get(board.key) ?? Infinity)) continue;
      g.set(board.key, ng);
      nodes.push({ board, pathCost: ng, parent: n, heuristic: h(board), move });
      heap.push(ng + nodes[nodes.length - 1].heuristic, nodes.length - 1);
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, heap.size());
  }
  return exhaustedResult("A*", meta, begin);
}
