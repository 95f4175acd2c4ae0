import type { Cell } from "../types/types";
import type { SearchNode } from "../interfaces/interfaces";
import type { Board } from "../puzzle/board";

export const idOf = (N: number, r: number, c: number) => r * N + c;
export const rcOf = (N: number, id: number): Cell => ({
  r: Math.floor(id / N),
  c: id % N,
});

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// Reconstruct path by walking parent indices through the node arena
export function reconstructPath(nodes: SearchNode[], goal: number): SearchNode[] {
  const path: SearchNode[] = [];
  let cur: number | null = goal;
  while (cur !== null) {
    const node: SearchNode = nodes[cur];
    path.push(node);
    cur = node.parent;
  }
  return path.reverse();
}

export const boardsOf = (path: SearchNode[]): Board[] => path.map((n) => n.board);
