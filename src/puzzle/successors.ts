import type { Move } from "../types/types";
import { idOf, rcOf } from "../utils/utils";
import type { Board } from "./board";

// Fixed expansion order; DFS depth-limit behaviour depends on it.
export const MOVES: readonly [Move, number, number][] = [
  ["UP", -1, 0],
  ["DOWN", 1, 0],
  ["LEFT", 0, -1],
  ["RIGHT", 0, 1],
];

export interface Successor {
  move: Move;
  board: Board;
}

// Boards one blank-move away, in UP, DOWN, LEFT, RIGHT order. No wraparound.
export function successors(board: Board): Successor[] {
  const N = board.size;
  const blank = board.blankIndex();
  const { r, c } = rcOf(N, blank);
  const out: Successor[] = [];
  for (const [move, dr, dc] of MOVES) {
    const nr = r + dr,
      nc = c + dc;
    if (nr >= 0 && nr < N && nc >= 0 && nc < N) {
      out.push({ move, board: board.swap(blank, idOf(N, nr, nc)) });
    }
  }
  return out;
}

export function applyMove(board: Board, move: Move): Board | null {
  return successors(board).find((s) => s.move === move)?.board ?? null;
}

// Slide the tile at `id` into the blank; null unless the two are orthogonal neighbours.
export function moveTile(board: Board, id: number): Board | null {
  const N = board.size;
  const blank = board.blankIndex();
  const a = rcOf(N, id),
    b = rcOf(N, blank);
  if (Math.abs(a.r - b.r) + Math.abs(a.c - b.c) !== 1) return null;
  return board.swap(blank, id);
}

// True iff `b` is `a` with the blank swapped with one orthogonal neighbour
export const isOneMoveApart = (a: Board, b: Board) =>
  successors(a).some((s) => s.board.equals(b));
