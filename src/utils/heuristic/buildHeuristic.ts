import type { Board } from "../../puzzle/board";
import { goalBoard } from "../../puzzle/board";
import { rcOf } from "../utils";

// Grid distance between two cell ids of an N×N board
export const manhattan = (N: number, a: number, b: number) => {
  const A = rcOf(N, a),
    B = rcOf(N, b);
  return Math.abs(A.r - B.r) + Math.abs(A.c - B.c);
};

// goalPos[v] = cell id of tile v in the goal
const goalPositions = (goal: Board) => {
  const pos = new Array<number>(goal.cells.length);
  goal.cells.forEach((v, id) => {
    pos[v] = id;
  });
  return pos;
};

// Heuristic closure for repeated calls against one goal (A* frontier pushes)
export function buildHeuristic(goal: Board): (board: Board) => number {
  const goalPos = goalPositions(goal);
  return (board: Board) => {
    let distance = 0;
    for (let id = 0; id < board.cells.length; id++) {
      const v = board.cells[id];
      if (v !== 0) distance += manhattan(board.size, id, goalPos[v]);
    }
    return distance;
  };
}

/**
 * Sum over tiles of the Manhattan distance to their place in `goal`.
 * The blank contributes 0.
 */
export const manhattanDistance = (board: Board, goal: Board = goalBoard(board.size)) =>
  buildHeuristic(goal)(board);
