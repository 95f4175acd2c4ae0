import type { PuzzleSize } from "../types/types";
import { DEFAULT_SOLVER_CONFIG } from "../config";
import { rngLCG } from "../utils/utils";
import { goalBoard, type Board } from "./board";
import { successors } from "./successors";

/**
 * Random walk of `moves` blank-moves from the goal. Stays in the goal's
 * component, so the result is always solvable. Same seed, same board.
 */
export function shuffleBoard(
  size: PuzzleSize,
  moves: number = DEFAULT_SOLVER_CONFIG.shuffleMoves,
  seed: number = Date.now()
): Board {
  const R = rngLCG(seed);
  let board = goalBoard(size);
  for (let i = 0; i < moves; i++) {
    const next = successors(board);
    const p = R.next().value;
    board = next[Math.floor(p * next.length)].board;
  }
  return board;
}
