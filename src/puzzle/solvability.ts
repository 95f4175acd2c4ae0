import type { SolvabilityReport } from "../interfaces/interfaces";
import type { Board } from "./board";

export function countInversions(board: Board): number {
  const tiles = board.cells.filter((v) => v !== 0);
  let inversions = 0;
  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }
  return inversions;
}

/**
 * Parity test against the fixed goal (blank bottom-right).
 *
 * Odd width: a move never changes inversion parity, so the count must be even.
 * Even width: a vertical move flips both inversion parity and the blank's row,
 * so `inversions + blankRowFromBottom` must keep the goal's parity, which is odd.
 */
export function checkSolvability(board: Board): SolvabilityReport {
  const N = board.size;
  const inversions = countInversions(board);
  const blankRowFromBottom = N - Math.floor(board.blankIndex() / N);

  const solvable =
    N % 2 === 1
      ? inversions % 2 === 0
      : (inversions + blankRowFromBottom) % 2 === 1;

  return {
    solvable,
    inversions,
    blankRowFromBottom,
    reason: solvable
      ? null
      : `This puzzle has ${inversions} inversion(s) and is not solvable. Try a different configuration.`,
  };
}

export const isSolvable = (board: Board) => checkSolvability(board).solvable;
