import type { Grid, PuzzleSize } from "../types/types";
import { idOf } from "../utils/utils";
import { assertSize, parseGrid, validateCells } from "./validate";

// Immutable N×N board, cells in row-major order, 0 is the blank.
export class Board {
  readonly size: PuzzleSize;
  readonly cells: readonly number[];
  readonly key: string;

  private constructor(size: PuzzleSize, cells: readonly number[]) {
    this.size = size;
    this.cells = Object.freeze(cells.slice());
    this.key = cells.join(",");
  }

  static fromCells(size: number, cells: readonly number[]): Board {
    const n = assertSize(size);
    validateCells(n, cells);
    return new Board(n, cells);
  }

  static fromGrid(grid: unknown): Board {
    const { size, cells } = parseGrid(grid);
    return new Board(size, cells);
  }

  at(r: number, c: number): number {
    return this.cells[idOf(this.size, r, c)];
  }

  blankIndex(): number {
    return this.cells.indexOf(0);
  }

  // Swap two cells; callers only pass the blank and one of its neighbours.
  swap(i: number, j: number): Board {
    const next = this.cells.slice();
    [next[i], next[j]] = [next[j], next[i]];
    return new Board(this.size, next);
  }

  equals(other: Board): boolean {
    return this.size === other.size && this.key === other.key;
  }

  toGrid(): Grid {
    const grid: Grid = [];
    for (let r = 0; r < this.size; r++) {
      grid.push(this.cells.slice(r * this.size, (r + 1) * this.size));
    }
    return grid;
  }

  toString(): string {
    return this.toGrid()
      .map((row) => row.map((v) => (v === 0 ? "_" : String(v))).join(" "))
      .join("\n");
  }
}

const GOALS: Record<PuzzleSize, Board> = {
  2: Board.fromCells(2, [1, 2, 3, 0]),
  3: Board.fromCells(3, [1, 2, 3, 4, 5, 6, 7, 8, 0]),
};

export const goalBoard = (size: PuzzleSize): Board => GOALS[size];

export const isGoal = (board: Board): boolean => board.equals(GOALS[board.size]);
