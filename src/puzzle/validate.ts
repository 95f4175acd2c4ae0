import type { AlgoKey, PuzzleSize } from "../types/types";
import { PuzzleError } from "./errors";

export const SUPPORTED_SIZES: readonly PuzzleSize[] = [2, 3];
export const ALGORITHMS: readonly AlgoKey[] = ["BFS", "DFS", "A*"];

export function isPuzzleSize(n: number): n is PuzzleSize {
  return SUPPORTED_SIZES.some((s) => s === n);
}

export function assertSize(n: number): PuzzleSize {
  if (!isPuzzleSize(n)) {
    throw new PuzzleError(
      "UnsupportedSize",
      `Invalid puzzle size. Only 2×2 and 3×3 puzzles are supported. Got ${n}×${n}.`,
      { size: n }
    );
  }
  return n;
}

// Accepts integers and digit-only strings (form inputs send those)
function toInt(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

/**
 * Checks that `cells` holds every label 0..N²-1 exactly once.
 * Throws a MalformedBoard error naming the first problem found.
 */
export function validateCells(size: PuzzleSize, cells: readonly number[]) {
  const max = size * size - 1;
  if (cells.length !== size * size) {
    throw new PuzzleError(
      "MalformedBoard",
      `Puzzle must have ${size * size} cells. Found ${cells.length}.`,
      { size }
    );
  }
  for (const v of cells) {
    if (!Number.isInteger(v) || v < 0 || v > max) {
      throw new PuzzleError(
        "MalformedBoard",
        `Value ${v} is out of range. Cells must be integers from 0 to ${max}.`,
        { size }
      );
    }
  }
  const zeroCount = cells.filter((v) => v === 0).length;
  if (zeroCount !== 1) {
    throw new PuzzleError(
      "MalformedBoard",
      `Puzzle must have exactly one empty tile (0). Found ${zeroCount}.`,
      { size }
    );
  }
  if (new Set(cells).size !== cells.length) {
    throw new PuzzleError(
      "MalformedBoard",
      `Missing or duplicate values. Puzzle must contain all numbers from 0 to ${max}.`,
      { size }
    );
  }
}

/** Validates an N×N grid of JSON values and returns its row-major cells. */
export function parseGrid(input: unknown): { size: PuzzleSize; cells: number[] } {
  if (!Array.isArray(input)) {
    throw new PuzzleError("MalformedBoard", "Board must be an array of rows.");
  }
  const size = assertSize(input.length);
  const cells: number[] = [];
  input.forEach((row: unknown, r) => {
    if (!Array.isArray(row) || row.length !== size) {
      throw new PuzzleError(
        "MalformedBoard",
        `Invalid puzzle: All rows must have the same size (${size}).`,
        { size }
      );
    }
    row.forEach((value: unknown, c) => {
      const v = toInt(value);
      if (v === null) {
        throw new PuzzleError(
          "MalformedBoard",
          `Cell (${r}, ${c}) is not an integer.`,
          { size }
        );
      }
      cells.push(v);
    });
  });
  validateCells(size, cells);
  return { size, cells };
}

export function parseAlgorithm(input: unknown): AlgoKey {
  const name = input === undefined ? "BFS" : input;
  const algo = ALGORITHMS.find((a) => a === name);
  if (!algo) {
    throw new PuzzleError("UnknownAlgorithm", `Unknown algorithm: ${String(name)}`, {
      algorithm: String(name),
    });
  }
  return algo;
}
