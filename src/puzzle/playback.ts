import type { Grid } from "../types/types";
import { Board } from "./board";

// Cursor over a solution path: `step` boards have been shown so far.
export interface Playback {
  path: Board[];
  step: number;
}

export const startPlayback = (path: Board[]): Playback => ({ path, step: 0 });

export const isFinished = (pb: Playback) => pb.step >= pb.path.length;

// Returns the board to show and the advanced cursor, or null once finished.
export function nextStep(pb: Playback): { board: Board; playback: Playback } | null {
  if (isFinished(pb)) return null;
  return { board: pb.path[pb.step], playback: { path: pb.path, step: pb.step + 1 } };
}

// Index of the tile that moved between two consecutive boards (its new cell).
export function changedTile(prev: Board, next: Board): number {
  return next.cells.findIndex((v, i) => v !== 0 && v !== prev.cells[i]);
}

/**
 * Parses custom board text: one row per line, cells separated by spaces or
 * commas. Structural errors surface as PuzzleError from Board.fromGrid.
 */
export function parseBoardText(text: string): Board {
  const grid: Grid = text
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) =>
      line
        .split(/[\s,]+/)
        .filter((t) => t.length > 0)
        .map((t) => (/^\d+$/.test(t) ? Number(t) : NaN))
    );
  return Board.fromGrid(grid);
}
