import type { PuzzleErrorKind } from "../types/types";

export class PuzzleError extends Error {
  readonly kind: PuzzleErrorKind;
  readonly details: { size?: number; algorithm?: string };

  constructor(
    kind: PuzzleErrorKind,
    message: string,
    details: { size?: number; algorithm?: string } = {}
  ) {
    super(message);
    this.name = "PuzzleError";
    this.kind = kind;
    this.details = details;
  }
}

export const isPuzzleError = (e: unknown): e is PuzzleError =>
  e instanceof PuzzleError;
