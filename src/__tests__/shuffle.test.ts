import { describe, expect, it } from "vitest";
import { runBFS } from "../algorithms/BFS";
import { goalBoard } from "../puzzle/board";
import { shuffleBoard } from "../puzzle/shuffle";
import { isSolvable } from "../puzzle/solvability";

describe("shuffleBoard", () => {
  it("is reproducible from a seed", () => {
    expect(shuffleBoard(3, 50, 1234).key).toBe(shuffleBoard(3, 50, 1234).key);
  });

  it("returns the goal for zero moves", () => {
    expect(shuffleBoard(3, 0, 7).equals(goalBoard(3))).toBe(true);
  });

  it("always yields solvable boards", () => {
    for (let seed = 1; seed <= 25; seed++) {
      expect(isSolvable(shuffleBoard(3, 50, seed))).toBe(true);
      expect(isSolvable(shuffleBoard(2, 50, seed))).toBe(true);
    }
  });

  it("stays within the walk length of the goal", () => {
    for (let seed = 1; seed <= 10; seed++) {
      expect(runBFS(shuffleBoard(3, 10, seed)).solutionDepth).toBeLessThanOrEqual(10);
    }
  });
});
