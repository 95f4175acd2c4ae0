// experiments/experiment-runner.ts
//
// Offline comparison of BFS, depth-limited DFS and A* on seeded shuffles.
// Writes one CSV row per (board, algorithm) with expansions, peak frontier,
// runtime, solution depth and optimality against BFS.
//
// Run with:
//   npm run experiment
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import type { SearchResult } from "../src/interfaces/interfaces";
import type { AlgoKey, PuzzleSize } from "../src/types/types";
import { resolveSolverConfig } from "../src/config";
import { shuffleBoard } from "../src/puzzle/shuffle";
import { checkSolvability } from "../src/puzzle/solvability";
import { solve } from "../src/solver/solve";

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = "experiments/results.csv";

// boards per configuration
const NUM_TRIALS = 20;

const SIZES: PuzzleSize[] = [2, 3];

// random-walk lengths from the goal
const SHUFFLE_MOVES = [10, 20, 40];

const ALGORITHMS: AlgoKey[] = ["BFS", "DFS", "A*"];

const DEPTH_LIMIT = 50;

interface Row {
  trial: number;
  size: PuzzleSize;
  shuffleMoves: number;
  seed: number;
  result: SearchResult;
  optimal: boolean | null; // null if BFS found nothing
}

function runTrial(trial: number, size: PuzzleSize, shuffleMoves: number, seed: number): Row[] {
  const config = resolveSolverConfig({ depthLimit: DEPTH_LIMIT });
  const board = shuffleBoard(size, shuffleMoves, seed);
  if (!checkSolvability(board).solvable) {
    throw new Error(`shuffle produced an unsolvable board: ${board.key}`);
  }

  const results = ALGORITHMS.map((algo) => solve(board, algo, config));
  // BFS depth is the true shortest distance
  const baseline = results.find((r) => r.algorithm === "BFS");
  const best = baseline?.success ? baseline.solutionDepth : null;

  return results.map((result) => ({
    trial,
    size,
    shuffleMoves,
    seed,
    result,
    optimal: best === null ? null : result.success && result.solutionDepth === best,
  }));
}

function toCsv(rows: Row[]): string {
  const header = [
    "trial",
    "size",
    "shuffleMoves",
    "seed",
    "algo",
    "runtimeMs",
    "nodesExpanded",
    "peakFrontier",
    "solutionDepth",
    "found",
    "optimal",
  ].join(",");
  const lines = rows.map(({ trial, size, shuffleMoves, seed, result: r, optimal }) =>
    [
      trial.toString(),
      size.toString(),
      shuffleMoves.toString(),
      seed.toString(),
      r.algorithm,
      r.elapsedMs.toFixed(4),
      r.nodesExpanded.toString(),
      r.maxFrontierSize.toString(),
      r.success ? r.solutionDepth.toString() : "",
      r.success ? "1" : "0",
      optimal == null ? "" : optimal ? "1" : "0",
    ].join(",")
  );
  return [header, ...lines].join("\n");
}

// ---------- Main experiment loop ----------
function main() {
  const rows: Row[] = [];
  let trialIndex = 0;

  for (const size of SIZES) {
    for (const shuffleMoves of SHUFFLE_MOVES) {
      for (let t = 0; t < NUM_TRIALS; t++) {
        const seed = 1000 * trialIndex + t;
        const trialRows = runTrial(trialIndex, size, shuffleMoves, seed);
        rows.push(...trialRows);
        trialIndex++;

        const summary = trialRows
          .map(({ result: r }) => `${r.algorithm}=${r.success ? r.solutionDepth : "-"}/${r.nodesExpanded}`)
          .join(" ");
        console.log(`Done trial ${trialIndex} :: size=${size}, shuffle=${shuffleMoves}, seed=${seed} :: ${summary}`);
      }
    }
  }

  writeFileSync(OUTPUT_CSV, toCsv(rows), "utf8");
  console.log(`\n✅ Wrote ${rows.length} rows to ${OUTPUT_CSV}`);
}

main();
