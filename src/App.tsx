import { useEffect, useMemo, useRef, useState } from "react";
import type { SolvedPayload } from "./interfaces/interfaces";
import type { AlgoKey, PuzzleSize } from "./types/types";
import { checkHealth, createRequestGate, requestSolve } from "./api/client";
import { DEFAULT_SOLVER_CONFIG } from "./config";
import { Board, goalBoard, isGoal } from "./puzzle/board";
import { isPuzzleError } from "./puzzle/errors";
import { changedTile, isFinished, nextStep, parseBoardText, startPlayback, type Playback } from "./puzzle/playback";
import { shuffleBoard } from "./puzzle/shuffle";
import { checkSolvability } from "./puzzle/solvability";
import { moveTile } from "./puzzle/successors";
import { manhattanDistance } from "./utils/heuristic/buildHeuristic";

// =====================
// Sliding Puzzle Lab
// - 2×2 and 3×3 boards, shuffle / reset / custom entry / click-to-move
// - Solve with BFS, depth-limited DFS or A* (Manhattan) through POST /solve
// - Step or auto-play through the returned path
// =====================

const DESCRIPTIONS: Record<AlgoKey, string> = {
  BFS: "Explores level by level; returns a shortest solution. Time and space O(b^d).",
  DFS: `Goes deep before backtracking, limited to ${DEFAULT_SOLVER_CONFIG.depthLimit} moves. Solutions are not necessarily shortest.`,
  "A*": "Orders the frontier by f(n) = g(n) + h(n) with Manhattan distance; shortest solution, fewer expansions than BFS.",
};

const AUTO_PLAY_MS = 500;

type Status = { kind: "idle" | "solving" | "solved" | "error"; text: string };

export default function PuzzleLab() {
  const [size, setSize] = useState<PuzzleSize>(3);
  const [board, setBoard] = useState<Board>(() => goalBoard(3));
  const [algorithm, setAlgorithm] = useState<AlgoKey>("A*");
  const [status, setStatus] = useState<Status>({ kind: "idle", text: "" });
  const [result, setResult] = useState<SolvedPayload | null>(null);
  const [playback, setPlayback] = useState<Playback | null>(null);
  const [highlight, setHighlight] = useState<number | null>(null);
  const [autoPlay, setAutoPlay] = useState(false);
  const [customText, setCustomText] = useState("");
  const [showCustom, setShowCustom] = useState(false);
  const [connected, setConnected] = useState<boolean | null>(null);

  // responses for a board that has since been replaced are ignored
  const solveGate = useRef(createRequestGate()).current;
  const solving = status.kind === "solving";

  const solvability = useMemo(() => checkSolvability(board), [board]);
  const h = useMemo(() => manhattanDistance(board), [board]);

  useEffect(() => {
    let live = true;
    void checkHealth().then((health) => {
      if (live) setConnected(health !== null);
    });
    return () => {
      live = false;
    };
  }, []);

  const clearSolution = () => {
    setResult(null);
    setPlayback(null);
    setHighlight(null);
    setAutoPlay(false);
    setStatus({ kind: "idle", text: "" });
  };

  const loadBoard = (next: Board) => {
    solveGate.invalidate();
    setBoard(next);
    clearSolution();
  };

  const changeSize = (n: PuzzleSize) => {
    setSize(n);
    loadBoard(goalBoard(n));
  };

  const step = () => {
    if (!playback) return;
    const res = nextStep(playback);
    if (!res) {
      setAutoPlay(false);
      return;
    }
    setHighlight(res.playback.step > 1 ? changedTile(board, res.board) : null);
    setBoard(res.board);
    setPlayback(res.playback);
  };

  // Auto-play: one board per tick until the path runs out
  useEffect(() => {
    if (!autoPlay || !playback) return;
    if (isFinished(playback)) {
      setAutoPlay(false);
      return;
    }
    const handle = window.setTimeout(step, AUTO_PLAY_MS);
    return () => window.clearTimeout(handle);
  }, [autoPlay, playback]);

  const onTileClick = (id: number) => {
    if (solving) return;
    const next = moveTile(board, id);
    if (next) loadBoard(next);
  };

  const solve = async () => {
    if (!solvability.solvable) {
      setStatus({ kind: "error", text: solvability.reason ?? "This puzzle configuration is not solvable." });
      return;
    }
    setStatus({ kind: "solving", text: "Solving puzzle..." });
    const token = solveGate.open();
    try {
      const res = await requestSolve({ board: board.toGrid(), algorithm });
      if (!solveGate.isCurrent(token)) return;
      if (!res.ok) {
        setStatus({ kind: "error", text: res.payload.error });
        return;
      }
      const payload = res.payload;
      if (!payload.success) {
        setStatus({ kind: "error", text: payload.message ?? "Failed to solve puzzle" });
        return;
      }
      setResult(payload);
      setPlayback(startPlayback(payload.solution_path.map((g) => Board.fromGrid(g))));
      setStatus({ kind: "solved", text: "Solution found!" });
    } catch (e) {
      console.error("Solve error:", e);
      if (!solveGate.isCurrent(token)) return;
      const message = e instanceof Error ? e.message : String(e);
      setStatus({ kind: "error", text: `Error: ${message}. Make sure the dev server is running.` });
    }
  };

  const applyCustom = () => {
    try {
      const next = parseBoardText(customText);
      setSize(next.size);
      loadBoard(next);
      setShowCustom(false);
    } catch (e) {
      if (!isPuzzleError(e)) throw e;
      setStatus({ kind: "error", text: e.message });
    }
  };

  const frontier = result?.max_queue_size ?? result?.max_stack_size ?? 0;

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">Sliding Puzzle Lab</h1>
          <p className="text-slate-600">BFS · depth-limited DFS · A* on the 8-puzzle and 3-puzzle</p>
          <p className={connected ? "status connected" : "status disconnected"}>
            {connected === null
              ? "Checking solver..."
              : connected
                ? "✓ Connected to solver"
                : "✗ Solver not reachable. Start it with: npm run dev"}
          </p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1">Puzzle Size</label>
            <select value={size} onChange={(e) => changeSize(Number(e.target.value) === 2 ? 2 : 3)} disabled={solving} className="w-full border rounded px-3 py-2">
              <option value={3}>3×3 (8-puzzle)</option>
              <option value={2}>2×2 (3-puzzle)</option>
            </select>
            <label className="block text-sm mt-3 mb-1">Algorithm</label>
            <select
              value={algorithm}
              onChange={(e) => {
                const v = e.target.value;
                if (v === "BFS" || v === "DFS" || v === "A*") setAlgorithm(v);
              }}
              className="w-full border rounded px-3 py-2"
            >
              <option value="BFS">Breadth First Search</option>
              <option value="DFS">Depth-Limited DFS</option>
              <option value="A*">A* (Manhattan)</option>
            </select>
            <p className="text-xs text-slate-500 mt-2">{DESCRIPTIONS[algorithm]}</p>
          </div>
          <div className="control-card flex flex-col gap-2">
            <button onClick={() => loadBoard(shuffleBoard(size))} disabled={solving} className="btn bg-slate-800">Shuffle</button>
            <button onClick={() => loadBoard(goalBoard(size))} disabled={solving} className="btn bg-slate-500">Reset</button>
            <button onClick={() => setShowCustom((v) => !v)} className="btn bg-slate-500">Custom…</button>
            {showCustom && (
              <div className="mt-2">
                <textarea
                  value={customText}
                  onChange={(e) => setCustomText(e.target.value)}
                  rows={size}
                  placeholder={"1 2 3\n4 0 6\n7 5 8"}
                  className="w-full border rounded px-3 py-2 font-mono"
                />
                <button onClick={applyCustom} disabled={solving} className="btn bg-emerald-600">Apply</button>
              </div>
            )}
          </div>
          <div className="control-card flex flex-col gap-2">
            <button onClick={() => void solve()} disabled={solving} className="btn bg-emerald-600">
              {status.kind === "solving" ? "Solving..." : "Solve Puzzle"}
            </button>
            <button onClick={step} disabled={!playback || isFinished(playback)} className="btn bg-amber-500">Next Step</button>
            <button onClick={() => setAutoPlay((v) => !v)} disabled={!playback || isFinished(playback)} className="btn bg-amber-500">
              {autoPlay ? "Pause" : "Auto Play"}
            </button>
          </div>
        </div>

        {/* Board */}
        <div className="panels">
          <div className="panel">
            <div className="flex items-center justify-between mb-2">
              <h2 className="font-semibold">{size}×{size}</h2>
              <div className="text-xs text-slate-500">{isGoal(board) ? "Solved" : `h = ${h}`}</div>
            </div>
            <div className={`puzzle-grid size-${size}`} style={{ gridTemplateColumns: `repeat(${size}, 1fr)` }}>
              {board.cells.map((v, id) => (
                <div
                  key={id}
                  onClick={() => onTileClick(id)}
                  className={["puzzle-tile", v === 0 ? "empty" : "", id === highlight ? "highlight" : ""].join(" ")}
                >
                  {v === 0 ? "" : v}
                </div>
              ))}
            </div>
            <div className="stats">
              <div className="text-slate-500">Inversions</div><div className="font-mono">{solvability.inversions}</div>
              <div className="text-slate-500">Solvable</div><div className="font-mono">{solvability.solvable ? "yes" : "no"}</div>
            </div>
          </div>

          <div className="panel">
            <h2 className="font-semibold mb-2">Metrics</h2>
            {status.text && <div className={`message ${status.kind}`}>{status.text}</div>}
            {result && (
              <div className="stats">
                <div className="text-slate-500">Algorithm</div><div className="font-mono">{result.algorithm}</div>
                <div className="text-slate-500">Solution depth</div><div className="font-mono">{result.solution_depth}</div>
                <div className="text-slate-500">Nodes expanded</div><div className="font-mono">{result.nodes_expanded.toLocaleString()}</div>
                <div className="text-slate-500">Time taken</div><div className="font-mono">{result.time_taken} s</div>
                <div className="text-slate-500">{result.algorithm === "DFS" ? "Max stack size" : "Max queue size"}</div>
                <div className="font-mono">{frontier.toLocaleString()}</div>
              </div>
            )}
            {playback && (
              <div className="mt-3 text-sm">
                Step {Math.max(0, playback.step - 1)} / {playback.path.length - 1}
                {result && result.moves.length > 0 && (
                  <div className="font-mono text-xs text-slate-500 mt-1">{result.moves.join(" → ")}</div>
                )}
              </div>
            )}
          </div>
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Click a tile next to the blank to slide it. 3×3 boards with an odd number of inversions cannot be solved.
        </footer>
      </div>
    </div>
  );
}
