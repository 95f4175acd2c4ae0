import type { SolverConfig } from "./interfaces/interfaces";

export const DEFAULT_SOLVER_CONFIG: Readonly<SolverConfig> = {
  depthLimit: 50, // DFS: nodes at this path cost are not expanded
  shuffleMoves: 50, // random blank-moves away from the goal
};

export const API_ROUTES = {
  solve: "/solve",
  health: "/health",
} as const;

export const DEPTH_LIMIT_ENV = "PUZZLE_DFS_DEPTH_LIMIT";

const nonNegativeInt = (v: unknown): number | undefined => {
  if (typeof v === "string") return /^\d+$/.test(v.trim()) ? Number(v.trim()) : undefined;
  return typeof v === "number" && Number.isInteger(v) && v >= 0 ? v : undefined;
};

// Fill gaps from the defaults; non-integer or negative overrides are ignored.
export function resolveSolverConfig(
  overrides: Partial<Record<keyof SolverConfig, unknown>> = {}
): SolverConfig {
  return {
    depthLimit: nonNegativeInt(overrides.depthLimit) ?? DEFAULT_SOLVER_CONFIG.depthLimit,
    shuffleMoves: nonNegativeInt(overrides.shuffleMoves) ?? DEFAULT_SOLVER_CONFIG.shuffleMoves,
  };
}
