import type { Connect, Plugin } from "vite";
import type { ErrorPayload, HealthPayload, SolverConfig } from "../interfaces/interfaces";
import { API_ROUTES, resolveSolverConfig } from "../config";
import { solvePuzzle } from "../solver/solve";

// The slice of Node's request/response the handler touches
export interface ApiRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
}
export interface ApiResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export const HEALTH: HealthPayload = {
  status: "healthy",
  supported_sizes: ["2×2", "3×3"],
};

const badRequest = (error: string): ErrorPayload => ({
  success: false,
  error,
  error_type: "BadRequest",
});

export async function readBody(req: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function send(res: ApiResponse, status: number, payload: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
}

/**
 * Serves GET /health and POST /solve. Resolves false for any other path so
 * the caller can hand the request on.
 */
export async function handleApiRequest(
  req: ApiRequest,
  res: ApiResponse,
  config: SolverConfig = resolveSolverConfig()
): Promise<boolean> {
  const path = (req.url ?? "").split("?")[0];
  const method = (req.method ?? "GET").toUpperCase();

  if (path === API_ROUTES.health) {
    if (method !== "GET") send(res, 405, badRequest(`Method ${method} not allowed`));
    else send(res, 200, HEALTH);
    return true;
  }
  if (path !== API_ROUTES.solve) return false;
  if (method !== "POST") {
    send(res, 405, badRequest(`Method ${method} not allowed`));
    return true;
  }

  const body = parseJson(await readBody(req));
  if (!body.ok) {
    send(res, 400, badRequest("Request body is not valid JSON."));
    return true;
  }
  const { ok, payload } = solvePuzzle(body.value, config);
  if (ok) {
    console.info(
      `[solver-api] ${payload.algorithm} depth=${payload.solution_depth} expanded=${payload.nodes_expanded} in ${payload.time_taken}s`
    );
  } else {
    console.warn(`[solver-api] rejected: ${payload.error_type}: ${payload.error}`);
  }
  send(res, ok ? 200 : 400, payload);
  return true;
}

export function solverApiMiddleware(config: SolverConfig): Connect.NextHandleFunction {
  return (req, res, next) => {
    handleApiRequest(req, res, config)
      .then((handled) => {
        if (!handled) next();
      })
      .catch(next);
  };
}

// Mounts the solver endpoints on both the dev and the preview server.
export function solverApi(
  options: Partial<Record<keyof SolverConfig, unknown>> = {}
): Plugin {
  const config = resolveSolverConfig(options);
  return {
    name: "sliding-puzzle-solver-api",
    configureServer(server) {
      server.middlewares.use(solverApiMiddleware(config));
    },
    configurePreviewServer(server) {
      server.middlewares.use(solverApiMiddleware(config));
    },
  };
}
