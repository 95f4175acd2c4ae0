import type {
  ErrorPayload,
  HealthPayload,
  SolvedPayload,
  SolveRequest,
  SolveResponse,
} from "../interfaces/interfaces";
import { API_ROUTES } from "../config";

type Fetch = typeof fetch;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null;

export const isSolvedPayload = (v: unknown): v is SolvedPayload =>
  isRecord(v) &&
  typeof v.success === "boolean" &&
  Array.isArray(v.solution_path) &&
  typeof v.nodes_expanded === "number";

export const isErrorPayload = (v: unknown): v is ErrorPayload =>
  isRecord(v) && v.success === false && typeof v.error === "string";

export async function requestSolve(
  body: SolveRequest,
  fetchImpl: Fetch = fetch,
  baseUrl = ""
): Promise<SolveResponse> {
  const res = await fetchImpl(baseUrl + API_ROUTES.solve, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  const data: unknown = await res.json();
  if (isErrorPayload(data)) return { ok: false, payload: data };
  if (isSolvedPayload(data)) return { ok: true, payload: data };
  throw new Error(`Unexpected response from solver (HTTP ${res.status})`);
}

/**
 * Hands out request tokens. A token stops being current once a newer one is
 * opened or the gate is invalidated, so late responses can be dropped.
 */
export function createRequestGate() {
  let latest = 0;
  return {
    open: () => ++latest,
    invalidate: () => {
      latest++;
    },
    isCurrent: (token: number) => token === latest,
  };
}

// null when the endpoint is unreachable or unhealthy
export async function checkHealth(
  fetchImpl: Fetch = fetch,
  baseUrl = ""
): Promise<HealthPayload | null> {
  try {
    const res = await fetchImpl(baseUrl + API_ROUTES.health);
    if (!res.ok) return null;
    const data: unknown = await res.json();
    return isRecord(data) && data.status === "healthy" && Array.isArray(data.supported_sizes)
      ? { status: "healthy", supported_sizes: data.supported_sizes.map(String) }
      : null;
  } catch (e) {
    console.error("Connection error:", e);
    return null;
  }
}
