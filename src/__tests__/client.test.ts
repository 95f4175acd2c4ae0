import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { checkHealth, createRequestGate, requestSolve } from "../api/client";
import { handleApiRequest, type ApiResponse } from "../server/solverApi";

class CapturedResponse implements ApiResponse {
  statusCode = 0;
  body = "";
  setHeader() {
    return undefined;
  }
  end(body: string) {
    this.body = body;
  }
}

// Routes fetch calls straight into the API handler.
const inProcessFetch: typeof fetch = async (input: string | URL | Request, init?: RequestInit) => {
  const body = typeof init?.body === "string" ? [init.body] : [];
  const req = Object.assign(Readable.from(body), {
    method: init?.method ?? "GET",
    url: String(input),
  });
  const res = new CapturedResponse();
  const handled = await handleApiRequest(req, res);
  return handled ? new Response(res.body, { status: res.statusCode }) : new Response(null, { status: 404 });
};

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("requestSolve", () => {
  it("returns a solved payload", async () => {
    const res = await requestSolve(
      { board: [[1, 2, 3], [4, 0, 6], [7, 5, 8]], algorithm: "A*" },
      inProcessFetch
    );
    expect(res.ok).toBe(true);
    expect(res.payload).toMatchObject({ solution_depth: 2, nodes_expanded: 3 });
  });

  it("returns error payloads as not ok", async () => {
    const res = await requestSolve({ board: [[2, 1], [3, 0]], algorithm: "BFS" }, inProcessFetch);
    expect(res.ok).toBe(false);
    expect(res.payload).toMatchObject({ success: false, error_type: "Unsolvable" });
  });

  it("throws on an unrecognised body", async () => {
    const odd: typeof fetch = async () => new Response(JSON.stringify({ foo: 1 }), { status: 200 });
    await expect(requestSolve({ board: [[1, 2], [3, 0]], algorithm: "BFS" }, odd)).rejects.toThrow(
      "Unexpected response from solver (HTTP 200)"
    );
  });
});

describe("checkHealth", () => {
  it("reads the health payload", async () => {
    expect(await checkHealth(inProcessFetch)).toEqual({
      status: "healthy",
      supported_sizes: ["2×2", "3×3"],
    });
  });

  it("is null when the server is unreachable", async () => {
    const down: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    expect(await checkHealth(down)).toBeNull();
    expect(console.error).toHaveBeenCalledOnce();
  });

  it("is null on a non-2xx status", async () => {
    const broken: typeof fetch = async () => new Response("{}", { status: 500 });
    expect(await checkHealth(broken)).toBeNull();
  });
});

describe("createRequestGate", () => {
  it("keeps only the newest token current", () => {
    const gate = createRequestGate();
    const first = gate.open();
    const second = gate.open();
    expect(gate.isCurrent(first)).toBe(false);
    expect(gate.isCurrent(second)).toBe(true);
  });

  it("drops a pending solve once the board is replaced", async () => {
    const gate = createRequestGate();
    const token = gate.open();
    const pending = requestSolve({ board: [[1, 2, 3], [4, 0, 6], [7, 5, 8]], algorithm: "BFS" }, inProcessFetch);
    gate.invalidate(); // board changed while the request was in flight
    const res = await pending;
    expect(res.ok).toBe(true);
    expect(gate.isCurrent(token)).toBe(false);
  });
});
