import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveSolverConfig } from "../config";
import { handleApiRequest, HEALTH, readBody, solverApi, type ApiRequest, type ApiResponse } from "../server/solverApi";

class FakeResponse implements ApiResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = "";
  setHeader(name: string, value: string) {
    this.headers[name] = value;
  }
  end(body: string) {
    this.body = body;
  }
  json(): unknown {
    return JSON.parse(this.body);
  }
}

const request = (method: string, url: string, body?: string): ApiRequest =>
  Object.assign(Readable.from(body === undefined ? [] : [body]), { method, url });

const twoAway = [
  [1, 2, 3],
  [4, 0, 6],
  [7, 5, 8],
];

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("handleApiRequest", () => {
  it("answers health checks", async () => {
    const res = new FakeResponse();
    expect(await handleApiRequest(request("GET", "/health"), res)).toBe(true);
    expect(res.statusCode).toBe(200);
    expect(res.headers["Content-Type"]).toBe("application/json");
    expect(res.json()).toEqual(HEALTH);
  });

  it("refuses other methods", async () => {
    const health = new FakeResponse();
    await handleApiRequest(request("POST", "/health"), health);
    expect(health.statusCode).toBe(405);

    const solve = new FakeResponse();
    await handleApiRequest(request("GET", "/solve"), solve);
    expect(solve.statusCode).toBe(405);
    expect(solve.json()).toEqual({
      success: false,
      error: "Method GET not allowed",
      error_type: "BadRequest",
    });
  });

  it("passes on unknown paths", async () => {
    const res = new FakeResponse();
    expect(await handleApiRequest(request("GET", "/index.html"), res)).toBe(false);
    expect(res.statusCode).toBe(0);
  });

  it("solves a posted board", async () => {
    const res = new FakeResponse();
    const body = JSON.stringify({ board: twoAway, algorithm: "A*" });
    await handleApiRequest(request("POST", "/solve?trace=1", body), res);
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, algorithm: "A*", solution_depth: 2 });
    expect(console.info).toHaveBeenCalledOnce();
  });

  it("returns 400 for bad JSON", async () => {
    const res = new FakeResponse();
    await handleApiRequest(request("POST", "/solve", "{"), res);
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: "Request body is not valid JSON.",
      error_type: "BadRequest",
    });
  });

  it("returns 400 for unsolvable boards", async () => {
    const res = new FakeResponse();
    const body = JSON.stringify({ board: [[2, 1], [3, 0]] });
    await handleApiRequest(request("POST", "/solve", body), res);
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error_type: "Unsolvable", size: 2, algorithm: "BFS" });
    expect(console.warn).toHaveBeenCalledOnce();
  });

  it("uses the configured depth limit", async () => {
    const res = new FakeResponse();
    const body = JSON.stringify({ board: twoAway, algorithm: "DFS" });
    await handleApiRequest(request("POST", "/solve", body), res, resolveSolverConfig({ depthLimit: 1 }));
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      success: false,
      message: "No solution found within depth limit of 1",
    });
  });
});

describe("readBody", () => {
  it("decodes characters split across chunks", async () => {
    const bytes = Buffer.from('{"algorithm":"A×"}', "utf8");
    const cut = bytes.indexOf(0xc3) + 1; // inside the two-byte "×"
    const body = await readBody(Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]));
    expect(body).toBe('{"algorithm":"A×"}');
  });

  it("accepts string chunks", async () => {
    expect(await readBody(Readable.from(['{"a":', "1}"]))).toBe('{"a":1}');
  });
});

describe("solverApi", () => {
  it("is a named plugin with dev and preview hooks", () => {
    const plugin = solverApi({ depthLimit: "20" });
    expect(plugin.name).toBe("sliding-puzzle-solver-api");
    expect(plugin.configureServer).toBeTypeOf("function");
    expect(plugin.configurePreviewServer).toBeTypeOf("function");
  });
});
