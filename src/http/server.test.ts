import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { buildServer } from "./server";
import { ReconcileInProgressError } from "../reconcile/reconcile-service";
import { ReconcileResult } from "../types/report";

const RESULT: ReconcileResult = {
  takenAt: "2026-02-01T00:00:00.000Z",
  previousTakenAt: "2026-01-01T00:00:00.000Z",
  baseline: false,
  people: 2,
  reports: [
    {
      personName: "Pat Quinn",
      diffs: [{ fieldName: "Communication:Phone", removed: ["1"], added: ["2"] }],
    },
  ],
};

const AUTH = { authorization: "Bearer test-secret" };

describe("HTTP server", () => {
  const run = vi.fn();
  let app: FastifyInstance;

  beforeEach(async () => {
    run.mockReset();
    app = await buildServer({ apiKey: "test-secret", reconciler: { run } });
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers health checks without auth", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("rejects report requests without the api key", async () => {
    const res = await app.inject({ method: "POST", url: "/reports/profile-changes" });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Unauthorized" });
    expect(run).not.toHaveBeenCalled();
  });

  it("returns the reconciliation result", async () => {
    run.mockResolvedValue(RESULT);

    const res = await app.inject({
      method: "POST",
      url: "/reports/profile-changes",
      headers: AUTH,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(RESULT);
  });

  it("maps a concurrent run to 409", async () => {
    run.mockRejectedValue(new ReconcileInProgressError());

    const res = await app.inject({
      method: "POST",
      url: "/reports/profile-changes",
      headers: AUTH,
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "A reconciliation run is already in progress" });
  });

  it("maps other failures to 500", async () => {
    run.mockRejectedValue(new Error("boom"));

    const res = await app.inject({
      method: "POST",
      url: "/reports/profile-changes",
      headers: AUTH,
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Internal server error" });
  });
});
