/**
 * Tests for health check routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });
});

describe("GET /ready", () => {
  it("is ready while the oracle yields a valid reading", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; subsystems: { oracle: { status: string } } };
    expect(body.status).toBe("ready");
    expect(body.subsystems.oracle.status).toBe("ok");
  });

  it("returns 503 when the oracle reading would be rejected", async () => {
    const { app, oracle } = createTestApp();
    oracle.setRate(0n);

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as {
      status: string;
      subsystems: { oracle: { status: string; detail: string } };
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems.oracle).toEqual({
      status: "down",
      detail: "Oracle rate must be positive, got 0",
    });
  });
});
