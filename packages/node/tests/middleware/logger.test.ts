/**
 * Tests for logger middleware.
 */

import { describe, it, expect, vi } from "vitest";
import { ALICE, createTestApp, jsonRequest } from "../setup.js";

function mockRequestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("loggerMiddleware", () => {
  it("logs successful requests at info", async () => {
    const requestLogger = mockRequestLogger();
    const { app } = createTestApp({ requestLogger });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(requestLogger.info).toHaveBeenCalledTimes(1);
    expect(requestLogger.info).toHaveBeenCalledWith(
      {
        method: "GET",
        path: "/health",
        status: 200,
        durationMs: expect.any(Number),
        requestId: "req-1",
      },
      "GET /health 200",
    );
  });

  it("logs client errors at warn", async () => {
    const requestLogger = mockRequestLogger();
    const { app } = createTestApp({ requestLogger });

    await app.request(
      jsonRequest("/api/v1/deposits/native", "POST", { account: ALICE, amount: "0" }),
    );

    expect(requestLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ status: 400 }),
      "POST /api/v1/deposits/native 400",
    );
    expect(requestLogger.info).not.toHaveBeenCalled();
  });

  it("logs server errors at error", async () => {
    const requestLogger = mockRequestLogger();
    const { app, oracle } = createTestApp({ requestLogger });
    oracle.setRate(0n);

    await app.request("/ready");

    expect(requestLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ status: 503 }),
      "GET /ready 503",
    );
  });
});
