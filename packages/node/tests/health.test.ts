import { describe, it, expect } from "vitest";
import { T0, createTestApp, send } from "./setup.js";

describe("health routes", () => {
  it("GET /health reports liveness", async () => {
    const res = await send(createTestApp(), "/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok" });
  });

  it("GET /ready checks the event log", async () => {
    const res = await send(createTestApp(), "/ready");
    expect(res).toEqual({
      status: 200,
      body: {
        status: "ready",
        events: 2,
        chainErrors: 0,
        clock: new Date(T0 * 1000).toISOString(),
      },
    });
  });

  it("answers unknown routes with an envelope", async () => {
    const res = await send(createTestApp(), "/api/v1/nowhere");
    expect(res).toEqual({
      status: 404,
      body: { error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nowhere" } },
    });
  });
});
