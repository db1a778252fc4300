/**
 * Tests for sandbox routes and their mounting.
 */

import { describe, it, expect } from "vitest";
import { SystemClock } from "@fracta/types";
import { OWNER, T0, createTestApp, send } from "./setup.js";

describe("sandbox routes", () => {
  it("funds an address", async () => {
    const t = createTestApp();
    await send(t, "/api/v1/sandbox/fund", "POST", { address: "bob", amount: "250" });
    const res = await send(t, "/api/v1/sandbox/fund", "POST", { address: "bob", amount: "50" });
    expect(res).toEqual({ status: 200, body: { data: { address: "bob", balance: "300" } } });
  });

  it("registers an asset once", async () => {
    const t = createTestApp();
    expect(await send(t, "/api/v1/sandbox/assets", "POST", { assetId: "7", owner: "alice" })).toEqual({
      status: 201,
      body: { data: { assetId: "7", owner: "alice" } },
    });

    const again = await send(t, "/api/v1/sandbox/assets", "POST", { assetId: "7", owner: "bob" });
    expect(again.status).toBe(400);
    expect(again.body).toMatchObject({ error: { details: { reason: "ASSET_EXISTS" } } });
  });

  it("advances a manual clock", async () => {
    const t = createTestApp();
    const res = await send(t, "/api/v1/sandbox/clock/advance", "POST", { seconds: 60 });
    expect(res).toEqual({ status: 200, body: { data: { now: T0 + 60 } } });
    expect(t.clock.now()).toBe(T0 + 60);
  });

  it("refuses to move the system clock", async () => {
    const t = createTestApp({
      serviceConfig: { ownerAddress: OWNER, fractionsPerAsset: 1000n, clock: new SystemClock() },
    });
    const res = await send(t, "/api/v1/sandbox/clock/advance", "POST", { seconds: 60 });
    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { code: "CONFLICT" } });
  });

  it("is not mounted when disabled", async () => {
    const t = createTestApp({ sandbox: false });
    const res = await send(t, "/api/v1/sandbox/fund", "POST", { address: "bob", amount: "250" });
    expect(res.status).toBe(404);
  });
});
