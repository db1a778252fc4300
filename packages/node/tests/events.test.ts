/**
 * Tests for event log routes.
 *
 * A fresh node has two events: the claim ledger naming the vault its
 * authority, and the vault naming the timelock its authority.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { FRACTA_EVENTS } from "@fracta/event-store";
import { encodeCursor } from "../src/types/pagination.js";
import { createTestApp, depositViaApi, send } from "./setup.js";
import type { TestApp } from "./setup.js";

const EventPageSchema = z.object({
  data: z.array(
    z.object({
      globalPosition: z.number(),
      streamId: z.string(),
      event: z.object({ type: z.string(), payload: z.unknown() }),
    }),
  ),
  pagination: z.object({ cursor: z.string().nullable(), hasMore: z.boolean() }),
});
type EventPage = z.infer<typeof EventPageSchema>;

async function page(t: TestApp, path: string): Promise<EventPage> {
  const res = await t.app.request(path);
  expect(res.status).toBe(200);
  return EventPageSchema.parse(await res.json());
}

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

describe("GET /api/v1/events", () => {
  it("starts with the authority wiring", async () => {
    const body = await page(t, "/api/v1/events");
    expect(body.data.map((e) => e.event.type)).toEqual([
      FRACTA_EVENTS.CLAIMS_AUTHORITY_SET,
      FRACTA_EVENTS.CUSTODY_AUTHORITY_SET,
    ]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("pages in global order", async () => {
    await depositViaApi(t, "7", "alice");

    const first = await page(t, "/api/v1/events?limit=3");
    expect(first.data.map((e) => e.globalPosition)).toEqual([1, 2, 3]);
    expect(first.pagination).toEqual({ cursor: encodeCursor(3), hasMore: true });

    const second = await page(t, `/api/v1/events?limit=3&cursor=${encodeCursor(3)}`);
    expect(second.data.map((e) => e.globalPosition)).toEqual([4]);
    expect(second.pagination.hasMore).toBe(false);
  });

  it("filters by stream", async () => {
    await depositViaApi(t, "7", "alice");

    const body = await page(t, "/api/v1/events?streamId=asset%3A7");
    expect(body.data).toHaveLength(1);
    expect(body.data[0]?.event.type).toBe(FRACTA_EVENTS.ASSET_DEPOSITED);
    expect(body.data[0]?.event.payload).toEqual({ assetId: "7", depositor: "alice", minted: "1000" });
  });

  it("pages one stream by version", async () => {
    await depositViaApi(t, "7", "alice");
    expect((await send(t, "/api/v1/custody/7/withdraw", "POST", undefined, "alice")).status).toBe(200);

    const first = await page(t, "/api/v1/events?streamId=asset%3A7&limit=1");
    expect(first.data.map((e) => e.event.type)).toEqual([FRACTA_EVENTS.ASSET_DEPOSITED]);
    expect(first.pagination).toEqual({ cursor: encodeCursor(1), hasMore: true });

    const second = await page(t, `/api/v1/events?streamId=asset%3A7&limit=1&cursor=${encodeCursor(1)}`);
    expect(second.data.map((e) => e.event.type)).toEqual([FRACTA_EVENTS.ASSET_WITHDRAWN]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("returns nothing for an unknown stream", async () => {
    expect((await page(t, "/api/v1/events?streamId=asset%3A404")).data).toEqual([]);
  });

  it("validates the limit", async () => {
    const res = await send(t, "/api/v1/events?limit=0");
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "VALIDATION_ERROR", message: "Invalid query parameters" } });
  });
});

describe("GET /api/v1/events/verify", () => {
  it("verifies the hash chain", async () => {
    await depositViaApi(t, "7", "alice");
    expect((await send(t, "/api/v1/events/verify")).body).toEqual({
      data: { valid: true, lastVerifiedPosition: 4, errors: [], eventCount: 4 },
    });
  });
});
