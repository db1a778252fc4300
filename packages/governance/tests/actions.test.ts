import { describe, it, expect, vi } from "vitest";
import { auctionExecutor, decodeAction, encodeAction } from "../src/actions.js";
import type { AuctionControls } from "../src/actions.js";
import { GovernanceError } from "../src/types.js";

function reasonOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof GovernanceError) return err.reason;
    throw err;
  }
  return "none";
}

describe("encodeAction", () => {
  it("produces canonical JSON with sorted keys", () => {
    expect(encodeAction({ type: "auction.setDuration", seconds: 3600 })).toBe(
      '{"seconds":3600,"type":"auction.setDuration"}',
    );
    expect(encodeAction({ type: "auction.cancel", assetId: "7" })).toBe('{"assetId":"7","type":"auction.cancel"}');
  });

  it("refuses to encode an invalid action", () => {
    expect(() => encodeAction({ type: "auction.setRoyaltyPercentage", percentage: 101 })).toThrow();
  });
});

describe("decodeAction", () => {
  it("decodes what encodeAction produced", () => {
    const action = { type: "auction.setMaxExtensions", count: 4 } as const;
    expect(decodeAction(encodeAction(action))).toEqual(action);
  });

  it("rejects non-JSON calldata", () => {
    expect(reasonOf(() => decodeAction("not json"))).toBe("INVALID_CALLDATA");
  });

  it("rejects unknown action types and bad values", () => {
    expect(reasonOf(() => decodeAction('{"type":"vault.drain"}'))).toBe("INVALID_CALLDATA");
    expect(reasonOf(() => decodeAction('{"type":"auction.setDuration","seconds":0}'))).toBe("INVALID_CALLDATA");
    expect(reasonOf(() => decodeAction('{"type":"auction.cancel","assetId":""}'))).toBe("INVALID_CALLDATA");
  });

  it("reports the failing path", () => {
    expect(() => decodeAction('{"type":"auction.setRoyaltyPercentage","percentage":1.5}')).toThrow(/percentage/);
  });
});

describe("auctionExecutor", () => {
  function fakeEngine() {
    return {
      setDuration: vi.fn(),
      setRoyaltyPercentage: vi.fn(),
      setMaxExtensions: vi.fn(),
      cancel: vi.fn(),
    } satisfies Record<keyof AuctionControls, unknown>;
  }

  it("dispatches each action to the matching engine call", () => {
    const engine = fakeEngine();
    const execute = auctionExecutor(engine);

    execute({ type: "auction.setDuration", seconds: 3600 }, "timelock");
    execute({ type: "auction.setRoyaltyPercentage", percentage: 7 }, "timelock");
    execute({ type: "auction.setMaxExtensions", count: 2 }, "timelock");
    execute({ type: "auction.cancel", assetId: "7" }, "timelock");

    expect(engine.setDuration).toHaveBeenCalledWith(3600, "timelock");
    expect(engine.setRoyaltyPercentage).toHaveBeenCalledWith(7, "timelock");
    expect(engine.setMaxExtensions).toHaveBeenCalledWith(2, "timelock");
    expect(engine.cancel).toHaveBeenCalledWith("7", "timelock");
  });
});
