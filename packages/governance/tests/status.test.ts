import { describe, it, expect } from "vitest";
import { hasMajority, meetsQuorum, projectStatus, quorumFor } from "../src/status.js";
import type { Proposal } from "../src/types.js";

function proposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: "1",
    proposer: "alice",
    description: "x",
    target: "auction-engine",
    calldata: "{}",
    votingStart: 100,
    votingEnd: 200,
    supplySnapshot: 1000n,
    votesFor: 0n,
    votesAgainst: 0n,
    totalVotes: 0n,
    executed: false,
    operationId: null,
    ...overrides,
  };
}

describe("quorum and majority", () => {
  it("computes quorum with truncation", () => {
    expect(quorumFor(1000n, 10)).toBe(100n);
    expect(quorumFor(999n, 10)).toBe(99n);
    expect(quorumFor(1000n, 0)).toBe(0n);
  });

  it("checks participation against the snapshot", () => {
    expect(meetsQuorum(proposal({ totalVotes: 100n }), 10)).toBe(true);
    expect(meetsQuorum(proposal({ totalVotes: 99n }), 10)).toBe(false);
  });

  it("requires strictly more for than against", () => {
    expect(hasMajority(proposal({ votesFor: 2n, votesAgainst: 1n }))).toBe(true);
    expect(hasMajority(proposal({ votesFor: 1n, votesAgainst: 1n }))).toBe(false);
  });
});

describe("projectStatus", () => {
  const passing = { votesFor: 150n, votesAgainst: 50n, totalVotes: 200n };

  it("is Pending before the window", () => {
    expect(projectStatus(proposal(), 99, 10)).toBe("Pending");
  });

  it("is Active inside the window, inclusive", () => {
    expect(projectStatus(proposal(), 100, 10)).toBe("Active");
    expect(projectStatus(proposal(passing), 200, 10)).toBe("Active");
  });

  it("is Voting Ended after a passing vote", () => {
    expect(projectStatus(proposal(passing), 201, 10)).toBe("Voting Ended");
  });

  it("is Rejected after a failing vote", () => {
    expect(projectStatus(proposal(), 201, 10)).toBe("Rejected");
    expect(projectStatus(proposal({ votesFor: 50n, votesAgainst: 0n, totalVotes: 50n }), 201, 10)).toBe("Rejected");
  });

  it("is Approved once executed", () => {
    expect(projectStatus(proposal({ ...passing, executed: true }), 201, 10)).toBe("Approved");
  });
});
