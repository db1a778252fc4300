/**
 * Governance routes.
 *
 * GET  /api/v1/governance/parameters                    — Thresholds, quorum, periods
 * POST /api/v1/governance/proposals                     — Create a proposal
 * GET  /api/v1/governance/proposals                     — List proposals with status
 * GET  /api/v1/governance/proposals/:id                 — Get a proposal with status
 * POST /api/v1/governance/proposals/:id/votes           — Cast a claim-weighted vote
 * GET  /api/v1/governance/proposals/:id/votes/:address  — Whether an address has voted
 * POST /api/v1/governance/proposals/:id/execute         — Schedule a passed proposal
 * GET  /api/v1/governance/operations/:operationId       — Get a timelock operation
 * POST /api/v1/governance/operations/:operationId/execute — Apply a ready operation
 * POST /api/v1/governance/operations/:operationId/cancel  — Cancel (guardian)
 */

import { Hono } from "hono";
import { encodeAction } from "@fracta/governance";
import type { Proposal } from "@fracta/governance";
import type { AppEnv } from "../types/api-contract.js";
import { CreateProposalSchema, VoteSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { operationView, proposalView } from "../types/views.js";
import type { FractaService } from "../services/fracta-service.js";
import { requireCaller } from "../middleware/auth.js";
import { parseBody } from "../middleware/validate.js";

function withStatus(service: FractaService, proposal: Proposal) {
  return proposalView(proposal, service.governance.getStatus(proposal.id));
}

export function createGovernanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/parameters", (c) => {
    const { governance, timelock } = c.get("service");
    return c.json({
      data: {
        ...governance.parameters,
        proposalThreshold: governance.proposalThreshold().toString(),
        timelockDelay: timelock.delay,
      },
    });
  });

  // ─── Proposals ───────────────────────────────────────────────────────

  routes.post("/proposals", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, CreateProposalSchema);
    const service = c.get("service");
    const proposal = service.governance.createProposal(
      body.description,
      body.target,
      encodeAction(body.action),
      caller,
    );
    return c.json({ data: withStatus(service, proposal) }, 201);
  });

  routes.get("/proposals", (c) => {
    const service = c.get("service");
    return c.json({ data: service.governance.listProposals().map((p) => withStatus(service, p)) });
  });

  routes.get("/proposals/:id", (c) => {
    const id = c.req.param("id");
    const service = c.get("service");
    const proposal = service.governance.getProposal(id);
    if (proposal === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${id} does not exist`), 404);
    }
    return c.json({ data: withStatus(service, proposal) });
  });

  routes.get("/proposals/:id/votes/:address", (c) => {
    const id = c.req.param("id");
    const address = c.req.param("address");
    const { governance } = c.get("service");
    if (governance.getProposal(id) === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${id} does not exist`), 404);
    }
    return c.json({ data: { proposalId: id, address, hasVoted: governance.hasVoted(id, address) } });
  });

  routes.post("/proposals/:id/votes", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, VoteSchema);
    const service = c.get("service");
    const proposal = service.governance.vote(c.req.param("id"), body.support, caller);
    return c.json({ data: withStatus(service, proposal) });
  });

  routes.post("/proposals/:id/execute", (c) => {
    const caller = requireCaller(c);
    const service = c.get("service");
    const proposal = service.governance.executeProposal(c.req.param("id"), caller);
    return c.json({ data: withStatus(service, proposal) });
  });

  // ─── Timelock ────────────────────────────────────────────────────────

  routes.get("/operations/:operationId", (c) => {
    const operationId = c.req.param("operationId");
    const { timelock } = c.get("service");
    const operation = timelock.getOperation(operationId);
    if (operation === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Operation ${operationId} does not exist`), 404);
    }
    return c.json({ data: operationView(operation, timelock.isOperationReady(operationId)) });
  });

  routes.post("/operations/:operationId/execute", (c) => {
    const caller = requireCaller(c);
    const operationId = c.req.param("operationId");
    const { timelock } = c.get("service");
    const operation = timelock.execute(operationId, caller);
    return c.json({ data: operationView(operation, false) });
  });

  routes.post("/operations/:operationId/cancel", (c) => {
    const caller = requireCaller(c);
    const operationId = c.req.param("operationId");
    const { timelock } = c.get("service");
    const operation = timelock.cancel(operationId, caller);
    return c.json({ data: operationView(operation, false) });
  });

  return routes;
}
