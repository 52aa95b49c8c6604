import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AlignmentService } from "../alignment/service.js";
import { ProposalStatus } from "../schemas/analysis.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";

const ProposalsQuery = z.object({ status: ProposalStatus.optional() });
const ProposalParams = z.object({ id: z.string().min(1).max(200) });

export async function proposalRoutes(app: FastifyInstance, service: AlignmentService): Promise<void> {
  app.get("/v1/proposals", async (req, reply) => {
    const parsed = ProposalsQuery.safeParse(req.query);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }
    const proposals = await service.listProposals(parsed.data.status);
    return { proposals, count: proposals.length };
  });

  app.post("/v1/proposals/:id/accept", async (req, reply) => {
    const parsed = ProposalParams.safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }
    return service.acceptProposal(parsed.data.id, { requestId: req.id });
  });

  app.post("/v1/proposals/:id/reject", async (req, reply) => {
    const parsed = ProposalParams.safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }
    return service.rejectProposal(parsed.data.id, { requestId: req.id });
  });

  app.get("/v1/simulation", async () => service.simulation());
}
