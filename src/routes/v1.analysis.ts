import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AlignmentService } from "../alignment/service.js";
import { PlanDocument } from "../schemas/plan.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";

const AnalysisRequest = z
  .object({
    strategic_plan: PlanDocument.refine((d) => d.document_type === "strategic_plan", {
      message: "document_type must be strategic_plan",
    }).optional(),
    action_plan: PlanDocument.refine((d) => d.document_type === "action_plan", {
      message: "document_type must be action_plan",
    }).optional(),
  })
  .strict();

export async function analysisRoutes(app: FastifyInstance, service: AlignmentService): Promise<void> {
  // Runs on stored plans unless the body supplies replacements
  app.post("/v1/analysis", async (req, reply) => {
    const parsed = AnalysisRequest.safeParse(req.body ?? {});
    if (!parsed.success) {
      log.warn({ request_id: req.id, issues: parsed.error.issues.length }, "Analysis request validation failed");
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }

    return service.runAnalysis(parsed.data, { requestId: req.id });
  });

  app.get("/v1/analysis", async () => service.getResults());
}
