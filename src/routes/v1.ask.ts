import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AlignmentService } from "../alignment/service.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";

const AskRequest = z.object({
  question: z.string().trim().min(1).max(2000),
});

/**
 * Q&A over the indexed plans and latest analysis.
 */
export async function askRoutes(app: FastifyInstance, service: AlignmentService): Promise<void> {
  app.post("/v1/ask", async (req, reply) => {
    const parsed = AskRequest.safeParse(req.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, req.id));
    }
    return service.ask(parsed.data.question, { requestId: req.id });
  });
}
