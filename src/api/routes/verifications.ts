import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { verificationQuerySchema, verifyAssetSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });

export function registerVerificationRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/agencies/:agencyId/verifications", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = verifyAssetSchema.parse(request.body);
      const verification = await context.assetVerificationService.verify(actor, agencyId, payload);
      return reply.status(201).send(verification);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/verifications", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const query = verificationQuerySchema.parse(request.query ?? {});
      const items = await context.assetVerificationService.listVerifications(actor, agencyId, query);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
