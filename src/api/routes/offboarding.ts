import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { exitOrganizationSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const exitParamsSchema = z.object({ exitId: z.string().min(1) });

export function registerOffboardingRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/exits", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const payload = exitOrganizationSchema.parse(request.body);
      const result = await context.offboardingService.exitOrganization(actor, payload);
      return reply.status(201).send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/exits/:exitId", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { exitId } = exitParamsSchema.parse(request.params);
      const exit = await context.offboardingService.getExitRequest(actor, exitId);
      return reply.send(exit);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/exits/:exitId/confirm", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { exitId } = exitParamsSchema.parse(request.params);
      const cleared = await context.offboardingService.confirmClearance(actor, exitId);
      return reply.send(cleared);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
