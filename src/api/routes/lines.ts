import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { assignLineSchema, registerLineSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });
const lineParamsSchema = z.object({ lineId: z.string().min(1) });
const userParamsSchema = z.object({ userId: z.string().min(1) });

export function registerLineRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/agencies/:agencyId/lines", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = registerLineSchema.parse(request.body);
      const line = await context.communicationLineService.register(actor, { ...payload, agencyId });
      return reply.status(201).send(line);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/lines/:lineId/assign", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { lineId } = lineParamsSchema.parse(request.params);
      const payload = assignLineSchema.parse(request.body);
      const line = await context.communicationLineService.assign(actor, lineId, payload.userId);
      return reply.send(line);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/users/:userId/lines", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { userId } = userParamsSchema.parse(request.params);
      const items = await context.communicationLineService.listForUser(actor, userId);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
