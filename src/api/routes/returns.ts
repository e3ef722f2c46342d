import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { initiateReturnSchema, verifyReturnSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const returnParamsSchema = z.object({ returnId: z.string().min(1) });
const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });

export function registerReturnRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/returns", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const payload = initiateReturnSchema.parse(request.body);
      const created = await context.returnWorkflowService.initiate(actor, payload.assetId, payload.reason);
      return reply.status(201).send(created);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/returns", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const items = await context.returnWorkflowService.listOpen(actor, agencyId);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/returns/:returnId/in-transit", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { returnId } = returnParamsSchema.parse(request.params);
      const updated = await context.returnWorkflowService.markInTransit(actor, returnId);
      return reply.send(updated);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/returns/:returnId/verify", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { returnId } = returnParamsSchema.parse(request.params);
      const payload = verifyReturnSchema.parse(request.body ?? {});
      const result = await context.returnWorkflowService.verifyReceived(actor, returnId, payload.note);
      return reply.send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/returns/:returnId/cancel", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { returnId } = returnParamsSchema.parse(request.params);
      const cancelled = await context.returnWorkflowService.cancel(actor, returnId);
      return reply.send(cancelled);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
