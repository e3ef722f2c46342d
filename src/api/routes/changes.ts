import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { decideChangeSchema, proposeChangeSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const changeParamsSchema = z.object({ changeRequestId: z.string().min(1) });

export function registerChangeRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/changes", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const payload = proposeChangeSchema.parse(request.body);
      const result = await context.changeControlService.propose(actor, payload.assetId, payload.changes, payload.reason);
      // An edit that matches the stored asset opens nothing.
      return reply.status(result.created ? 201 : 200).send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/changes/:changeRequestId/approve", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { changeRequestId } = changeParamsSchema.parse(request.params);
      const payload = decideChangeSchema.parse(request.body ?? {});
      const result = await context.changeControlService.approve(actor, changeRequestId, payload.note);
      return reply.send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/changes/:changeRequestId/reject", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { changeRequestId } = changeParamsSchema.parse(request.params);
      const payload = decideChangeSchema.parse(request.body ?? {});
      const rejected = await context.changeControlService.reject(actor, changeRequestId, payload.note);
      return reply.send(rejected);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/changes/:changeRequestId/cancel", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { changeRequestId } = changeParamsSchema.parse(request.params);
      const cancelled = await context.changeControlService.cancel(actor, changeRequestId);
      return reply.send(cancelled);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
