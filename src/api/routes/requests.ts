import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { assignAssetSchema, createAssetRequestSchema, rejectRequestSchema } from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const requestParamsSchema = z.object({ requestId: z.string().min(1) });

export function registerRequestRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/requests", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const payload = createAssetRequestSchema.parse(request.body);
      const created = await context.requestWorkflowService.create(actor, payload);
      return reply.status(201).send(created);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/requests", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const queues = await context.requestWorkflowService.listForActor(actor);
      return reply.send(queues);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/requests/:requestId", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const found = await context.requestWorkflowService.getRequest(actor, requestId);
      return reply.send(found);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/requests/:requestId/approve", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const approved = await context.requestWorkflowService.approve(actor, requestId);
      return reply.send(approved);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/requests/:requestId/reject", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const payload = rejectRequestSchema.parse(request.body);
      const rejected = await context.requestWorkflowService.reject(actor, requestId, payload.reason);
      return reply.send(rejected);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/requests/:requestId/assign", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const payload = assignAssetSchema.parse(request.body);
      const result = await context.requestWorkflowService.assignAsset(actor, requestId, payload.assetId);
      return reply.send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/requests/:requestId/verify-receipt", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const verified = await context.requestWorkflowService.verifyReceipt(actor, requestId);
      return reply.send(verified);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/requests/:requestId/cancel", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { requestId } = requestParamsSchema.parse(request.params);
      const cancelled = await context.requestWorkflowService.cancel(actor, requestId);
      return reply.send(cancelled);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
