import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import {
  assetListQuerySchema,
  eolQuerySchema,
  lookupQuerySchema,
  registerAssetSchema,
  retireAssetSchema
} from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });
const assetParamsSchema = z.object({ assetId: z.string().min(1) });

export function registerAssetRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.post("/v1/agencies/:agencyId/assets", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = registerAssetSchema.parse(request.body);
      const asset = await context.assetRegistryService.register(actor, { ...payload, agencyId });
      return reply.status(201).send(asset);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/assets", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const filter = assetListQuerySchema.parse(request.query ?? {});
      const items = await context.assetRegistryService.listAssets(actor, agencyId, filter);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/assets/eol-due", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const query = eolQuerySchema.parse(request.query ?? {});
      const asOf = query.asOf ?? new Date().toISOString().slice(0, 10);
      const items = await context.assetRegistryService.listEolDue(actor, agencyId, asOf);
      return reply.send({ asOf, items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/assets/lookup", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const query = lookupQuerySchema.parse(request.query ?? {});
      const asset = await context.assetRegistryService.lookup(actor, agencyId, query.ref);
      return reply.send(asset);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/assets/:assetId", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { assetId } = assetParamsSchema.parse(request.params);
      const asset = await context.assetRegistryService.getAsset(actor, assetId);
      return reply.send(asset);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/assets/:assetId/retire", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { assetId } = assetParamsSchema.parse(request.params);
      const payload = retireAssetSchema.parse(request.body ?? {});
      const asset = await context.assetRegistryService.retire(actor, assetId, payload.note);
      return reply.send(asset);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/assets/:assetId/changes", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { assetId } = assetParamsSchema.parse(request.params);
      const items = await context.changeControlService.listForAsset(actor, assetId);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
