import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import {
  agencyConfigPatchSchema,
  assetRolesSchema,
  createAgencySchema,
  upsertCategorySchema,
  upsertUnitSchema,
  upsertUserSchema
} from "../../core/types/schemas.js";
import { authenticate, replyWithError } from "../http.js";

const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });

export function registerAdminRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.get("/v1/me", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      return reply.send(actor);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const items = await context.organizationService.listAgencies(actor);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/agencies", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const payload = createAgencySchema.parse(request.body);
      const agency = await context.organizationService.createAgency(actor, payload.code, payload.name);
      return reply.status(201).send(agency);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/agencies/:agencyId/units", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = upsertUnitSchema.parse(request.body);
      const unit = await context.organizationService.upsertUnit(actor, agencyId, payload);
      return reply.status(201).send(unit);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/units", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      context.roleResolver.requireSameAgency(actor, agencyId);
      const items = await context.store.listUnitsByAgency(agencyId);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/agencies/:agencyId/categories", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = upsertCategorySchema.parse(request.body);
      const category = await context.organizationService.upsertCategory(actor, agencyId, payload.name, payload.id);
      return reply.status(201).send(category);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/categories", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      context.roleResolver.requireSameAgency(actor, agencyId);
      const items = await context.store.listCategoriesByAgency(agencyId);
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.post("/v1/agencies/:agencyId/users", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = upsertUserSchema.parse(request.body);
      const user = await context.organizationService.upsertUser(actor, agencyId, payload);
      return reply.status(201).send(user);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.put("/v1/agencies/:agencyId/roles", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const payload = assetRolesSchema.parse(request.body);
      const roles = await context.organizationService.setAssetRoles(actor, agencyId, payload);
      return reply.send(roles);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/config", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const config = await context.organizationService.getConfig(actor, agencyId);
      return reply.send(config);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.patch("/v1/agencies/:agencyId/config", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const patch = agencyConfigPatchSchema.parse(request.body);
      const config = await context.organizationService.updateConfig(actor, agencyId, patch);
      return reply.send(config);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
