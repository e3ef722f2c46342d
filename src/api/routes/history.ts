import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { historyQuerySchema } from "../../core/types/schemas.js";
import { authenticate, HttpError, replyWithError } from "../http.js";

const agencyParamsSchema = z.object({ agencyId: z.string().min(1) });

export function registerHistoryRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.get("/v1/agencies/:agencyId/history", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      const query = historyQuerySchema.parse(request.query ?? {});
      context.roleResolver.requireSameAgency(actor, agencyId);

      // One asset's trail is readable by anyone in the agency; the full ledger is custodian-only.
      if (query.assetId) {
        const asset = await context.assetRegistryService.getAsset(actor, query.assetId);
        if (asset.agencyId !== agencyId) {
          throw new HttpError(404, "not_found", "Asset not found in this agency.");
        }
      } else {
        await context.roleResolver.requireCustodian(actor, { agencyId, unitId: null, currentHolderId: null });
      }

      const items = await context.auditLedgerService.list({ agencyId, ...query });
      return reply.send({ items });
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });

  app.get("/v1/agencies/:agencyId/history/verify", async (request, reply) => {
    try {
      const actor = await authenticate(context, request.headers);
      const { agencyId } = agencyParamsSchema.parse(request.params);
      context.roleResolver.requireSameAgency(actor, agencyId);
      await context.roleResolver.requireCustodian(actor, { agencyId, unitId: null, currentHolderId: null });
      const verification = await context.auditLedgerService.verifyChain(agencyId);
      return reply.send(verification);
    } catch (error) {
      return replyWithError(request, reply, error);
    }
  });
}
