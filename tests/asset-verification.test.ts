import { describe, expect, it } from "vitest";
import { AuthorizationError, NotFoundError, ValidationError } from "../src/core/errors.js";
import type { VerificationListQuery } from "../src/core/services/asset-verification-service.js";
import type { UserProfile } from "../src/core/types/domain.js";
import { cleanup, makeContext, registerLaptop, seedAgency } from "./support.js";

describe("AssetVerificationService", () => {
  it("records a typed tag verification and appends it to the asset history", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed, { assetTag: "LAP-7" });

      const verification = await ctx.assetVerificationService.verify(seed.custodian, seed.agencyId, {
        reference: " lap-7 ",
        note: " shelf B ",
        location: "Store room"
      });

      expect(verification).toMatchObject({
        agencyId: seed.agencyId,
        assetId: asset.id,
        verifiedById: "ict_1",
        method: "manual",
        tagEntered: "lap-7",
        note: "shelf B",
        location: "Store room"
      });
      const history = await ctx.auditLedgerService.list({ agencyId: seed.agencyId, assetId: asset.id });
      expect(history.map((entry) => entry.event)).toEqual(["registered", "verified"]);
      expect(history[1]?.meta).toEqual({
        method: "manual",
        location: "Store room",
        verificationId: verification.id
      });
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("treats a scanned QR payload as a scan and records the resolved asset id", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed, { assetTag: "LAP-7" });

      const verification = await ctx.assetVerificationService.verify(seed.custodian, seed.agencyId, {
        reference: asset.qrPayload,
        method: "manual"
      });
      expect(asset.qrPayload).toBe("ASSET:MOF:LAP-7");
      expect(verification.method).toBe("scan");
      expect(verification.tagEntered).toBe(asset.id);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("limits verifiers to their managed scope", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const field = await registerLaptop(ctx, seed, { assetTag: "FLD-1" });
      const core = await registerLaptop(ctx, seed, { assetTag: "COR-1", unitId: seed.coreUnit.id });
      const central = await registerLaptop(ctx, seed, { assetTag: "CEN-1", unitId: null });
      const verify = (actor: UserProfile, reference: string) =>
        ctx.assetVerificationService.verify(actor, seed.agencyId, { reference });

      expect((await verify(seed.unitHead, "FLD-1")).assetId).toBe(field.id);
      expect((await verify(seed.assetManager, "FLD-1")).assetId).toBe(field.id);
      expect((await verify(seed.opsManager, "COR-1")).assetId).toBe(core.id);
      expect((await verify(seed.opsManager, "CEN-1")).assetId).toBe(central.id);

      await expect(verify(seed.unitHead, "COR-1")).rejects.toBeInstanceOf(AuthorizationError);
      await expect(verify(seed.opsManager, "FLD-1")).rejects.toBeInstanceOf(AuthorizationError);
      await expect(verify(seed.staff, "FLD-1")).rejects.toThrow("You are not allowed to verify assets.");
      await expect(verify(seed.custodian, "NOPE-1")).rejects.toBeInstanceOf(NotFoundError);

      const recorded = await ctx.assetVerificationService.listVerifications(seed.custodian, seed.agencyId);
      expect(recorded).toHaveLength(4);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("filters the verification history and hides entries outside the reader's scope", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const field = await registerLaptop(ctx, seed, { assetTag: "LAP-7" });
      const core = await registerLaptop(ctx, seed, { assetTag: "LAP-8", unitId: seed.coreUnit.id });
      await ctx.assetVerificationService.verify(seed.custodian, seed.agencyId, { reference: "LAP-7" });
      await ctx.assetVerificationService.verify(seed.custodian, seed.agencyId, { reference: "LAP-8" });
      await ctx.assetVerificationService.verify(seed.opsManager, seed.agencyId, { reference: "LAP-8" });
      const list = (actor: UserProfile, query: VerificationListQuery = {}) =>
        ctx.assetVerificationService.listVerifications(actor, seed.agencyId, query);
      const assetIds = (items: Array<{ assetId: string }>) => items.map((item) => item.assetId).sort();

      expect(assetIds(await list(seed.custodian))).toEqual([field.id, core.id, core.id].sort());
      expect(assetIds(await list(seed.unitHead))).toEqual([field.id]);
      expect(assetIds(await list(seed.opsManager))).toEqual([core.id, core.id]);

      expect(assetIds(await list(seed.custodian, { tag: "lap-8" }))).toEqual([core.id, core.id]);
      expect(assetIds(await list(seed.custodian, { unitId: seed.fieldUnit.id }))).toEqual([field.id]);
      expect(assetIds(await list(seed.custodian, { verifiedById: seed.opsManager.id }))).toEqual([core.id]);
      expect(await list(seed.custodian, { to: "2000-01-01" })).toEqual([]);
      expect(await list(seed.custodian, { from: "2000-01-01" })).toHaveLength(3);
      expect(await list(seed.custodian, { limit: 1 })).toHaveLength(1);
      expect((await list(seed.unitHead))[0]?.asset).toEqual({
        id: field.id,
        name: "ThinkBook 14",
        assetTag: "LAP-7",
        unitId: "unit_field",
        categoryId: "cat_laptop",
        status: "available"
      });

      await expect(list(seed.custodian, { from: "01/02/2026" })).rejects.toBeInstanceOf(ValidationError);
      await expect(list(seed.staff)).rejects.toBeInstanceOf(AuthorizationError);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("refuses non-superusers while asset management is disabled", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      await registerLaptop(ctx, seed, { assetTag: "LAP-7" });
      await ctx.organizationService.updateConfig(seed.root, seed.agencyId, { assetMgmtEnabled: false });

      await expect(
        ctx.assetVerificationService.verify(seed.custodian, seed.agencyId, { reference: "LAP-7" })
      ).rejects.toBeInstanceOf(AuthorizationError);
      const byRoot = await ctx.assetVerificationService.verify(seed.root, seed.agencyId, { reference: "LAP-7" });
      expect(byRoot.verifiedById).toBe("root");
      expect(await ctx.store.listAssetVerifications({ agencyId: seed.agencyId })).toHaveLength(1);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });
});
