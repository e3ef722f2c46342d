import { describe, expect, it } from "vitest";
import { AuthorizationError } from "../src/core/errors.js";
import { cleanup, makeContext, seedAgency } from "./support.js";

describe("RoleResolver", () => {
  it("gives authority over a field-unit asset to the unit head and its asset managers only", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const target = { agencyId: seed.agencyId, unitId: seed.fieldUnit.id, currentHolderId: null };

      expect(await ctx.roleResolver.resolve(seed.unitHead, target)).toEqual({
        isCustodian: false,
        isAuthority: true,
        isHolder: false
      });
      expect((await ctx.roleResolver.resolve(seed.assetManager, target)).isAuthority).toBe(true);
      expect((await ctx.roleResolver.resolve(seed.opsManager, target)).isAuthority).toBe(false);
      expect((await ctx.roleResolver.resolve(seed.staff, target)).isAuthority).toBe(false);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("routes authority to the operations manager for core-unit and unplaced assets", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const core = { agencyId: seed.agencyId, unitId: seed.coreUnit.id, currentHolderId: null };
      const unplaced = { agencyId: seed.agencyId, unitId: null, currentHolderId: null };

      expect((await ctx.roleResolver.resolve(seed.opsManager, core)).isAuthority).toBe(true);
      expect((await ctx.roleResolver.resolve(seed.opsManager, unplaced)).isAuthority).toBe(true);
      expect((await ctx.roleResolver.resolve(seed.unitHead, core)).isAuthority).toBe(false);
      expect(await ctx.roleResolver.listAuthorityIds(core)).toEqual([seed.opsManager.id]);
      expect(await ctx.roleResolver.listAuthorityIds({ ...core, unitId: seed.fieldUnit.id })).toEqual([
        seed.unitHead.id,
        seed.assetManager.id
      ]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("grants superusers everything except holding", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const resolved = await ctx.roleResolver.resolve(seed.root, {
        agencyId: "agy_elsewhere",
        unitId: null,
        currentHolderId: seed.staff.id
      });
      expect(resolved).toEqual({ isCustodian: true, isAuthority: true, isHolder: false });
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("denies custodian and authority across agencies but still reports the literal holder", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const resolved = await ctx.roleResolver.resolve(seed.custodian, {
        agencyId: "agy_elsewhere",
        unitId: null,
        currentHolderId: seed.custodian.id
      });
      expect(resolved).toEqual({ isCustodian: false, isAuthority: false, isHolder: true });
      expect(() => ctx.roleResolver.requireSameAgency(seed.custodian, "agy_elsewhere")).toThrow(AuthorizationError);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("reflects role changes on the next resolution", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const target = { agencyId: seed.agencyId, unitId: null, currentHolderId: null };
      expect((await ctx.roleResolver.resolve(seed.staff, target)).isCustodian).toBe(false);

      await ctx.organizationService.setAssetRoles(seed.root, seed.agencyId, {
        ictCustodianIds: [seed.custodian.id, seed.staff.id]
      });
      expect((await ctx.roleResolver.resolve(seed.staff, target)).isCustodian).toBe(true);
      await expect(ctx.roleResolver.requireCustodian(seed.unitHead, target)).rejects.toBeInstanceOf(AuthorizationError);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });
});
