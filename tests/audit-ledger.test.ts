import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { createId } from "../src/lib/id.js";
import { ValidationError } from "../src/core/errors.js";
import { createPlatformContext } from "../src/core/services/platform-context.js";
import { historyQuerySchema } from "../src/core/types/schemas.js";
import type { AssetHistoryRecord } from "../src/core/types/domain.js";
import { assignTo, cleanup, makeContext, registerLaptop, seedAgency } from "./support.js";

describe("AuditLedgerService", () => {
  it("chains every workflow step and verifies the chain", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed);
      await assignTo(ctx, seed, seed.staff, asset);
      const opened = await ctx.returnWorkflowService.initiate(seed.staff, asset.id, "");
      await ctx.returnWorkflowService.verifyReceived(seed.custodian, opened.id, "");

      const entries = await ctx.auditLedgerService.list({ agencyId: seed.agencyId });
      expect(entries.map((entry) => entry.sequence)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(entries[0]?.prevEntryHash).toBeNull();
      for (let index = 1; index < entries.length; index += 1) {
        expect(entries[index]?.prevEntryHash).toBe(entries[index - 1]?.entryHash);
      }

      const verification = await ctx.auditLedgerService.verifyChain(seed.agencyId);
      expect(verification).toEqual({
        isValid: true,
        checkedEntries: 6,
        lastSequence: 6,
        lastEntryHash: entries[5]?.entryHash ?? null,
        errors: []
      });
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("detects an entry edited at rest", async () => {
    const suffix = createId("test");
    const { ctx, baseDir } = makeContext();
    const dataFilePath = join(baseDir, `${suffix}-tampered.json`);
    const writer = createPlatformContext({ dataFilePath });
    try {
      const seed = await seedAgency(writer);
      await registerLaptop(writer, seed, { name: "Original" });
      await writer.store.close?.();

      const raw = readFileSync(dataFilePath, "utf8");
      writeFileSync(dataFilePath, raw.replace('"note": "Asset registered."', '"note": "Nothing happened."'), "utf8");

      const reader = createPlatformContext({ dataFilePath });
      const verification = await reader.auditLedgerService.verifyChain(seed.agencyId);
      expect(verification.isValid).toBe(false);
      expect(verification.checkedEntries).toBe(1);
      expect(verification.errors).toHaveLength(1);
      await reader.store.close?.();
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("clamps list limits and keeps the newest entries", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      await registerLaptop(ctx, seed, { name: "One" });
      await registerLaptop(ctx, seed, { name: "Two" });
      await registerLaptop(ctx, seed, { name: "Three" });

      const lastTwo = await ctx.auditLedgerService.list({ agencyId: seed.agencyId, limit: 2 });
      expect(lastTwo.map((entry) => entry.sequence)).toEqual([2, 3]);
      const atLeastOne = await ctx.auditLedgerService.list({ agencyId: seed.agencyId, limit: 0 });
      expect(atLeastOne.map((entry) => entry.sequence)).toEqual([3]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("writes nothing to the ledger when an operation fails", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed);
      const before = await ctx.auditLedgerService.list({ agencyId: seed.agencyId });

      await expect(
        ctx.requestWorkflowService.create(seed.staff, { categoryId: "cat_missing", justification: "x" })
      ).rejects.toMatchObject({ statusCode: 400 });
      await expect(ctx.assetRegistryService.retire(seed.staff, asset.id, "")).rejects.toMatchObject({
        statusCode: 403
      });

      expect(await ctx.auditLedgerService.list({ agencyId: seed.agencyId })).toEqual(before);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("compares time bounds as instants whatever their precision or offset", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const entry = (sequence: number, occurredAt: string): AssetHistoryRecord => ({
        id: `hist_bounds_${sequence}`,
        agencyId: "agy_bounds",
        sequence,
        assetId: "ast_bounds",
        actorId: null,
        event: "status_change",
        note: "",
        meta: {},
        occurredAt,
        prevEntryHash: null,
        entryHash: `hash_${sequence}`
      });
      await ctx.store.appendAssetHistory(entry(1, "2026-03-01T09:59:59.900Z"));
      await ctx.store.appendAssetHistory(entry(2, "2026-03-01T10:00:00.500Z"));
      await ctx.store.appendAssetHistory(entry(3, "2026-03-01T10:00:01.000Z"));
      const sequences = async (bounds: { from?: string; to?: string }) =>
        (await ctx.auditLedgerService.list({ agencyId: "agy_bounds", ...bounds })).map((item) => item.sequence);

      expect(await sequences({ from: "2026-03-01T10:00:00Z" })).toEqual([2, 3]);
      expect(await sequences({ to: "2026-03-01T10:00:00Z" })).toEqual([1]);
      expect(await sequences({ to: "2026-03-01T12:00:00.500+02:00" })).toEqual([1, 2]);
      await expect(sequences({ from: "yesterday" })).rejects.toBeInstanceOf(ValidationError);

      expect(historyQuerySchema.parse({ from: "2026-03-01T10:00:00Z" }).from).toBe("2026-03-01T10:00:00.000Z");
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });
});
