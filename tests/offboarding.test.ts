import { describe, expect, it } from "vitest";
import { StateConflictError, ValidationError } from "../src/core/errors.js";
import { isOpenReturn } from "../src/core/store/platform-store.js";
import { assignTo, cleanup, makeContext, registerLaptop, seedAgency } from "./support.js";

describe("OffboardingService", () => {
  it("opens returns for held assets without duplicating one already open", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const first = await registerLaptop(ctx, seed, { name: "Laptop one" });
      const second = await registerLaptop(ctx, seed, { name: "Laptop two" });
      await assignTo(ctx, seed, seed.staff, first);
      await assignTo(ctx, seed, seed.staff, second);
      const existing = await ctx.returnWorkflowService.initiate(seed.staff, first.id, "Broken hinge");

      const result = await ctx.offboardingService.exitOrganization(seed.staff, {
        reason: "resigned",
        typedConfirmation: "CONFIRM"
      });

      expect(result.exitRequest.status).toBe("pending_returns");
      expect(result.returnRequests.map((entry) => entry.assetId)).toEqual([second.id]);
      expect(result.returnRequests[0]?.exitRequestId).toBe(result.exitRequest.id);
      expect(result.skippedAssetIds).toEqual([first.id]);

      const open = (await ctx.store.listReturnRequestsByAgency(seed.agencyId)).filter((entry) =>
        isOpenReturn(entry.status)
      );
      expect(open).toHaveLength(2);
      expect(new Set(open.map((entry) => entry.assetId))).toEqual(new Set([first.id, second.id]));
      expect(open.map((entry) => entry.id)).toContain(existing.id);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("suspends assigned lines and notifies line contacts only after commit", async () => {
    const { ctx, sink, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const line = await ctx.communicationLineService.register(seed.custodian, {
        agencyId: seed.agencyId,
        lineType: "voice_data",
        provider: "Example Mobile",
        msisdn: "+1 555 010 0200"
      });
      await ctx.communicationLineService.assign(seed.custodian, line.id, seed.staff.id);

      const result = await ctx.offboardingService.exitOrganization(seed.staff, {
        reason: "reassigned",
        typedConfirmation: " CONFIRM "
      });
      expect(result.exitRequest.status).toBe("pending_ict_confirmation");
      expect(result.suspendedLines.map((entry) => entry.msisdn)).toEqual(["+15550100200"]);
      expect((await ctx.store.getCommunicationLine(line.id))?.status).toBe("suspended");

      await ctx.notificationService.flush();
      expect(sink.byTemplate("exit_submitted")[0]?.recipients).toEqual([
        "head_1@agency.test",
        "ops_1@agency.test",
        "ict_1@agency.test"
      ]);
      expect(sink.byTemplate("exit_disable_lines")[0]?.recipients).toEqual(["telco_1@agency.test"]);

      const events = (await ctx.auditLedgerService.list({ agencyId: seed.agencyId })).map((entry) => entry.event);
      expect(events.slice(-2)).toEqual(["exit_initiated", "line_suspended"]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("does not alert line contacts when nothing was suspended", async () => {
    const { ctx, sink, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      await ctx.offboardingService.exitOrganization(seed.staff, { reason: "resigned", typedConfirmation: "CONFIRM" });
      await ctx.notificationService.flush();
      expect(sink.byTemplate("exit_submitted")).toHaveLength(1);
      expect(sink.byTemplate("exit_disable_lines")).toEqual([]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("requires the exact confirmation and changes nothing without it", async () => {
    const { ctx, sink, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed);
      await assignTo(ctx, seed, seed.staff, asset);
      await ctx.notificationService.flush();
      const sentBefore = sink.messages.length;

      await expect(
        ctx.offboardingService.exitOrganization(seed.staff, { reason: "resigned", typedConfirmation: "confirm" })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        ctx.offboardingService.exitOrganization(seed.staff, { reason: "retired", typedConfirmation: "CONFIRM" })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await ctx.store.listReturnRequestsByAgency(seed.agencyId)).toEqual([]);
      expect(await ctx.store.listActiveExitRequests(seed.agencyId, seed.staff.id)).toEqual([]);
      await ctx.notificationService.flush();
      expect(sink.messages).toHaveLength(sentBefore);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("clears the exit when the last return is verified", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed);
      await assignTo(ctx, seed, seed.staff, asset);
      const { exitRequest, returnRequests } = await ctx.offboardingService.exitOrganization(seed.staff, {
        reason: "resigned",
        typedConfirmation: "CONFIRM"
      });
      await expect(
        ctx.offboardingService.exitOrganization(seed.staff, { reason: "resigned", typedConfirmation: "CONFIRM" })
      ).rejects.toBeInstanceOf(StateConflictError);
      await expect(ctx.offboardingService.confirmClearance(seed.custodian, exitRequest.id)).rejects.toBeInstanceOf(
        StateConflictError
      );

      const returnId = returnRequests[0]?.id ?? "";
      const verified = await ctx.returnWorkflowService.verifyReceived(seed.custodian, returnId, "");
      expect(verified.clearedExitRequests.map((entry) => entry.id)).toEqual([exitRequest.id]);

      const stored = await ctx.offboardingService.getExitRequest(seed.staff, exitRequest.id);
      expect(stored.status).toBe("cleared");
      expect(stored.clearedById).toBe(seed.custodian.id);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("lets a custodian confirm an exit that had nothing to return", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const { exitRequest } = await ctx.offboardingService.exitOrganization(seed.staff, {
        reason: "reassigned",
        typedConfirmation: "CONFIRM"
      });

      const cleared = await ctx.offboardingService.confirmClearance(seed.custodian, exitRequest.id);
      expect(cleared.status).toBe("cleared");
      await expect(ctx.offboardingService.confirmClearance(seed.custodian, exitRequest.id)).rejects.toBeInstanceOf(
        StateConflictError
      );
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });
});
