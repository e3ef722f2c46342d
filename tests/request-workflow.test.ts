import { describe, expect, it } from "vitest";
import { AuthorizationError, StateConflictError, ValidationError } from "../src/core/errors.js";
import { cleanup, makeContext, registerLaptop, seedAgency } from "./support.js";

describe("RequestWorkflowService", () => {
  it("takes a request from submission through approval, assignment and receipt", async () => {
    const { ctx, sink, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const asset = await registerLaptop(ctx, seed, { assetTag: "A001" });

      const created = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "  Replacement for a failed laptop  "
      });
      expect(created.status).toBe("pending_manager");
      expect(created.unitId).toBe(seed.fieldUnit.id);
      expect(created.justification).toBe("Replacement for a failed laptop");

      const approved = await ctx.requestWorkflowService.approve(seed.unitHead, created.id);
      expect(approved.status).toBe("pending_ict");
      expect(approved.approverId).toBe(seed.unitHead.id);

      const { request: assigned, asset: held } = await ctx.requestWorkflowService.assignAsset(
        seed.custodian,
        created.id,
        asset.id
      );
      expect(assigned.status).toBe("assigned");
      expect(assigned.assignedAssetId).toBe(asset.id);
      expect(held.status).toBe("assigned");
      expect(held.currentHolderId).toBe(seed.staff.id);
      expect(held.version).toBe(2);

      const received = await ctx.requestWorkflowService.verifyReceipt(seed.staff, created.id);
      expect(received.status).toBe("received");
      expect(received.receivedAt).not.toBeNull();

      await ctx.notificationService.flush();
      expect(sink.byTemplate("asset_request_submitted")[0]?.recipients).toEqual([
        "head_1@agency.test",
        "amgr_1@agency.test"
      ]);
      expect(sink.byTemplate("asset_request_approved")[0]?.recipients).toEqual(["staff_1@agency.test"]);
      expect(sink.byTemplate("asset_assigned")[0]?.recipients).toEqual(["staff_1@agency.test"]);
      expect(sink.byTemplate("asset_receipt_verified")[0]?.recipients).toEqual(["ict_1@agency.test"]);

      const events = (await ctx.auditLedgerService.list({ agencyId: seed.agencyId })).map((entry) => entry.event);
      expect(events.slice(-4)).toEqual(["request_submitted", "request_approved", "assigned", "receipt_verified"]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("skips manager approval when the agency does not require it", async () => {
    const { ctx, sink, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      await ctx.organizationService.updateConfig(seed.root, seed.agencyId, { requireManagerApproval: false });
      const created = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "New starter"
      });
      expect(created.status).toBe("pending_ict");

      await ctx.notificationService.flush();
      expect(sink.byTemplate("asset_request_pending_ict")[0]?.recipients).toEqual(["ict_1@agency.test"]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("only lets the authority for the request's unit decide it", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const created = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "Travel"
      });

      await expect(ctx.requestWorkflowService.approve(seed.opsManager, created.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(ctx.requestWorkflowService.approve(seed.staff, created.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await ctx.requestWorkflowService.approve(seed.assetManager, created.id);
      await expect(ctx.requestWorkflowService.approve(seed.unitHead, created.id)).rejects.toBeInstanceOf(
        StateConflictError
      );
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("requires a reason to reject and keeps the request untouched without one", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const created = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "Travel"
      });

      await expect(ctx.requestWorkflowService.reject(seed.unitHead, created.id, "   ")).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await ctx.store.getAssetRequest(created.id))?.status).toBe("pending_manager");

      const rejected = await ctx.requestWorkflowService.reject(seed.unitHead, created.id, "Budget freeze");
      expect(rejected.status).toBe("rejected");
      expect(rejected.rejectionReason).toBe("Budget freeze");
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("refuses assignment of an asset from another category or one already assigned", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const phone = await ctx.assetRegistryService.register(seed.custodian, {
        agencyId: seed.agencyId,
        categoryId: seed.phones.id,
        name: "Handset"
      });
      const laptop = await registerLaptop(ctx, seed);
      const first = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "Travel"
      });
      await ctx.requestWorkflowService.approve(seed.unitHead, first.id);

      await expect(ctx.requestWorkflowService.assignAsset(seed.custodian, first.id, phone.id)).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await ctx.store.getAsset(phone.id))?.status).toBe("available");

      await ctx.requestWorkflowService.assignAsset(seed.custodian, first.id, laptop.id);

      const second = await ctx.requestWorkflowService.create(seed.coreStaff, {
        categoryId: seed.laptops.id,
        justification: "Also travel"
      });
      await ctx.requestWorkflowService.approve(seed.opsManager, second.id);
      await expect(
        ctx.requestWorkflowService.assignAsset(seed.custodian, second.id, laptop.id)
      ).rejects.toBeInstanceOf(StateConflictError);
      expect((await ctx.store.getAsset(laptop.id))?.currentHolderId).toBe(seed.staff.id);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("lets only the requester verify receipt and cancel before assignment", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const created = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "Travel"
      });

      await expect(ctx.requestWorkflowService.verifyReceipt(seed.staff, created.id)).rejects.toBeInstanceOf(
        StateConflictError
      );
      await expect(ctx.requestWorkflowService.cancel(seed.unitHead, created.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      const cancelled = await ctx.requestWorkflowService.cancel(seed.staff, created.id);
      expect(cancelled.status).toBe("cancelled");
      await expect(ctx.requestWorkflowService.cancel(seed.staff, created.id)).rejects.toBeInstanceOf(
        StateConflictError
      );
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("sorts visible requests into the actor's queues", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      const pendingManager = await ctx.requestWorkflowService.create(seed.staff, {
        categoryId: seed.laptops.id,
        justification: "Travel"
      });
      const pendingIct = await ctx.requestWorkflowService.create(seed.coreStaff, {
        categoryId: seed.laptops.id,
        justification: "Onboarding"
      });
      await ctx.requestWorkflowService.approve(seed.opsManager, pendingIct.id);

      const headQueues = await ctx.requestWorkflowService.listForActor(seed.unitHead);
      expect(headQueues.awaitingApproval.map((request) => request.id)).toEqual([pendingManager.id]);
      expect(headQueues.awaitingAssignment).toEqual([]);

      const custodianQueues = await ctx.requestWorkflowService.listForActor(seed.custodian);
      expect(custodianQueues.awaitingAssignment.map((request) => request.id)).toEqual([pendingIct.id]);

      const staffQueues = await ctx.requestWorkflowService.listForActor(seed.staff);
      expect(staffQueues.mine.map((request) => request.id)).toEqual([pendingManager.id]);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });

  it("blocks non-superusers while asset management is disabled", async () => {
    const { ctx, baseDir } = makeContext();
    try {
      const seed = await seedAgency(ctx);
      await ctx.organizationService.updateConfig(seed.root, seed.agencyId, { assetMgmtEnabled: false });
      await expect(
        ctx.requestWorkflowService.create(seed.staff, { categoryId: seed.laptops.id, justification: "Travel" })
      ).rejects.toBeInstanceOf(AuthorizationError);
    } finally {
      await ctx.store.close?.();
      cleanup(baseDir);
    }
  });
});
