import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, StateConflictError } from "../errors.js";
import { isOpenReturn, type PlatformStore } from "../store/platform-store.js";
import type { AssetRecord, AssetReturnRequestRecord, ExitRequestRecord, UserProfile } from "../types/domain.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { NotificationService } from "./notification-service.js";
import type { RoleResolver } from "./role-resolver.js";

export interface ReturnVerification {
  returnRequest: AssetReturnRequestRecord;
  asset: AssetRecord;
  clearedExitRequests: ExitRequestRecord[];
}

/**
 * Opens a pending_ict return for an assigned asset inside `tx`. Callers have already checked
 * who may return it; the one-open-return rule is enforced here.
 */
export async function openReturnRequest(
  tx: PlatformStore,
  ledger: AuditLedgerService,
  input: { asset: AssetRecord; requestedById: string; reason: string; exitRequestId: string | null }
): Promise<AssetReturnRequestRecord> {
  const { asset } = input;
  if (asset.status !== "assigned") {
    throw new StateConflictError("Only assigned assets can be returned.");
  }
  const existing = await tx.findOpenReturnForAsset(asset.id);
  if (existing) {
    throw new StateConflictError(`Return already pending for this asset (${existing.id}).`);
  }

  const now = nowIso();
  const returnRequest: AssetReturnRequestRecord = {
    id: createId("aret"),
    agencyId: asset.agencyId,
    assetId: asset.id,
    requestedById: input.requestedById,
    reason: input.reason,
    status: "pending_ict",
    exitRequestId: input.exitRequestId,
    verifiedById: null,
    verifiedAt: null,
    verificationNote: null,
    createdAt: now,
    updatedAt: now
  };
  await tx.saveReturnRequest(returnRequest);
  await ledger.append(tx, {
    agencyId: asset.agencyId,
    assetId: asset.id,
    actorId: input.requestedById,
    event: "return_initiated",
    note: input.reason || "Return initiated.",
    meta: { returnId: returnRequest.id, exitRequestId: input.exitRequestId }
  });
  return returnRequest;
}

export class ReturnWorkflowService {
  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    private readonly notifications: NotificationService
  ) {}

  async initiate(actor: UserProfile, assetId: string, reason: string): Promise<AssetReturnRequestRecord> {
    const { returnRequest, custodianIds } = await this.store.transaction(async (tx) => {
      const asset = await tx.lockAsset(assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${assetId}`);
      }
      this.roles.requireSameAgency(actor, asset.agencyId);
      await this.roles.requireAssetManagementEnabled(actor, asset.agencyId, tx);
      if (asset.currentHolderId !== actor.id && !actor.isSuperuser) {
        throw new AuthorizationError("You can only return an asset assigned to you.");
      }
      const opened = await openReturnRequest(tx, this.ledger, {
        asset,
        requestedById: actor.id,
        reason: reason.trim(),
        exitRequestId: null
      });
      return { returnRequest: opened, custodianIds: await this.roles.listCustodianIds(asset.agencyId, tx) };
    });

    this.notifications.dispatch({
      subject: `Asset Return ${returnRequest.id}: Pending ICT Verification`,
      recipientUserIds: custodianIds,
      templateId: "asset_return_initiated",
      context: { returnId: returnRequest.id, assetId: returnRequest.assetId, requestedById: returnRequest.requestedById }
    });
    return returnRequest;
  }

  async markInTransit(actor: UserProfile, returnId: string): Promise<AssetReturnRequestRecord> {
    return this.store.transaction(async (tx) => {
      const current = await this.loadReturn(tx, actor, returnId);
      const asset = await this.loadAsset(tx, current.assetId);
      if (current.requestedById !== actor.id) {
        await this.roles.requireCustodian(actor, asset, tx);
      }
      if (current.status !== "pending_ict") {
        throw new StateConflictError("Only returns awaiting ICT can be marked in transit.");
      }

      const updated: AssetReturnRequestRecord = { ...current, status: "in_transit", updatedAt: nowIso() };
      await tx.saveReturnRequest(updated);
      await this.ledger.append(tx, {
        agencyId: updated.agencyId,
        assetId: updated.assetId,
        actorId: actor.id,
        event: "return_in_transit",
        note: "Asset handed over for return.",
        meta: { returnId: updated.id }
      });
      return updated;
    });
  }

  /**
   * Puts the asset back in the pool. When this closes the requester's last open return,
   * any exit request of theirs still in progress is cleared in the same transaction.
   */
  async verifyReceived(actor: UserProfile, returnId: string, note: string): Promise<ReturnVerification> {
    const result = await this.store.transaction(async (tx) => {
      const current = await this.loadReturn(tx, actor, returnId);
      if (!isOpenReturn(current.status)) {
        throw new StateConflictError("This return request is already processed.");
      }
      const asset = await tx.lockAsset(current.assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${current.assetId}`);
      }
      await this.roles.requireCustodian(actor, asset, tx);

      const now = nowIso();
      const trimmedNote = note.trim();
      const restored = await tx.updateAsset({ ...asset, status: "available", currentHolderId: null, updatedAt: now });
      const received: AssetReturnRequestRecord = {
        ...current,
        status: "received",
        verifiedById: actor.id,
        verifiedAt: now,
        verificationNote: trimmedNote || null,
        updatedAt: now
      };
      await tx.saveReturnRequest(received);
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "return_received",
        note: trimmedNote || `ICT verified receipt for return ${received.id}. Asset returned to pool.`,
        meta: { returnId: received.id, previousHolderId: asset.currentHolderId }
      });

      const clearedExitRequests: ExitRequestRecord[] = [];
      const stillOpen = await tx.listOpenReturnsByRequester(received.agencyId, received.requestedById);
      if (stillOpen.length === 0) {
        for (const exit of await tx.listActiveExitRequests(received.agencyId, received.requestedById)) {
          const cleared: ExitRequestRecord = {
            ...exit,
            status: "cleared",
            clearedAt: now,
            clearedById: actor.id,
            updatedAt: now
          };
          await tx.saveExitRequest(cleared);
          await this.ledger.append(tx, {
            agencyId: cleared.agencyId,
            assetId: null,
            actorId: actor.id,
            event: "exit_cleared",
            note: `Exit request ${cleared.id} cleared after final return.`,
            meta: { exitRequestId: cleared.id, userId: cleared.userId, returnId: received.id }
          });
          clearedExitRequests.push(cleared);
        }
      }
      return { returnRequest: received, asset: restored, clearedExitRequests };
    });

    this.notifications.dispatch({
      subject: `Asset Return ${result.returnRequest.id}: Received by ICT`,
      recipientUserIds: [result.returnRequest.requestedById],
      templateId: "asset_return_received",
      context: { returnId: result.returnRequest.id, assetId: result.asset.id, verifiedBy: actor.displayName }
    });
    return result;
  }

  async cancel(actor: UserProfile, returnId: string): Promise<AssetReturnRequestRecord> {
    return this.store.transaction(async (tx) => {
      const current = await this.loadReturn(tx, actor, returnId);
      if (current.requestedById !== actor.id && !actor.isSuperuser) {
        throw new AuthorizationError("You can only cancel your own return request.");
      }
      if (!isOpenReturn(current.status)) {
        throw new StateConflictError("This return request can no longer be cancelled.");
      }

      const cancelled: AssetReturnRequestRecord = { ...current, status: "cancelled", updatedAt: nowIso() };
      await tx.saveReturnRequest(cancelled);
      await this.ledger.append(tx, {
        agencyId: cancelled.agencyId,
        assetId: cancelled.assetId,
        actorId: actor.id,
        event: "return_cancelled",
        note: `Return ${cancelled.id} cancelled by requester.`,
        meta: { returnId: cancelled.id }
      });
      return cancelled;
    });
  }

  async listOpen(actor: UserProfile, agencyId: string): Promise<AssetReturnRequestRecord[]> {
    this.roles.requireSameAgency(actor, agencyId);
    const returns = await this.store.listReturnRequestsByAgency(agencyId);
    const open = returns.filter((entry) => isOpenReturn(entry.status));
    const roles = await this.roles.resolve(actor, { agencyId, unitId: null, currentHolderId: null });
    return roles.isCustodian ? open : open.filter((entry) => entry.requestedById === actor.id);
  }

  private async loadReturn(tx: PlatformStore, actor: UserProfile, returnId: string): Promise<AssetReturnRequestRecord> {
    const returnRequest = await tx.getReturnRequest(returnId);
    if (!returnRequest) {
      throw new NotFoundError(`Return request not found: ${returnId}`);
    }
    this.roles.requireSameAgency(actor, returnRequest.agencyId);
    return returnRequest;
  }

  private async loadAsset(tx: PlatformStore, assetId: string): Promise<AssetRecord> {
    const asset = await tx.getAsset(assetId);
    if (!asset) {
      throw new NotFoundError(`Asset not found: ${assetId}`);
    }
    return asset;
  }
}
