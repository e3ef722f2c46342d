import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type { AssetRecord, AssetRequestRecord, AssetRequestStatus, UserProfile } from "../types/domain.js";
import { loadAgencyConfig } from "./agency-config.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { NotificationDispatch, NotificationService } from "./notification-service.js";
import type { AssetPlacement, RoleResolver } from "./role-resolver.js";

export interface CreateAssetRequestInput {
  categoryId: string;
  unitId?: string | null | undefined;
  justification: string;
}

export interface AssetRequestQueues {
  mine: AssetRequestRecord[];
  awaitingApproval: AssetRequestRecord[];
  awaitingAssignment: AssetRequestRecord[];
}

const CANCELLABLE_STATUSES: readonly AssetRequestStatus[] = ["draft", "pending_manager", "pending_ict"];

function placementOf(request: AssetRequestRecord): AssetPlacement {
  return { agencyId: request.agencyId, unitId: request.unitId, currentHolderId: null };
}

function requestContext(request: AssetRequestRecord, extra?: Record<string, unknown>): Record<string, unknown> {
  return {
    requestId: request.id,
    agencyId: request.agencyId,
    requesterId: request.requesterId,
    categoryId: request.categoryId,
    unitId: request.unitId,
    status: request.status,
    ...extra
  };
}

export class RequestWorkflowService {
  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    private readonly notifications: NotificationService
  ) {}

  async create(requester: UserProfile, input: CreateAssetRequestInput): Promise<AssetRequestRecord> {
    const justification = input.justification.trim();
    if (!justification) {
      throw new ValidationError("A justification is required.");
    }

    const { request, outbox } = await this.store.transaction(async (tx) => {
      const agencyId = requester.agencyId;
      await this.roles.requireAssetManagementEnabled(requester, agencyId, tx);

      const category = await tx.getCategory(input.categoryId);
      if (!category || category.agencyId !== agencyId) {
        throw new ValidationError(`Unknown category for this agency: ${input.categoryId}`);
      }
      const unitId = input.unitId === undefined ? requester.unitId : input.unitId;
      if (unitId !== null) {
        const unit = await tx.getUnit(unitId);
        if (!unit || unit.agencyId !== agencyId) {
          throw new ValidationError(`Unknown unit for this agency: ${unitId}`);
        }
      }

      const config = await loadAgencyConfig(tx, agencyId);
      const now = nowIso();
      const created: AssetRequestRecord = {
        id: createId("areq"),
        agencyId,
        requesterId: requester.id,
        unitId,
        categoryId: category.id,
        justification,
        status: config.requireManagerApproval ? "pending_manager" : "pending_ict",
        assignedAssetId: null,
        approverId: null,
        approvedAt: null,
        rejectionReason: null,
        assignedById: null,
        assignedAt: null,
        receivedAt: null,
        cancelledAt: null,
        createdAt: now,
        updatedAt: now
      };
      await tx.saveAssetRequest(created);
      await this.ledger.append(tx, {
        agencyId,
        assetId: null,
        actorId: requester.id,
        event: "request_submitted",
        note: `Asset request ${created.id} submitted.`,
        meta: { requestId: created.id, categoryId: created.categoryId, unitId, status: created.status }
      });

      const pendingManager = created.status === "pending_manager";
      const message: NotificationDispatch = pendingManager
        ? {
            subject: `Asset Request ${created.id}: Approval Required`,
            recipientUserIds: await this.roles.listAuthorityIds(placementOf(created), tx),
            templateId: "asset_request_submitted",
            context: requestContext(created)
          }
        : {
            subject: `Asset Request ${created.id}: Pending ICT Assignment`,
            recipientUserIds: await this.roles.listCustodianIds(agencyId, tx),
            templateId: "asset_request_pending_ict",
            context: requestContext(created, { approvedBy: "system" })
          };
      return { request: created, outbox: [message] };
    });

    this.flushOutbox(outbox);
    return request;
  }

  async approve(actor: UserProfile, requestId: string): Promise<AssetRequestRecord> {
    const { request, outbox } = await this.store.transaction(async (tx) => {
      const current = await this.loadRequest(tx, actor, requestId);
      if (current.status !== "pending_manager") {
        throw new StateConflictError("This request is already processed.");
      }
      await this.roles.requireAuthority(actor, placementOf(current), tx);

      const now = nowIso();
      const approved: AssetRequestRecord = {
        ...current,
        status: "pending_ict",
        approverId: actor.id,
        approvedAt: now,
        updatedAt: now
      };
      await tx.saveAssetRequest(approved);
      await this.ledger.append(tx, {
        agencyId: approved.agencyId,
        assetId: null,
        actorId: actor.id,
        event: "request_approved",
        note: `Asset request ${approved.id} approved.`,
        meta: { requestId: approved.id }
      });

      const context = requestContext(approved, { approvedBy: actor.displayName });
      return {
        request: approved,
        outbox: [
          {
            subject: `Asset Request ${approved.id}: Approved`,
            recipientUserIds: [approved.requesterId],
            templateId: "asset_request_approved",
            context
          },
          {
            subject: `Asset Request ${approved.id}: Pending ICT Assignment`,
            recipientUserIds: await this.roles.listCustodianIds(approved.agencyId, tx),
            templateId: "asset_request_pending_ict",
            context
          }
        ]
      };
    });

    this.flushOutbox(outbox);
    return request;
  }

  async reject(actor: UserProfile, requestId: string, reason: string): Promise<AssetRequestRecord> {
    const trimmedReason = reason.trim();
    if (!trimmedReason) {
      throw new ValidationError("A rejection reason is required.");
    }

    const request = await this.store.transaction(async (tx) => {
      const current = await this.loadRequest(tx, actor, requestId);
      if (current.status !== "pending_manager") {
        throw new StateConflictError("This request is already processed.");
      }
      await this.roles.requireAuthority(actor, placementOf(current), tx);

      const rejected: AssetRequestRecord = {
        ...current,
        status: "rejected",
        approverId: actor.id,
        rejectionReason: trimmedReason,
        updatedAt: nowIso()
      };
      await tx.saveAssetRequest(rejected);
      await this.ledger.append(tx, {
        agencyId: rejected.agencyId,
        assetId: null,
        actorId: actor.id,
        event: "request_rejected",
        note: trimmedReason,
        meta: { requestId: rejected.id }
      });
      return rejected;
    });

    this.notifications.dispatch({
      subject: `Asset Request ${request.id}: Rejected`,
      recipientUserIds: [request.requesterId],
      templateId: "asset_request_rejected",
      context: requestContext(request, { rejectedBy: actor.displayName, reason: trimmedReason })
    });
    return request;
  }

  /**
   * Hands an available asset of the requested category to the requester. The asset row is
   * locked and written through its version, so two assignments of one asset cannot both succeed.
   */
  async assignAsset(
    actor: UserProfile,
    requestId: string,
    assetId: string
  ): Promise<{ request: AssetRequestRecord; asset: AssetRecord }> {
    const result = await this.store.transaction(async (tx) => {
      const current = await this.loadRequest(tx, actor, requestId);
      if (current.status !== "pending_ict") {
        throw new StateConflictError("This request is not awaiting assignment.");
      }
      await this.roles.requireCustodian(actor, placementOf(current), tx);

      const asset = await tx.lockAsset(assetId);
      if (!asset || asset.agencyId !== current.agencyId) {
        throw new NotFoundError(`Asset not found: ${assetId}`);
      }
      if (asset.status !== "available") {
        throw new StateConflictError("Selected asset is not available.");
      }
      if (asset.categoryId !== current.categoryId) {
        throw new ValidationError("Asset category does not match the request category.");
      }

      const now = nowIso();
      const assignedAsset = await tx.updateAsset({
        ...asset,
        status: "assigned",
        currentHolderId: current.requesterId,
        updatedAt: now
      });
      const assigned: AssetRequestRecord = {
        ...current,
        status: "assigned",
        assignedAssetId: asset.id,
        assignedById: actor.id,
        assignedAt: now,
        updatedAt: now
      };
      await tx.saveAssetRequest(assigned);
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "assigned",
        note: `Assigned to ${current.requesterId}.`,
        meta: { requestId: assigned.id, holderId: current.requesterId }
      });
      return { request: assigned, asset: assignedAsset };
    });

    this.notifications.dispatch({
      subject: `Asset Request ${result.request.id}: Asset Assigned`,
      recipientUserIds: [result.request.requesterId],
      templateId: "asset_assigned",
      context: requestContext(result.request, {
        assetId: result.asset.id,
        assetTag: result.asset.assetTag,
        assignedBy: actor.displayName
      })
    });
    return result;
  }

  async verifyReceipt(actor: UserProfile, requestId: string): Promise<AssetRequestRecord> {
    const { request, outbox } = await this.store.transaction(async (tx) => {
      const current = await this.loadRequest(tx, actor, requestId);
      if (current.requesterId !== actor.id) {
        throw new AuthorizationError("You can only verify your own request.");
      }
      if (current.status !== "assigned") {
        throw new StateConflictError("This request is not ready for verification.");
      }

      const now = nowIso();
      const received: AssetRequestRecord = { ...current, status: "received", receivedAt: now, updatedAt: now };
      await tx.saveAssetRequest(received);
      await this.ledger.append(tx, {
        agencyId: received.agencyId,
        assetId: received.assignedAssetId,
        actorId: actor.id,
        event: "receipt_verified",
        note: "Requester verified receipt.",
        meta: { requestId: received.id }
      });
      return {
        request: received,
        outbox: [
          {
            subject: `Asset Request ${received.id}: Receipt Verified`,
            recipientUserIds: await this.roles.listCustodianIds(received.agencyId, tx),
            templateId: "asset_receipt_verified",
            context: requestContext(received, { assetId: received.assignedAssetId })
          }
        ]
      };
    });

    this.flushOutbox(outbox);
    return request;
  }

  async cancel(actor: UserProfile, requestId: string): Promise<AssetRequestRecord> {
    return this.store.transaction(async (tx) => {
      const current = await this.loadRequest(tx, actor, requestId);
      if (current.requesterId !== actor.id && !actor.isSuperuser) {
        throw new AuthorizationError("Only the requester may cancel this request.");
      }
      if (!CANCELLABLE_STATUSES.includes(current.status)) {
        throw new StateConflictError("This request can no longer be cancelled; return the asset instead.");
      }

      const now = nowIso();
      const cancelled: AssetRequestRecord = { ...current, status: "cancelled", cancelledAt: now, updatedAt: now };
      await tx.saveAssetRequest(cancelled);
      await this.ledger.append(tx, {
        agencyId: cancelled.agencyId,
        assetId: null,
        actorId: actor.id,
        event: "request_cancelled",
        note: `Asset request ${cancelled.id} cancelled.`,
        meta: { requestId: cancelled.id, previousStatus: current.status }
      });
      return cancelled;
    });
  }

  async getRequest(actor: UserProfile, requestId: string): Promise<AssetRequestRecord> {
    const request = await this.loadRequest(this.store, actor, requestId);
    if (request.requesterId === actor.id) {
      return request;
    }
    const resolved = await this.roles.resolve(actor, placementOf(request));
    if (!resolved.isAuthority && !resolved.isCustodian) {
      throw new AuthorizationError("You may not view this request.");
    }
    return request;
  }

  async listForActor(actor: UserProfile): Promise<AssetRequestQueues> {
    const requests = await this.store.listAssetRequestsByAgency(actor.agencyId);
    const queues: AssetRequestQueues = { mine: [], awaitingApproval: [], awaitingAssignment: [] };
    for (const request of requests) {
      if (request.requesterId === actor.id) {
        queues.mine.push(request);
      }
      if (request.status !== "pending_manager" && request.status !== "pending_ict") {
        continue;
      }
      const resolved = await this.roles.resolve(actor, placementOf(request));
      if (request.status === "pending_manager" && resolved.isAuthority) {
        queues.awaitingApproval.push(request);
      }
      if (request.status === "pending_ict" && resolved.isCustodian) {
        queues.awaitingAssignment.push(request);
      }
    }
    return queues;
  }

  private async loadRequest(reader: PlatformStore, actor: UserProfile, requestId: string): Promise<AssetRequestRecord> {
    const request = await reader.getAssetRequest(requestId);
    if (!request) {
      throw new NotFoundError(`Asset request not found: ${requestId}`);
    }
    this.roles.requireSameAgency(actor, request.agencyId);
    return request;
  }

  private flushOutbox(outbox: NotificationDispatch[]): void {
    for (const message of outbox) {
      this.notifications.dispatch(message);
    }
  }
}
