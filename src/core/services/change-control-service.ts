import { createId } from "../../lib/id.js";
import { nowIso, parseIsoDate } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type {
  AssetChangeRequestRecord,
  AssetRecord,
  ProposedChanges,
  UserProfile
} from "../types/domain.js";
import type { AssetRegistryService } from "./asset-registry-service.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { NotificationService } from "./notification-service.js";
import type { RoleResolver } from "./role-resolver.js";

export type ProposalResult =
  | { created: true; changeRequest: AssetChangeRequestRecord }
  | { created: false; changeRequest: null };

function optionalText(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Normalizes submitted edits; malformed values fail here rather than at approval. */
function normalizeEdits(edits: ProposedChanges): ProposedChanges {
  const normalized: ProposedChanges = {};
  if (edits.name !== undefined) {
    const name = edits.name.trim();
    if (!name) {
      throw new ValidationError("Asset name cannot be empty.");
    }
    normalized.name = name;
  }
  if (edits.status !== undefined) {
    normalized.status = edits.status;
  }
  if (edits.categoryId !== undefined) {
    normalized.categoryId = edits.categoryId;
  }
  if (edits.unitId !== undefined) {
    normalized.unitId = optionalText(edits.unitId);
  }
  if (edits.serialNumber !== undefined) {
    normalized.serialNumber = optionalText(edits.serialNumber);
  }
  if (edits.assetTag !== undefined) {
    normalized.assetTag = optionalText(edits.assetTag);
  }
  if (edits.acquiredAt !== undefined) {
    const raw = optionalText(edits.acquiredAt);
    if (raw === null) {
      normalized.acquiredAt = null;
    } else {
      const parsed = parseIsoDate(raw);
      if (!parsed) {
        throw new ValidationError(`acquiredAt is not a valid YYYY-MM-DD date: ${raw}`);
      }
      normalized.acquiredAt = parsed;
    }
  }
  return normalized;
}

/** Keeps only the edits whose value differs from the asset's current value. */
export function diffAgainstAsset(asset: AssetRecord, edits: ProposedChanges): ProposedChanges {
  const diff: ProposedChanges = {};
  if (edits.name !== undefined && edits.name !== asset.name) {
    diff.name = edits.name;
  }
  if (edits.status !== undefined && edits.status !== asset.status) {
    diff.status = edits.status;
  }
  if (edits.categoryId !== undefined && edits.categoryId !== asset.categoryId) {
    diff.categoryId = edits.categoryId;
  }
  if (edits.unitId !== undefined && edits.unitId !== asset.unitId) {
    diff.unitId = edits.unitId;
  }
  if (edits.serialNumber !== undefined && edits.serialNumber !== asset.serialNumber) {
    diff.serialNumber = edits.serialNumber;
  }
  if (edits.assetTag !== undefined && edits.assetTag !== asset.assetTag) {
    diff.assetTag = edits.assetTag;
  }
  if (edits.acquiredAt !== undefined && edits.acquiredAt !== asset.acquiredAt) {
    diff.acquiredAt = edits.acquiredAt;
  }
  return diff;
}

export class ChangeControlService {
  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    private readonly registry: AssetRegistryService,
    private readonly notifications: NotificationService
  ) {}

  async propose(actor: UserProfile, assetId: string, edits: ProposedChanges, reason: string): Promise<ProposalResult> {
    const normalized = normalizeEdits(edits);

    const outcome = await this.store.transaction(async (tx) => {
      const asset = await tx.getAsset(assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${assetId}`);
      }
      this.roles.requireSameAgency(actor, asset.agencyId);
      await this.roles.requireAssetManagementEnabled(actor, asset.agencyId, tx);
      await this.roles.requireCustodian(actor, asset, tx);
      if (asset.status === "retired") {
        throw new StateConflictError("Retired assets cannot be edited.");
      }

      const diff = diffAgainstAsset(asset, normalized);
      if (Object.keys(diff).length === 0) {
        return null;
      }
      await this.validateDiff(tx, asset, diff);

      const now = nowIso();
      const changeRequest: AssetChangeRequestRecord = {
        id: createId("achg"),
        agencyId: asset.agencyId,
        assetId: asset.id,
        requestedById: actor.id,
        proposedChanges: diff,
        reason: reason.trim(),
        status: "pending_manager",
        decidedById: null,
        decidedAt: null,
        decisionNote: "",
        createdAt: now,
        updatedAt: now
      };
      await tx.saveChangeRequest(changeRequest);
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "status_change",
        note: `Change request ${changeRequest.id} proposed.`,
        meta: { changeRequestId: changeRequest.id, stage: "proposed", proposedChanges: diff }
      });
      return { changeRequest, authorityIds: await this.roles.listAuthorityIds(asset, tx) };
    });

    if (!outcome) {
      return { created: false, changeRequest: null };
    }
    this.notifications.dispatch({
      subject: `Asset Change ${outcome.changeRequest.id}: Approval Required`,
      recipientUserIds: outcome.authorityIds,
      templateId: "asset_change_proposed",
      context: {
        changeRequestId: outcome.changeRequest.id,
        assetId: outcome.changeRequest.assetId,
        proposedChanges: outcome.changeRequest.proposedChanges
      }
    });
    return { created: true, changeRequest: outcome.changeRequest };
  }

  /** Applies the diff and closes the request in one transaction. */
  async approve(
    actor: UserProfile,
    changeRequestId: string,
    note: string
  ): Promise<{ changeRequest: AssetChangeRequestRecord; asset: AssetRecord }> {
    const result = await this.store.transaction(async (tx) => {
      const current = await this.loadPending(tx, actor, changeRequestId);
      const asset = await tx.lockAsset(current.assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${current.assetId}`);
      }
      await this.roles.requireAuthority(actor, asset, tx);
      if (asset.status === "retired") {
        throw new StateConflictError("Retired assets cannot be edited.");
      }

      const updated = await this.registry.applyChange(tx, asset, current.proposedChanges);
      const decided = this.decide(current, actor, "approved", note);
      await tx.saveChangeRequest(decided);
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "status_change",
        note: decided.decisionNote || `Change request ${decided.id} approved and applied.`,
        meta: { changeRequestId: decided.id, stage: "approved", appliedChanges: decided.proposedChanges }
      });
      return { changeRequest: decided, asset: updated };
    });

    this.notifyProposer(result.changeRequest, actor);
    return result;
  }

  async reject(actor: UserProfile, changeRequestId: string, note: string): Promise<AssetChangeRequestRecord> {
    const rejected = await this.store.transaction(async (tx) => {
      const current = await this.loadPending(tx, actor, changeRequestId);
      const asset = await tx.getAsset(current.assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${current.assetId}`);
      }
      await this.roles.requireAuthority(actor, asset, tx);

      const decided = this.decide(current, actor, "rejected", note);
      await tx.saveChangeRequest(decided);
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "status_change",
        note: decided.decisionNote || `Change request ${decided.id} rejected.`,
        meta: { changeRequestId: decided.id, stage: "rejected" }
      });
      return decided;
    });

    this.notifyProposer(rejected, actor);
    return rejected;
  }

  async cancel(actor: UserProfile, changeRequestId: string): Promise<AssetChangeRequestRecord> {
    return this.store.transaction(async (tx) => {
      const current = await this.loadPending(tx, actor, changeRequestId);
      if (current.requestedById !== actor.id && !actor.isSuperuser) {
        throw new AuthorizationError("Only the proposer may cancel this change request.");
      }

      const cancelled: AssetChangeRequestRecord = { ...current, status: "cancelled", updatedAt: nowIso() };
      await tx.saveChangeRequest(cancelled);
      await this.ledger.append(tx, {
        agencyId: cancelled.agencyId,
        assetId: cancelled.assetId,
        actorId: actor.id,
        event: "status_change",
        note: `Change request ${cancelled.id} cancelled.`,
        meta: { changeRequestId: cancelled.id, stage: "cancelled" }
      });
      return cancelled;
    });
  }

  async listForAsset(actor: UserProfile, assetId: string): Promise<AssetChangeRequestRecord[]> {
    const asset = await this.store.getAsset(assetId);
    if (!asset) {
      throw new NotFoundError(`Asset not found: ${assetId}`);
    }
    this.roles.requireSameAgency(actor, asset.agencyId);
    return this.store.listChangeRequestsByAsset(assetId);
  }

  private async validateDiff(tx: PlatformStore, asset: AssetRecord, diff: ProposedChanges): Promise<void> {
    if (diff.status !== undefined && asset.status === "assigned") {
      throw new StateConflictError("Status of an assigned asset changes only through its return.");
    }
    if (diff.categoryId !== undefined) {
      const category = await tx.getCategory(diff.categoryId);
      if (!category || category.agencyId !== asset.agencyId) {
        throw new ValidationError(`Unknown category for this agency: ${diff.categoryId}`);
      }
    }
    if (diff.unitId !== undefined && diff.unitId !== null) {
      const unit = await tx.getUnit(diff.unitId);
      if (!unit || unit.agencyId !== asset.agencyId) {
        throw new ValidationError(`Unknown unit for this agency: ${diff.unitId}`);
      }
    }
    if (diff.serialNumber !== undefined && diff.serialNumber !== null) {
      const clash = await tx.findAssetBySerial(asset.agencyId, diff.serialNumber);
      if (clash && clash.id !== asset.id) {
        throw new ValidationError(`Serial number already registered: ${diff.serialNumber}`);
      }
    }
    if (diff.assetTag !== undefined && diff.assetTag !== null) {
      const clash = await tx.findAssetByTag(asset.agencyId, diff.assetTag);
      if (clash && clash.id !== asset.id) {
        throw new ValidationError(`Asset tag already in use: ${diff.assetTag}`);
      }
    }
  }

  private async loadPending(tx: PlatformStore, actor: UserProfile, changeRequestId: string): Promise<AssetChangeRequestRecord> {
    const changeRequest = await tx.getChangeRequest(changeRequestId);
    if (!changeRequest) {
      throw new NotFoundError(`Change request not found: ${changeRequestId}`);
    }
    this.roles.requireSameAgency(actor, changeRequest.agencyId);
    if (changeRequest.status !== "pending_manager") {
      throw new StateConflictError("This change request is already processed.");
    }
    return changeRequest;
  }

  private decide(
    current: AssetChangeRequestRecord,
    actor: UserProfile,
    status: "approved" | "rejected",
    note: string
  ): AssetChangeRequestRecord {
    const now = nowIso();
    return { ...current, status, decidedById: actor.id, decidedAt: now, decisionNote: note.trim(), updatedAt: now };
  }

  private notifyProposer(changeRequest: AssetChangeRequestRecord, actor: UserProfile): void {
    this.notifications.dispatch({
      subject: `Asset Change ${changeRequest.id}: ${changeRequest.status === "approved" ? "Approved" : "Rejected"}`,
      recipientUserIds: [changeRequest.requestedById],
      templateId: `asset_change_${changeRequest.status}`,
      context: {
        changeRequestId: changeRequest.id,
        assetId: changeRequest.assetId,
        decidedBy: actor.displayName,
        decisionNote: changeRequest.decisionNote
      }
    });
  }
}
