import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { NotFoundError, StateConflictError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type {
  AssetReturnRequestRecord,
  CommunicationLineRecord,
  ExitReason,
  ExitRequestRecord,
  UserProfile
} from "../types/domain.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { NotificationDispatch, NotificationService } from "./notification-service.js";
import { openReturnRequest } from "./return-workflow-service.js";
import type { RoleResolver } from "./role-resolver.js";

export const EXIT_CONFIRMATION_TOKEN = "CONFIRM";

const EXIT_REASONS: readonly ExitReason[] = ["resigned", "reassigned"];

export interface ExitOrganizationInput {
  reason: string;
  typedConfirmation: string;
}

export interface ExitCascadeResult {
  exitRequest: ExitRequestRecord;
  returnRequests: AssetReturnRequestRecord[];
  skippedAssetIds: string[];
  suspendedLines: CommunicationLineRecord[];
}

function isExitReason(value: string): value is ExitReason {
  return EXIT_REASONS.some((reason) => reason === value);
}

export class OffboardingService {
  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    private readonly notifications: NotificationService
  ) {}

  /**
   * Records that `user` is leaving: opens a return for every asset they hold (skipping assets
   * that already have one) and suspends their assigned lines, all in one transaction.
   * Notifications go out only after commit.
   */
  async exitOrganization(user: UserProfile, input: ExitOrganizationInput): Promise<ExitCascadeResult> {
    if (input.typedConfirmation.trim() !== EXIT_CONFIRMATION_TOKEN) {
      throw new ValidationError(`You must type ${EXIT_CONFIRMATION_TOKEN} (in capital letters) to proceed.`);
    }
    const reason = input.reason.trim();
    if (!isExitReason(reason)) {
      throw new ValidationError("Exit reason must be 'resigned' or 'reassigned'.");
    }
    const agencyId = user.agencyId;

    const { result, outbox } = await this.store.transaction(async (tx) => {
      if ((await tx.listActiveExitRequests(agencyId, user.id)).length > 0) {
        throw new StateConflictError("An exit request is already in progress for this user.");
      }

      const now = nowIso();
      const exitId = createId("exit");
      await this.ledger.append(tx, {
        agencyId,
        assetId: null,
        actorId: user.id,
        event: "exit_initiated",
        note: `Exit organization (${reason}).`,
        meta: { exitRequestId: exitId, reason }
      });

      const returnRequests: AssetReturnRequestRecord[] = [];
      const skippedAssetIds: string[] = [];
      const held = await tx.listAssetsByAgency(agencyId, { holderId: user.id, status: "assigned" });
      for (const candidate of held) {
        const asset = await tx.lockAsset(candidate.id);
        if (!asset || asset.status !== "assigned" || asset.currentHolderId !== user.id) {
          continue;
        }
        if (await tx.findOpenReturnForAsset(asset.id)) {
          skippedAssetIds.push(asset.id);
          continue;
        }
        returnRequests.push(
          await openReturnRequest(tx, this.ledger, {
            asset,
            requestedById: user.id,
            reason: `Exit Organization (${reason})`,
            exitRequestId: exitId
          })
        );
      }

      const suspendedLines: CommunicationLineRecord[] = [];
      for (const line of await tx.listCommunicationLinesByAssignee(agencyId, user.id, "assigned")) {
        const suspended: CommunicationLineRecord = { ...line, status: "suspended", suspendedAt: now, updatedAt: now };
        await tx.saveCommunicationLine(suspended);
        await this.ledger.append(tx, {
          agencyId,
          assetId: null,
          actorId: user.id,
          event: "line_suspended",
          note: `Line ${line.msisdn} suspended on exit.`,
          meta: { exitRequestId: exitId, lineId: line.id, msisdn: line.msisdn }
        });
        suspendedLines.push(suspended);
      }

      // Nothing left to hand back: skip pending_returns and wait for the custodian's confirmation.
      const openReturns = await tx.listOpenReturnsByRequester(agencyId, user.id);
      const exitRequest: ExitRequestRecord = {
        id: exitId,
        agencyId,
        userId: user.id,
        reason,
        status: openReturns.length > 0 ? "pending_returns" : "pending_ict_confirmation",
        returnRequestIds: returnRequests.map((entry) => entry.id),
        suspendedLineIds: suspendedLines.map((line) => line.id),
        createdAt: now,
        updatedAt: now,
        clearedAt: null,
        clearedById: null
      };
      await tx.saveExitRequest(exitRequest);

      const result: ExitCascadeResult = { exitRequest, returnRequests, skippedAssetIds, suspendedLines };
      return { result, outbox: await this.buildNotifications(tx, user, result) };
    });

    for (const message of outbox) {
      this.notifications.dispatch(message);
    }
    return result;
  }

  /** Custodian sign-off for an exit that has no returns left open. */
  async confirmClearance(actor: UserProfile, exitId: string): Promise<ExitRequestRecord> {
    return this.store.transaction(async (tx) => {
      const exit = await tx.getExitRequest(exitId);
      if (!exit) {
        throw new NotFoundError(`Exit request not found: ${exitId}`);
      }
      this.roles.requireSameAgency(actor, exit.agencyId);
      await this.roles.requireCustodian(actor, { agencyId: exit.agencyId, unitId: null, currentHolderId: null }, tx);
      if (exit.status === "cleared") {
        throw new StateConflictError("This exit request is already cleared.");
      }
      const openReturns = await tx.listOpenReturnsByRequester(exit.agencyId, exit.userId);
      if (openReturns.length > 0) {
        throw new StateConflictError(`${openReturns.length} return request(s) are still open for this user.`);
      }

      const now = nowIso();
      const cleared: ExitRequestRecord = {
        ...exit,
        status: "cleared",
        clearedAt: now,
        clearedById: actor.id,
        updatedAt: now
      };
      await tx.saveExitRequest(cleared);
      await this.ledger.append(tx, {
        agencyId: exit.agencyId,
        assetId: null,
        actorId: actor.id,
        event: "exit_cleared",
        note: `Exit request ${exit.id} cleared by ICT.`,
        meta: { exitRequestId: exit.id, userId: exit.userId }
      });
      return cleared;
    });
  }

  async getExitRequest(actor: UserProfile, exitId: string): Promise<ExitRequestRecord> {
    const exit = await this.store.getExitRequest(exitId);
    if (!exit) {
      throw new NotFoundError(`Exit request not found: ${exitId}`);
    }
    this.roles.requireSameAgency(actor, exit.agencyId);
    if (exit.userId !== actor.id) {
      await this.roles.requireCustodian(actor, { agencyId: exit.agencyId, unitId: null, currentHolderId: null });
    }
    return exit;
  }

  private async buildNotifications(
    tx: PlatformStore,
    user: UserProfile,
    result: ExitCascadeResult
  ): Promise<NotificationDispatch[]> {
    const unit = user.unitId ? await tx.getUnit(user.unitId) : undefined;
    const roles = await tx.getAssetRoles(user.agencyId);
    const context = {
      userId: user.id,
      displayName: user.displayName,
      exitRequestId: result.exitRequest.id,
      reason: result.exitRequest.reason,
      returnRequestIds: result.exitRequest.returnRequestIds,
      suspendedLines: result.suspendedLines.map((line) => line.msisdn)
    };
    const outbox: NotificationDispatch[] = [
      {
        subject: `Exit Notice: ${user.displayName} (${result.exitRequest.reason})`,
        recipientUserIds: [unit?.unitHeadId, roles?.operationsManagerId, ...(roles?.ictCustodianIds ?? [])],
        templateId: "exit_submitted",
        context
      }
    ];
    if (result.suspendedLines.length > 0) {
      outbox.push({
        subject: `Action Required: Disable lines for ${user.displayName}`,
        recipientUserIds: roles?.lineProviderContactIds ?? [],
        templateId: "exit_disable_lines",
        context
      });
    }
    return outbox;
  }
}
