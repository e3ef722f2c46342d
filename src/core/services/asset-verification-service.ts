import { createId } from "../../lib/id.js";
import { nowIso, parseIsoDate } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type {
  AssetRecord,
  AssetVerificationRecord,
  UserProfile,
  VerificationMethod
} from "../types/domain.js";
import type { AssetRegistryService } from "./asset-registry-service.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { RoleResolver } from "./role-resolver.js";

export interface VerifyAssetInput {
  reference: string;
  method?: VerificationMethod | undefined;
  note?: string | undefined;
  location?: string | undefined;
}

export interface VerificationListQuery {
  /** Case-insensitive substring of the asset's tag or of what was entered. */
  tag?: string | undefined;
  unitId?: string | undefined;
  categoryId?: string | undefined;
  verifiedById?: string | undefined;
  from?: string | undefined;
  to?: string | undefined;
  limit?: number | undefined;
}

export interface VerificationView extends AssetVerificationRecord {
  asset: Pick<AssetRecord, "id" | "name" | "assetTag" | "unitId" | "categoryId" | "status">;
}

interface VerifierScope {
  isCustodian: boolean;
  isOperationsManager: boolean;
  managedUnitIds: Set<string>;
}

function optionalDate(field: string, value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new ValidationError(`${field} must be a valid YYYY-MM-DD date.`);
  }
  return parsed;
}

/**
 * Physical verification of assets. Custodians may verify anything in their agency; the operations
 * manager verifies centrally managed assets; unit heads and asset managers verify their units.
 */
export class AssetVerificationService {
  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    private readonly registry: AssetRegistryService
  ) {}

  async verify(actor: UserProfile, agencyId: string, input: VerifyAssetInput): Promise<AssetVerificationRecord> {
    this.roles.requireSameAgency(actor, agencyId);
    return this.store.transaction(async (tx) => {
      await this.roles.requireAssetManagementEnabled(actor, agencyId, tx);
      const scope = await this.requireVerifier(actor, agencyId, tx);

      const match = await this.registry.resolveReference(agencyId, input.reference, tx);
      if (!match) {
        throw new NotFoundError(`No asset found for tag: ${input.reference.trim()}`);
      }
      const { asset, via } = match;
      if (!(await this.inScope(actor, scope, asset, tx))) {
        throw new AuthorizationError("This asset is outside the scope you may verify.");
      }

      const verification: AssetVerificationRecord = {
        id: createId("aver"),
        agencyId,
        assetId: asset.id,
        verifiedById: actor.id,
        verifiedAt: nowIso(),
        method: via === "scan" ? "scan" : (input.method ?? "manual"),
        tagEntered: via === "scan" ? asset.id : input.reference.trim(),
        note: input.note?.trim() ?? "",
        location: input.location?.trim() ?? ""
      };
      await tx.saveAssetVerification(verification);
      await this.ledger.append(tx, {
        agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "verified",
        note: verification.note,
        meta: { method: verification.method, location: verification.location, verificationId: verification.id }
      });
      return verification;
    });
  }

  async listVerifications(
    actor: UserProfile,
    agencyId: string,
    query: VerificationListQuery = {}
  ): Promise<VerificationView[]> {
    this.roles.requireSameAgency(actor, agencyId);
    await this.roles.requireAssetManagementEnabled(actor, agencyId);
    const scope = await this.requireVerifier(actor, agencyId, this.store);

    const records = await this.store.listAssetVerifications({
      agencyId,
      verifiedById: query.verifiedById,
      fromDate: optionalDate("from", query.from),
      toDate: optionalDate("to", query.to)
    });
    const needle = query.tag?.trim().toLowerCase();
    const limit = Math.min(1000, Math.max(1, query.limit ?? 200));
    const assets = new Map<string, AssetRecord | undefined>();
    const items: VerificationView[] = [];

    for (const record of records) {
      if (items.length >= limit) {
        break;
      }
      if (!assets.has(record.assetId)) {
        assets.set(record.assetId, await this.store.getAsset(record.assetId));
      }
      const asset = assets.get(record.assetId);
      if (!asset) {
        continue;
      }
      if (query.unitId && asset.unitId !== query.unitId) {
        continue;
      }
      if (query.categoryId && asset.categoryId !== query.categoryId) {
        continue;
      }
      if (
        needle &&
        !(asset.assetTag ?? "").toLowerCase().includes(needle) &&
        !record.tagEntered.toLowerCase().includes(needle)
      ) {
        continue;
      }
      if (!(await this.inScope(actor, scope, asset, this.store))) {
        continue;
      }
      items.push({
        ...record,
        asset: {
          id: asset.id,
          name: asset.name,
          assetTag: asset.assetTag,
          unitId: asset.unitId,
          categoryId: asset.categoryId,
          status: asset.status
        }
      });
    }
    return items;
  }

  private async requireVerifier(actor: UserProfile, agencyId: string, reader: PlatformStore): Promise<VerifierScope> {
    const roles = await reader.getAssetRoles(agencyId);
    const units = await reader.listUnitsByAgency(agencyId);
    const scope: VerifierScope = {
      isCustodian: actor.isSuperuser || (roles?.ictCustodianIds.includes(actor.id) ?? false),
      isOperationsManager: actor.isSuperuser || roles?.operationsManagerId === actor.id,
      managedUnitIds: new Set(
        units
          .filter((unit) => unit.unitHeadId === actor.id || unit.assetManagerIds.includes(actor.id))
          .map((unit) => unit.id)
      )
    };
    if (!scope.isCustodian && !scope.isOperationsManager && scope.managedUnitIds.size === 0) {
      throw new AuthorizationError("You are not allowed to verify assets.");
    }
    return scope;
  }

  private async inScope(
    actor: UserProfile,
    scope: VerifierScope,
    asset: AssetRecord,
    reader: PlatformStore
  ): Promise<boolean> {
    if (scope.isCustodian) {
      return true;
    }
    if (asset.unitId !== null && scope.managedUnitIds.has(asset.unitId)) {
      return true;
    }
    // Centrally managed assets fall to the operations manager.
    return (await this.roles.resolve(actor, asset, reader)).isAuthority;
  }
}
