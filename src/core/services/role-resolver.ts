import { AuthorizationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type { UserProfile } from "../types/domain.js";
import { loadAgencyConfig } from "./agency-config.js";

/**
 * Where an asset sits in the organization. Requests are resolved through the same shape,
 * using their unit and no holder.
 */
export interface AssetPlacement {
  agencyId: string;
  unitId: string | null;
  currentHolderId: string | null;
}

export interface ResolvedRoles {
  isCustodian: boolean;
  isAuthority: boolean;
  isHolder: boolean;
}

export class RoleResolver {
  constructor(private readonly store: PlatformStore) {}

  /**
   * Computes the actor's standing toward `target` from the current organizational data.
   * Pass the transaction store when resolving inside a transaction.
   */
  async resolve(actor: UserProfile, target: AssetPlacement, reader: PlatformStore = this.store): Promise<ResolvedRoles> {
    const isHolder = target.currentHolderId !== null && actor.id === target.currentHolderId;
    if (actor.isSuperuser) {
      return { isCustodian: true, isAuthority: true, isHolder };
    }
    if (actor.agencyId !== target.agencyId) {
      return { isCustodian: false, isAuthority: false, isHolder };
    }

    const roles = await reader.getAssetRoles(target.agencyId);
    const isCustodian = roles?.ictCustodianIds.includes(actor.id) ?? false;

    let isAuthority = false;
    if (target.unitId === null) {
      isAuthority = roles?.operationsManagerId === actor.id;
    } else {
      const unit = await reader.getUnit(target.unitId);
      if (unit && unit.agencyId === target.agencyId) {
        isAuthority = unit.isCoreUnit
          ? roles?.operationsManagerId === actor.id
          : unit.unitHeadId === actor.id || unit.assetManagerIds.includes(actor.id);
      }
    }

    return { isCustodian, isAuthority, isHolder };
  }

  /** Users (superusers aside) who hold authority over `target`. Used to address notifications. */
  async listAuthorityIds(target: AssetPlacement, reader: PlatformStore = this.store): Promise<string[]> {
    if (target.unitId !== null) {
      const unit = await reader.getUnit(target.unitId);
      if (!unit || unit.agencyId !== target.agencyId) {
        return [];
      }
      if (!unit.isCoreUnit) {
        return [...(unit.unitHeadId ? [unit.unitHeadId] : []), ...unit.assetManagerIds];
      }
    }
    const roles = await reader.getAssetRoles(target.agencyId);
    return roles?.operationsManagerId ? [roles.operationsManagerId] : [];
  }

  async listCustodianIds(agencyId: string, reader: PlatformStore = this.store): Promise<string[]> {
    return (await reader.getAssetRoles(agencyId))?.ictCustodianIds ?? [];
  }

  async requireCustodian(actor: UserProfile, target: AssetPlacement, reader?: PlatformStore): Promise<ResolvedRoles> {
    const resolved = await this.resolve(actor, target, reader);
    if (!resolved.isCustodian) {
      throw new AuthorizationError("Only ICT custodians may perform this operation.");
    }
    return resolved;
  }

  async requireAuthority(actor: UserProfile, target: AssetPlacement, reader?: PlatformStore): Promise<ResolvedRoles> {
    const resolved = await this.resolve(actor, target, reader);
    if (!resolved.isAuthority) {
      throw new AuthorizationError("Only the approving manager for this asset may perform this operation.");
    }
    return resolved;
  }

  requireSameAgency(actor: UserProfile, agencyId: string): void {
    if (!actor.isSuperuser && actor.agencyId !== agencyId) {
      throw new AuthorizationError("Cross-agency access is not permitted.");
    }
  }

  async requireAssetManagementEnabled(
    actor: UserProfile,
    agencyId: string,
    reader: PlatformStore = this.store
  ): Promise<void> {
    if (actor.isSuperuser) {
      return;
    }
    const config = await loadAgencyConfig(reader, agencyId);
    if (!config.assetMgmtEnabled) {
      throw new AuthorizationError("Asset management is disabled for this agency.");
    }
  }
}
