import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type {
  AgencyAssetRolesRecord,
  AgencyConfigRecord,
  AgencyRecord,
  AssetCategoryRecord,
  UnitRecord,
  UserProfile
} from "../types/domain.js";
import { defaultAgencyConfig, loadAgencyConfig } from "./agency-config.js";

export interface UpsertUnitInput {
  id?: string | undefined;
  name: string;
  unitHeadId?: string | null | undefined;
  assetManagerIds?: string[] | undefined;
  isCoreUnit?: boolean | undefined;
}

export interface UpsertUserInput {
  id: string;
  unitId?: string | null | undefined;
  displayName: string;
  email?: string | null | undefined;
  isSuperuser?: boolean | undefined;
  active?: boolean | undefined;
}

export interface AssetRolesInput {
  operationsManagerId?: string | null | undefined;
  ictCustodianIds?: string[] | undefined;
  lineProviderContactIds?: string[] | undefined;
}

export type AgencyConfigPatch = Partial<Omit<AgencyConfigRecord, "agencyId" | "updatedAt">>;

function requireSuperuser(actor: UserProfile): void {
  if (!actor.isSuperuser) {
    throw new AuthorizationError("Only superusers may administer organizations.");
  }
}

function uniqueSorted(ids: string[]): string[] {
  return [...new Set(ids)].sort((a, b) => a.localeCompare(b));
}

/**
 * Provisions the tenant data the workflows read. Identity lives elsewhere; this is the seed
 * and administration path, open to superusers only.
 */
export class OrganizationService {
  constructor(private readonly store: PlatformStore) {}

  async createAgency(actor: UserProfile, code: string, name: string): Promise<AgencyRecord> {
    requireSuperuser(actor);
    return this.store.transaction(async (tx) => this.insertAgency(tx, code, name));
  }

  /**
   * First-run provisioning: creates an agency and its superuser on an empty store.
   * Returns null when any agency already exists.
   */
  async bootstrap(input: {
    agencyCode: string;
    agencyName: string;
    superuserId: string;
    displayName: string;
    email?: string | null | undefined;
  }): Promise<{ agency: AgencyRecord; superuser: UserProfile } | null> {
    return this.store.transaction(async (tx) => {
      if ((await tx.listAgencies()).length > 0) {
        return null;
      }
      const agency = await this.insertAgency(tx, input.agencyCode, input.agencyName);
      const superuser: UserProfile = {
        id: input.superuserId,
        agencyId: agency.id,
        unitId: null,
        displayName: input.displayName,
        email: input.email ?? null,
        isSuperuser: true,
        active: true
      };
      await tx.saveUser(superuser);
      return { agency, superuser };
    });
  }

  private async insertAgency(tx: PlatformStore, code: string, name: string): Promise<AgencyRecord> {
    const normalizedCode = code.trim().toUpperCase();
    if (!/^[A-Z0-9_-]{2,16}$/.test(normalizedCode)) {
      throw new ValidationError("Agency code must be 2-16 letters, digits, '-' or '_'.");
    }
    const existing = await tx.listAgencies();
    if (existing.some((agency) => agency.code === normalizedCode)) {
      throw new StateConflictError(`Agency code already in use: ${normalizedCode}`);
    }
    const now = nowIso();
    const agency: AgencyRecord = {
      id: createId("agy"),
      code: normalizedCode,
      name: name.trim(),
      createdAt: now,
      updatedAt: now
    };
    await tx.saveAgency(agency);
    await tx.saveAgencyConfig(defaultAgencyConfig(agency.id, now));
    await tx.saveAssetRoles({
      agencyId: agency.id,
      operationsManagerId: null,
      ictCustodianIds: [],
      lineProviderContactIds: [],
      updatedAt: now
    });
    return agency;
  }

  async listAgencies(actor: UserProfile): Promise<AgencyRecord[]> {
    const agencies = await this.store.listAgencies();
    return actor.isSuperuser ? agencies : agencies.filter((agency) => agency.id === actor.agencyId);
  }

  async upsertUnit(actor: UserProfile, agencyId: string, input: UpsertUnitInput): Promise<UnitRecord> {
    requireSuperuser(actor);
    return this.store.transaction(async (tx) => {
      await this.requireAgency(tx, agencyId);
      const existing = input.id ? await tx.getUnit(input.id) : undefined;
      if (existing && existing.agencyId !== agencyId) {
        throw new ValidationError(`Unit ${existing.id} belongs to another agency.`);
      }
      const unitHeadId = input.unitHeadId === undefined ? (existing?.unitHeadId ?? null) : input.unitHeadId;
      const assetManagerIds = uniqueSorted(input.assetManagerIds ?? existing?.assetManagerIds ?? []);
      await this.requireMembers(tx, agencyId, [...(unitHeadId ? [unitHeadId] : []), ...assetManagerIds]);

      const now = nowIso();
      const unit: UnitRecord = {
        id: existing?.id ?? input.id ?? createId("unit"),
        agencyId,
        name: input.name.trim(),
        unitHeadId,
        assetManagerIds,
        isCoreUnit: input.isCoreUnit ?? existing?.isCoreUnit ?? false,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now
      };
      await tx.saveUnit(unit);
      return unit;
    });
  }

  async upsertCategory(actor: UserProfile, agencyId: string, name: string, id?: string): Promise<AssetCategoryRecord> {
    requireSuperuser(actor);
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Category name is required.");
    }
    return this.store.transaction(async (tx) => {
      await this.requireAgency(tx, agencyId);
      const existing = id ? await tx.getCategory(id) : undefined;
      if (existing && existing.agencyId !== agencyId) {
        throw new ValidationError(`Category ${existing.id} belongs to another agency.`);
      }
      const category: AssetCategoryRecord = {
        id: existing?.id ?? id ?? createId("cat"),
        agencyId,
        name: trimmed,
        createdAt: existing?.createdAt ?? nowIso()
      };
      await tx.saveCategory(category);
      return category;
    });
  }

  async upsertUser(actor: UserProfile, agencyId: string, input: UpsertUserInput): Promise<UserProfile> {
    requireSuperuser(actor);
    return this.store.transaction(async (tx) => {
      await this.requireAgency(tx, agencyId);
      const existing = await tx.getUser(input.id);
      if (existing && existing.agencyId !== agencyId) {
        throw new ValidationError(`User ${existing.id} belongs to another agency.`);
      }
      const unitId = input.unitId === undefined ? (existing?.unitId ?? null) : input.unitId;
      if (unitId !== null) {
        const unit = await tx.getUnit(unitId);
        if (!unit || unit.agencyId !== agencyId) {
          throw new ValidationError(`Unknown unit for this agency: ${unitId}`);
        }
      }
      const user: UserProfile = {
        id: input.id,
        agencyId,
        unitId,
        displayName: input.displayName.trim(),
        email: input.email === undefined ? (existing?.email ?? null) : input.email?.trim() || null,
        isSuperuser: input.isSuperuser ?? existing?.isSuperuser ?? false,
        active: input.active ?? existing?.active ?? true
      };
      await tx.saveUser(user);
      return user;
    });
  }

  async setAssetRoles(actor: UserProfile, agencyId: string, input: AssetRolesInput): Promise<AgencyAssetRolesRecord> {
    requireSuperuser(actor);
    return this.store.transaction(async (tx) => {
      await this.requireAgency(tx, agencyId);
      const existing = await tx.getAssetRoles(agencyId);
      const operationsManagerId =
        input.operationsManagerId === undefined ? (existing?.operationsManagerId ?? null) : input.operationsManagerId;
      const ictCustodianIds = uniqueSorted(input.ictCustodianIds ?? existing?.ictCustodianIds ?? []);
      const lineProviderContactIds = uniqueSorted(
        input.lineProviderContactIds ?? existing?.lineProviderContactIds ?? []
      );
      await this.requireMembers(tx, agencyId, [
        ...(operationsManagerId ? [operationsManagerId] : []),
        ...ictCustodianIds,
        ...lineProviderContactIds
      ]);
      const roles: AgencyAssetRolesRecord = {
        agencyId,
        operationsManagerId,
        ictCustodianIds,
        lineProviderContactIds,
        updatedAt: nowIso()
      };
      await tx.saveAssetRoles(roles);
      return roles;
    });
  }

  async getConfig(actor: UserProfile, agencyId: string): Promise<AgencyConfigRecord> {
    if (!actor.isSuperuser && actor.agencyId !== agencyId) {
      throw new AuthorizationError("Cross-agency access is not permitted.");
    }
    await this.requireAgency(this.store, agencyId);
    return loadAgencyConfig(this.store, agencyId);
  }

  async updateConfig(actor: UserProfile, agencyId: string, patch: AgencyConfigPatch): Promise<AgencyConfigRecord> {
    requireSuperuser(actor);
    return this.store.transaction(async (tx) => {
      await this.requireAgency(tx, agencyId);
      const current = await loadAgencyConfig(tx, agencyId);
      const next: AgencyConfigRecord = { ...current, ...patch, agencyId, updatedAt: nowIso() };
      if (!Number.isInteger(next.assetTagLength) || next.assetTagLength < 1 || next.assetTagLength > 12) {
        throw new ValidationError("assetTagLength must be an integer between 1 and 12.");
      }
      await tx.saveAgencyConfig(next);
      return next;
    });
  }

  private async requireAgency(reader: PlatformStore, agencyId: string): Promise<AgencyRecord> {
    const agency = await reader.getAgency(agencyId);
    if (!agency) {
      throw new NotFoundError(`Agency not found: ${agencyId}`);
    }
    return agency;
  }

  private async requireMembers(tx: PlatformStore, agencyId: string, userIds: string[]): Promise<void> {
    for (const userId of new Set(userIds)) {
      const user = await tx.getUser(userId);
      if (!user || user.agencyId !== agencyId) {
        throw new ValidationError(`Unknown user for this agency: ${userId}`);
      }
    }
  }
}
