import { randomInt as cryptoRandomInt } from "node:crypto";
import { createId } from "../../lib/id.js";
import { nowIso, parseIsoDate } from "../../lib/time.js";
import {
  CrossEntityInconsistencyError,
  GenerationExhaustedError,
  NotFoundError,
  StateConflictError,
  ValidationError
} from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type {
  AgencyConfigRecord,
  AssetListFilter,
  AssetRecord,
  ProposedChanges,
  UserProfile
} from "../types/domain.js";
import { loadAgencyConfig } from "./agency-config.js";
import type { AuditLedgerService } from "./audit-ledger-service.js";
import type { RoleResolver } from "./role-resolver.js";

export const MAX_TAG_ATTEMPTS = 100;

/** Uniform integer in [min, max). */
export type RandomIntSource = (min: number, max: number) => number;

export interface AssetRegistryOptions {
  randomInt?: RandomIntSource | undefined;
  publicBaseUrl?: string | undefined;
}

export interface RegisterAssetInput {
  agencyId: string;
  categoryId: string;
  name: string;
  unitId?: string | null | undefined;
  serialNumber?: string | null | undefined;
  assetTag?: string | null | undefined;
  acquiredAt?: string | null | undefined;
  eolDueDate?: string | null | undefined;
}

function normalizeOptional(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export interface ReferenceMatch {
  asset: AssetRecord;
  via: "scan" | "tag";
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError("Lookup reference contains a malformed URL escape.");
  }
}

function requireDate(field: string, value: string | null | undefined): string | null {
  const normalized = normalizeOptional(value);
  if (normalized === null) {
    return null;
  }
  const parsed = parseIsoDate(normalized);
  if (!parsed) {
    throw new ValidationError(`${field} must be a valid YYYY-MM-DD date.`);
  }
  return parsed;
}

export class AssetRegistryService {
  private readonly randomInt: RandomIntSource;
  private readonly publicBaseUrl: string | null;

  constructor(
    private readonly store: PlatformStore,
    private readonly ledger: AuditLedgerService,
    private readonly roles: RoleResolver,
    options?: AssetRegistryOptions
  ) {
    this.randomInt = options?.randomInt ?? cryptoRandomInt;
    this.publicBaseUrl = normalizeOptional(options?.publicBaseUrl)?.replace(/\/+$/, "") ?? null;
  }

  async register(actor: UserProfile, input: RegisterAssetInput): Promise<AssetRecord> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError("Asset name is required.");
    }
    const unitId = normalizeOptional(input.unitId);
    const serialNumber = normalizeOptional(input.serialNumber);
    const requestedTag = normalizeOptional(input.assetTag);
    const acquiredAt = requireDate("acquiredAt", input.acquiredAt);
    const eolDueDate = requireDate("eolDueDate", input.eolDueDate);

    this.roles.requireSameAgency(actor, input.agencyId);

    return this.store.transaction(async (tx) => {
      const agency = await tx.getAgency(input.agencyId);
      if (!agency) {
        throw new NotFoundError(`Agency not found: ${input.agencyId}`);
      }
      await this.roles.requireAssetManagementEnabled(actor, agency.id, tx);
      await this.roles.requireCustodian(actor, { agencyId: agency.id, unitId, currentHolderId: null }, tx);

      const category = await tx.getCategory(input.categoryId);
      if (!category || category.agencyId !== agency.id) {
        throw new ValidationError(`Unknown category for this agency: ${input.categoryId}`);
      }
      if (unitId !== null) {
        const unit = await tx.getUnit(unitId);
        if (!unit || unit.agencyId !== agency.id) {
          throw new ValidationError(`Unknown unit for this agency: ${unitId}`);
        }
      }
      if (serialNumber !== null && (await tx.findAssetBySerial(agency.id, serialNumber))) {
        throw new ValidationError(`Serial number already registered: ${serialNumber}`);
      }
      if (requestedTag !== null && (await tx.findAssetByTag(agency.id, requestedTag))) {
        throw new ValidationError(`Asset tag already in use: ${requestedTag}`);
      }

      const config = await loadAgencyConfig(tx, agency.id);
      let assetTag = requestedTag;
      let tagGenerated = false;
      if (assetTag === null && config.assetTagAutoGenerate) {
        assetTag = await this.generateUniqueTag(tx, agency.id, config.assetTagPrefix, config.assetTagLength);
        tagGenerated = true;
      }

      const now = nowIso();
      const id = createId("ast");
      const asset: AssetRecord = {
        id,
        agencyId: agency.id,
        categoryId: category.id,
        unitId,
        name,
        serialNumber,
        assetTag,
        tagGenerated,
        status: "available",
        currentHolderId: null,
        qrPayload: this.buildQrPayload(agency.code, id, assetTag, config),
        acquiredAt,
        retiredAt: null,
        eolDueDate,
        version: 1,
        createdAt: now,
        updatedAt: now
      };
      await tx.insertAsset(asset);
      await this.ledger.append(tx, {
        agencyId: agency.id,
        assetId: asset.id,
        actorId: actor.id,
        event: "registered",
        note: "Asset registered.",
        meta: { assetTag, tagGenerated, serialNumber, categoryId: category.id, unitId }
      });
      return asset;
    });
  }

  /**
   * Draws random fixed-width numeric suffixes until one is free in the agency. Gives up after
   * {@link MAX_TAG_ATTEMPTS} draws.
   */
  async generateUniqueTag(store: PlatformStore, agencyId: string, prefix: string, length: number): Promise<string> {
    if (!Number.isInteger(length) || length < 1) {
      throw new ValidationError("Tag length must be a positive integer.");
    }
    for (let attempt = 0; attempt < MAX_TAG_ATTEMPTS; attempt += 1) {
      let digits = "";
      for (let index = 0; index < length; index += 1) {
        digits += String(this.randomInt(0, 10));
      }
      const candidate = `${prefix}${digits}`;
      if (!(await store.findAssetByTag(agencyId, candidate))) {
        return candidate;
      }
    }
    throw new GenerationExhaustedError(prefix, length, MAX_TAG_ATTEMPTS);
  }

  buildQrPayload(agencyCode: string, assetId: string, assetTag: string | null, config: AgencyConfigRecord): string {
    if (config.assetQrIncludeUrl && this.publicBaseUrl) {
      return `${this.publicBaseUrl}/assets/${assetId}`;
    }
    return `ASSET:${agencyCode}:${assetTag ?? assetId}`;
  }

  async retire(actor: UserProfile, assetId: string, note: string): Promise<AssetRecord> {
    return this.store.transaction(async (tx) => {
      const asset = await tx.lockAsset(assetId);
      if (!asset) {
        throw new NotFoundError(`Asset not found: ${assetId}`);
      }
      this.roles.requireSameAgency(actor, asset.agencyId);
      await this.roles.requireCustodian(actor, asset, tx);
      if (asset.status === "retired") {
        throw new StateConflictError("Asset is already retired.");
      }
      const openReturn = await tx.findOpenReturnForAsset(asset.id);
      if (openReturn) {
        throw new StateConflictError(`Asset has an open return request (${openReturn.id}); verify or cancel it first.`);
      }

      const now = nowIso();
      const updated = await tx.updateAsset({
        ...asset,
        status: "retired",
        currentHolderId: null,
        retiredAt: now.slice(0, 10),
        updatedAt: now
      });
      await this.ledger.append(tx, {
        agencyId: asset.agencyId,
        assetId: asset.id,
        actorId: actor.id,
        event: "retired",
        note: note.trim() || "Asset retired/disposed.",
        meta: { previousStatus: asset.status, previousHolderId: asset.currentHolderId }
      });
      return updated;
    });
  }

  /**
   * Writes the keys present in `diff` onto the asset inside the caller's transaction.
   * Referenced categories and units must exist in the asset's agency.
   */
  async applyChange(tx: PlatformStore, asset: AssetRecord, diff: ProposedChanges): Promise<AssetRecord> {
    const next: AssetRecord = { ...asset, updatedAt: nowIso() };

    if (diff.categoryId !== undefined) {
      const category = await tx.getCategory(diff.categoryId);
      if (!category || category.agencyId !== asset.agencyId) {
        throw new CrossEntityInconsistencyError(`Category does not exist in this agency: ${diff.categoryId}`);
      }
      next.categoryId = category.id;
    }
    if (diff.unitId !== undefined) {
      if (diff.unitId !== null) {
        const unit = await tx.getUnit(diff.unitId);
        if (!unit || unit.agencyId !== asset.agencyId) {
          throw new CrossEntityInconsistencyError(`Unit does not exist in this agency: ${diff.unitId}`);
        }
      }
      next.unitId = diff.unitId;
    }
    if (diff.name !== undefined) {
      next.name = diff.name;
    }
    if (diff.serialNumber !== undefined) {
      next.serialNumber = diff.serialNumber;
    }
    if (diff.assetTag !== undefined) {
      next.assetTag = diff.assetTag;
      next.tagGenerated = false;
    }
    if (diff.acquiredAt !== undefined) {
      next.acquiredAt = diff.acquiredAt;
    }
    if (diff.status !== undefined) {
      if (asset.status === "assigned") {
        throw new StateConflictError("Status of an assigned asset changes only through its return.");
      }
      next.status = diff.status;
      next.currentHolderId = null;
      next.retiredAt = diff.status === "retired" ? (asset.retiredAt ?? next.updatedAt.slice(0, 10)) : null;
    }

    return tx.updateAsset(next);
  }

  async getAsset(actor: UserProfile, assetId: string): Promise<AssetRecord> {
    const asset = await this.store.getAsset(assetId);
    if (!asset) {
      throw new NotFoundError(`Asset not found: ${assetId}`);
    }
    this.roles.requireSameAgency(actor, asset.agencyId);
    return asset;
  }

  /**
   * Custodians see every asset; the operations manager sees centrally managed assets; unit heads
   * and asset managers see their units. Everyone sees what they hold.
   */
  async listAssets(actor: UserProfile, agencyId: string, filter?: AssetListFilter): Promise<AssetRecord[]> {
    this.roles.requireSameAgency(actor, agencyId);
    const assets = await this.store.listAssetsByAgency(agencyId, filter);
    const visible: AssetRecord[] = [];
    for (const asset of assets) {
      const resolved = await this.roles.resolve(actor, asset);
      if (resolved.isCustodian || resolved.isAuthority || resolved.isHolder) {
        visible.push(asset);
      }
    }
    return visible;
  }

  /** Non-retired assets whose end-of-life date is on or before `asOf`. */
  async listEolDue(actor: UserProfile, agencyId: string, asOf: string): Promise<AssetRecord[]> {
    const cutoff = parseIsoDate(asOf);
    if (!cutoff) {
      throw new ValidationError("asOf must be a valid YYYY-MM-DD date.");
    }
    this.roles.requireSameAgency(actor, agencyId);
    await this.roles.requireCustodian(actor, { agencyId, unitId: null, currentHolderId: null });
    const assets = await this.store.listAssetsByAgency(agencyId);
    return assets
      .filter((asset) => asset.status !== "retired" && asset.eolDueDate !== null && asset.eolDueDate <= cutoff)
      .sort((a, b) => (a.eolDueDate ?? "").localeCompare(b.eolDueDate ?? ""));
  }

  /** Finds an asset by id, by tag, or by a scanned QR payload. */
  async lookup(actor: UserProfile, agencyId: string, reference: string): Promise<AssetRecord> {
    this.roles.requireSameAgency(actor, agencyId);
    const match = await this.resolveReference(agencyId, reference);
    if (!match) {
      throw new NotFoundError(`No asset matches reference: ${reference.trim()}`);
    }
    return match.asset;
  }

  /**
   * Resolves a typed tag or a scanned value (QR payload, asset URL or bare id) within one agency.
   * `via` is "scan" unless the reference matched as a plain tag. Tags match case-insensitively.
   */
  async resolveReference(
    agencyId: string,
    reference: string,
    reader: PlatformStore = this.store
  ): Promise<ReferenceMatch | undefined> {
    const trimmed = reference.trim();
    if (!trimmed) {
      throw new ValidationError("Lookup reference is required.");
    }

    const payloadMatch = /^ASSET:[^:]+:(.+)$/.exec(trimmed);
    if (payloadMatch?.[1]) {
      // Untagged assets carry their id in the payload.
      const byId = await reader.getAsset(payloadMatch[1]);
      const asset =
        byId && byId.agencyId === agencyId
          ? byId
          : await reader.findAssetByTag(agencyId, payloadMatch[1], { ignoreCase: true });
      if (asset) {
        return { asset, via: "scan" };
      }
    }
    const urlMatch = /\/assets\/([^/?#]+)\/?(?:[?#].*)?$/.exec(trimmed);
    if (urlMatch?.[1]) {
      const asset = await reader.getAsset(decodePathSegment(urlMatch[1]));
      if (asset && asset.agencyId === agencyId) {
        return { asset, via: "scan" };
      }
    }

    const byId = await reader.getAsset(trimmed);
    if (byId && byId.agencyId === agencyId) {
      return { asset: byId, via: "scan" };
    }
    const byTag = await reader.findAssetByTag(agencyId, trimmed, { ignoreCase: true });
    return byTag ? { asset: byTag, via: "tag" } : undefined;
  }
}
