import type { PlatformStore } from "../store/platform-store.js";
import type { AgencyConfigRecord } from "../types/domain.js";

export const DEFAULT_TAG_PREFIX = "AST-";
export const DEFAULT_TAG_LENGTH = 6;

export function defaultAgencyConfig(agencyId: string, updatedAt: string): AgencyConfigRecord {
  return {
    agencyId,
    assetMgmtEnabled: true,
    requireManagerApproval: true,
    assetTagAutoGenerate: true,
    assetTagPrefix: DEFAULT_TAG_PREFIX,
    assetTagLength: DEFAULT_TAG_LENGTH,
    assetQrIncludeUrl: false,
    updatedAt
  };
}

/** Agencies provisioned before their config row existed fall back to the defaults. */
export async function loadAgencyConfig(store: PlatformStore, agencyId: string): Promise<AgencyConfigRecord> {
  return (await store.getAgencyConfig(agencyId)) ?? defaultAgencyConfig(agencyId, new Date(0).toISOString());
}
