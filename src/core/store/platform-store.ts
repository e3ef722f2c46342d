import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { StateConflictError } from "../errors.js";
import {
  OPEN_RETURN_STATUSES,
  type AgencyAssetRolesRecord,
  type AgencyConfigRecord,
  type AgencyRecord,
  type AssetCategoryRecord,
  type AssetChangeRequestRecord,
  type AssetHistoryQuery,
  type AssetHistoryRecord,
  type AssetListFilter,
  type AssetRecord,
  type AssetRequestRecord,
  type AssetRequestStatus,
  type AssetReturnRequestRecord,
  type AssetVerificationQuery,
  type AssetVerificationRecord,
  type ChangeRequestStatus,
  type CommunicationLineRecord,
  type CommunicationLineStatus,
  type ExitRequestRecord,
  type PersistedState,
  type ReturnRequestStatus,
  type UnitRecord,
  type UserProfile
} from "../types/domain.js";

const defaultState: PersistedState = {
  agencies: [],
  agencyConfigs: [],
  units: [],
  assetRoles: [],
  users: [],
  categories: [],
  assets: [],
  assetRequests: [],
  returnRequests: [],
  changeRequests: [],
  history: [],
  exitRequests: [],
  communicationLines: [],
  assetVerifications: []
};

export interface PlatformStore {
  close?(): Promise<void>;

  /**
   * Runs `work` atomically. Writes made through `tx` become visible together on commit
   * and are discarded if `work` throws.
   */
  transaction<T>(work: (tx: PlatformStore) => Promise<T>): Promise<T>;

  getAgency(agencyId: string): Promise<AgencyRecord | undefined>;
  listAgencies(): Promise<AgencyRecord[]>;
  saveAgency(agency: AgencyRecord): Promise<void>;

  getAgencyConfig(agencyId: string): Promise<AgencyConfigRecord | undefined>;
  saveAgencyConfig(config: AgencyConfigRecord): Promise<void>;

  getUnit(unitId: string): Promise<UnitRecord | undefined>;
  listUnitsByAgency(agencyId: string): Promise<UnitRecord[]>;
  saveUnit(unit: UnitRecord): Promise<void>;

  getAssetRoles(agencyId: string): Promise<AgencyAssetRolesRecord | undefined>;
  saveAssetRoles(roles: AgencyAssetRolesRecord): Promise<void>;

  getUser(userId: string): Promise<UserProfile | undefined>;
  listUsersByAgency(agencyId: string): Promise<UserProfile[]>;
  saveUser(user: UserProfile): Promise<void>;

  getCategory(categoryId: string): Promise<AssetCategoryRecord | undefined>;
  listCategoriesByAgency(agencyId: string): Promise<AssetCategoryRecord[]>;
  saveCategory(category: AssetCategoryRecord): Promise<void>;

  getAsset(assetId: string): Promise<AssetRecord | undefined>;
  /** Reads an asset and holds a row lock on it until the surrounding transaction ends. */
  lockAsset(assetId: string): Promise<AssetRecord | undefined>;
  listAssetsByAgency(agencyId: string, filter?: AssetListFilter): Promise<AssetRecord[]>;
  /** Exact match unless `ignoreCase` is set, in which case an exact match still wins. */
  findAssetByTag(
    agencyId: string,
    assetTag: string,
    options?: { ignoreCase?: boolean }
  ): Promise<AssetRecord | undefined>;
  findAssetBySerial(agencyId: string, serialNumber: string): Promise<AssetRecord | undefined>;
  insertAsset(asset: AssetRecord): Promise<void>;
  /** Compare-and-set on `version`; returns the stored record with the bumped version. */
  updateAsset(asset: AssetRecord): Promise<AssetRecord>;

  getAssetRequest(requestId: string): Promise<AssetRequestRecord | undefined>;
  listAssetRequestsByAgency(agencyId: string, status?: AssetRequestStatus): Promise<AssetRequestRecord[]>;
  saveAssetRequest(request: AssetRequestRecord): Promise<void>;

  getReturnRequest(returnId: string): Promise<AssetReturnRequestRecord | undefined>;
  listReturnRequestsByAgency(agencyId: string, status?: ReturnRequestStatus): Promise<AssetReturnRequestRecord[]>;
  findOpenReturnForAsset(assetId: string): Promise<AssetReturnRequestRecord | undefined>;
  listOpenReturnsByRequester(agencyId: string, userId: string): Promise<AssetReturnRequestRecord[]>;
  saveReturnRequest(returnRequest: AssetReturnRequestRecord): Promise<void>;

  getChangeRequest(changeRequestId: string): Promise<AssetChangeRequestRecord | undefined>;
  listChangeRequestsByAgency(agencyId: string, status?: ChangeRequestStatus): Promise<AssetChangeRequestRecord[]>;
  listChangeRequestsByAsset(assetId: string): Promise<AssetChangeRequestRecord[]>;
  saveChangeRequest(changeRequest: AssetChangeRequestRecord): Promise<void>;

  appendAssetHistory(entry: AssetHistoryRecord): Promise<void>;
  getLatestAssetHistory(agencyId: string): Promise<AssetHistoryRecord | undefined>;
  /** Entries in ascending sequence order. */
  listAssetHistory(query: AssetHistoryQuery): Promise<AssetHistoryRecord[]>;

  getExitRequest(exitId: string): Promise<ExitRequestRecord | undefined>;
  listActiveExitRequests(agencyId: string, userId: string): Promise<ExitRequestRecord[]>;
  saveExitRequest(exitRequest: ExitRequestRecord): Promise<void>;

  getCommunicationLine(lineId: string): Promise<CommunicationLineRecord | undefined>;
  findCommunicationLineByMsisdn(msisdn: string): Promise<CommunicationLineRecord | undefined>;
  listCommunicationLinesByAssignee(
    agencyId: string,
    userId: string,
    status?: CommunicationLineStatus
  ): Promise<CommunicationLineRecord[]>;
  saveCommunicationLine(line: CommunicationLineRecord): Promise<void>;

  saveAssetVerification(verification: AssetVerificationRecord): Promise<void>;
  /** Newest first. */
  listAssetVerifications(query: AssetVerificationQuery): Promise<AssetVerificationRecord[]>;
}

export function matchesAssetFilter(asset: AssetRecord, filter?: AssetListFilter): boolean {
  if (!filter) {
    return true;
  }
  if (filter.status && asset.status !== filter.status) {
    return false;
  }
  if (filter.unitId && asset.unitId !== filter.unitId) {
    return false;
  }
  if (filter.categoryId && asset.categoryId !== filter.categoryId) {
    return false;
  }
  if (filter.holderId && asset.currentHolderId !== filter.holderId) {
    return false;
  }
  return true;
}

export function isOpenReturn(status: ReturnRequestStatus): boolean {
  return OPEN_RETURN_STATUSES.includes(status);
}

function newestFirst<T extends { createdAt: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

function upsertById<T extends { id: string }>(items: T[], item: T): void {
  const index = items.findIndex((entry) => entry.id === item.id);
  if (index >= 0) {
    items[index] = item;
  } else {
    items.push(item);
  }
}

export class FilePlatformStore implements PlatformStore {
  private state: PersistedState;
  private readonly filePath: string;
  private queue: Promise<void> = Promise.resolve();
  private transactionDepth = 0;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.load();
  }

  async close(): Promise<void> {
    await this.queue;
  }

  private load(): PersistedState {
    if (!existsSync(this.filePath)) {
      return structuredClone(defaultState);
    }

    const raw = readFileSync(this.filePath, "utf8");
    const parsed = JSON.parse(raw) as Partial<PersistedState>;
    return {
      agencies: parsed.agencies ?? [],
      agencyConfigs: parsed.agencyConfigs ?? [],
      units: parsed.units ?? [],
      assetRoles: parsed.assetRoles ?? [],
      users: parsed.users ?? [],
      categories: parsed.categories ?? [],
      assets: parsed.assets ?? [],
      assetRequests: parsed.assetRequests ?? [],
      returnRequests: parsed.returnRequests ?? [],
      changeRequests: parsed.changeRequests ?? [],
      history: parsed.history ?? [],
      exitRequests: parsed.exitRequests ?? [],
      communicationLines: parsed.communicationLines ?? [],
      assetVerifications: parsed.assetVerifications ?? []
    };
  }

  private persist(): void {
    if (this.transactionDepth > 0) {
      return;
    }
    const folder = dirname(this.filePath);
    if (!existsSync(folder)) {
      mkdirSync(folder, { recursive: true });
    }
    writeFileSync(this.filePath, JSON.stringify(this.state, null, 2), "utf8");
  }

  async transaction<T>(work: (tx: PlatformStore) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const snapshot = structuredClone(this.state);
      let result: T;
      this.transactionDepth += 1;
      try {
        result = await work(this);
      } catch (error) {
        this.state = snapshot;
        throw error;
      } finally {
        this.transactionDepth -= 1;
      }
      try {
        this.persist();
      } catch (error) {
        this.state = snapshot;
        throw error;
      }
      return result;
    };
    // Transactions run one at a time; a failed one must not block the next.
    const result = this.queue.then(run, run);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async getAgency(agencyId: string): Promise<AgencyRecord | undefined> {
    return structuredClone(this.state.agencies.find((agency) => agency.id === agencyId));
  }

  async listAgencies(): Promise<AgencyRecord[]> {
    return structuredClone([...this.state.agencies].sort((a, b) => a.code.localeCompare(b.code)));
  }

  async saveAgency(agency: AgencyRecord): Promise<void> {
    const clash = this.state.agencies.find((entry) => entry.code === agency.code && entry.id !== agency.id);
    if (clash) {
      throw new StateConflictError(`Agency code already in use: ${agency.code}`);
    }
    upsertById(this.state.agencies, structuredClone(agency));
    this.persist();
  }

  async getAgencyConfig(agencyId: string): Promise<AgencyConfigRecord | undefined> {
    return structuredClone(this.state.agencyConfigs.find((config) => config.agencyId === agencyId));
  }

  async saveAgencyConfig(config: AgencyConfigRecord): Promise<void> {
    const index = this.state.agencyConfigs.findIndex((entry) => entry.agencyId === config.agencyId);
    if (index >= 0) {
      this.state.agencyConfigs[index] = structuredClone(config);
    } else {
      this.state.agencyConfigs.push(structuredClone(config));
    }
    this.persist();
  }

  async getUnit(unitId: string): Promise<UnitRecord | undefined> {
    return structuredClone(this.state.units.find((unit) => unit.id === unitId));
  }

  async listUnitsByAgency(agencyId: string): Promise<UnitRecord[]> {
    return structuredClone(
      this.state.units.filter((unit) => unit.agencyId === agencyId).sort((a, b) => a.name.localeCompare(b.name))
    );
  }

  async saveUnit(unit: UnitRecord): Promise<void> {
    upsertById(this.state.units, structuredClone(unit));
    this.persist();
  }

  async getAssetRoles(agencyId: string): Promise<AgencyAssetRolesRecord | undefined> {
    return structuredClone(this.state.assetRoles.find((roles) => roles.agencyId === agencyId));
  }

  async saveAssetRoles(roles: AgencyAssetRolesRecord): Promise<void> {
    const index = this.state.assetRoles.findIndex((entry) => entry.agencyId === roles.agencyId);
    if (index >= 0) {
      this.state.assetRoles[index] = structuredClone(roles);
    } else {
      this.state.assetRoles.push(structuredClone(roles));
    }
    this.persist();
  }

  async getUser(userId: string): Promise<UserProfile | undefined> {
    return structuredClone(this.state.users.find((user) => user.id === userId));
  }

  async listUsersByAgency(agencyId: string): Promise<UserProfile[]> {
    return structuredClone(
      this.state.users
        .filter((user) => user.agencyId === agencyId)
        .sort((a, b) => a.displayName.localeCompare(b.displayName))
    );
  }

  async saveUser(user: UserProfile): Promise<void> {
    upsertById(this.state.users, structuredClone(user));
    this.persist();
  }

  async getCategory(categoryId: string): Promise<AssetCategoryRecord | undefined> {
    return structuredClone(this.state.categories.find((category) => category.id === categoryId));
  }

  async listCategoriesByAgency(agencyId: string): Promise<AssetCategoryRecord[]> {
    return structuredClone(
      this.state.categories
        .filter((category) => category.agencyId === agencyId)
        .sort((a, b) => a.name.localeCompare(b.name))
    );
  }

  async saveCategory(category: AssetCategoryRecord): Promise<void> {
    upsertById(this.state.categories, structuredClone(category));
    this.persist();
  }

  async getAsset(assetId: string): Promise<AssetRecord | undefined> {
    return structuredClone(this.state.assets.find((asset) => asset.id === assetId));
  }

  async lockAsset(assetId: string): Promise<AssetRecord | undefined> {
    // Transactions are already serialized, so a plain read holds the "lock".
    return this.getAsset(assetId);
  }

  async listAssetsByAgency(agencyId: string, filter?: AssetListFilter): Promise<AssetRecord[]> {
    return structuredClone(
      newestFirst(this.state.assets.filter((asset) => asset.agencyId === agencyId && matchesAssetFilter(asset, filter)))
    );
  }

  async findAssetByTag(
    agencyId: string,
    assetTag: string,
    options?: { ignoreCase?: boolean }
  ): Promise<AssetRecord | undefined> {
    const inAgency = this.state.assets.filter((asset) => asset.agencyId === agencyId);
    const exact = inAgency.find((asset) => asset.assetTag === assetTag);
    if (exact || !options?.ignoreCase) {
      return structuredClone(exact);
    }
    const folded = assetTag.toLowerCase();
    return structuredClone(inAgency.find((asset) => asset.assetTag?.toLowerCase() === folded));
  }

  async findAssetBySerial(agencyId: string, serialNumber: string): Promise<AssetRecord | undefined> {
    return structuredClone(
      this.state.assets.find((asset) => asset.agencyId === agencyId && asset.serialNumber === serialNumber)
    );
  }

  private assertAssetUniqueness(asset: AssetRecord): void {
    for (const entry of this.state.assets) {
      if (entry.id === asset.id || entry.agencyId !== asset.agencyId) {
        continue;
      }
      if (asset.assetTag !== null && entry.assetTag === asset.assetTag) {
        throw new StateConflictError(`Asset tag already in use: ${asset.assetTag}`);
      }
      if (asset.serialNumber !== null && entry.serialNumber === asset.serialNumber) {
        throw new StateConflictError(`Serial number already in use: ${asset.serialNumber}`);
      }
    }
  }

  async insertAsset(asset: AssetRecord): Promise<void> {
    if (this.state.assets.some((entry) => entry.id === asset.id)) {
      throw new StateConflictError(`Asset already exists: ${asset.id}`);
    }
    this.assertAssetUniqueness(asset);
    this.state.assets.push(structuredClone(asset));
    this.persist();
  }

  async updateAsset(asset: AssetRecord): Promise<AssetRecord> {
    const index = this.state.assets.findIndex((entry) => entry.id === asset.id);
    const current = this.state.assets[index];
    if (!current) {
      throw new StateConflictError(`Asset no longer exists: ${asset.id}`);
    }
    if (current.version !== asset.version) {
      throw new StateConflictError(`Asset ${asset.id} was modified concurrently; reload and retry.`);
    }
    this.assertAssetUniqueness(asset);
    const stored: AssetRecord = { ...structuredClone(asset), version: asset.version + 1 };
    this.state.assets[index] = stored;
    this.persist();
    return structuredClone(stored);
  }

  async getAssetRequest(requestId: string): Promise<AssetRequestRecord | undefined> {
    return structuredClone(this.state.assetRequests.find((request) => request.id === requestId));
  }

  async listAssetRequestsByAgency(agencyId: string, status?: AssetRequestStatus): Promise<AssetRequestRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.assetRequests.filter(
          (request) => request.agencyId === agencyId && (status ? request.status === status : true)
        )
      )
    );
  }

  async saveAssetRequest(request: AssetRequestRecord): Promise<void> {
    upsertById(this.state.assetRequests, structuredClone(request));
    this.persist();
  }

  async getReturnRequest(returnId: string): Promise<AssetReturnRequestRecord | undefined> {
    return structuredClone(this.state.returnRequests.find((entry) => entry.id === returnId));
  }

  async listReturnRequestsByAgency(
    agencyId: string,
    status?: ReturnRequestStatus
  ): Promise<AssetReturnRequestRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.returnRequests.filter(
          (entry) => entry.agencyId === agencyId && (status ? entry.status === status : true)
        )
      )
    );
  }

  async findOpenReturnForAsset(assetId: string): Promise<AssetReturnRequestRecord | undefined> {
    return structuredClone(
      this.state.returnRequests.find((entry) => entry.assetId === assetId && isOpenReturn(entry.status))
    );
  }

  async listOpenReturnsByRequester(agencyId: string, userId: string): Promise<AssetReturnRequestRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.returnRequests.filter(
          (entry) => entry.agencyId === agencyId && entry.requestedById === userId && isOpenReturn(entry.status)
        )
      )
    );
  }

  async saveReturnRequest(returnRequest: AssetReturnRequestRecord): Promise<void> {
    if (isOpenReturn(returnRequest.status)) {
      const clash = this.state.returnRequests.find(
        (entry) =>
          entry.assetId === returnRequest.assetId && entry.id !== returnRequest.id && isOpenReturn(entry.status)
      );
      if (clash) {
        throw new StateConflictError(`Asset ${returnRequest.assetId} already has an open return request.`);
      }
    }
    upsertById(this.state.returnRequests, structuredClone(returnRequest));
    this.persist();
  }

  async getChangeRequest(changeRequestId: string): Promise<AssetChangeRequestRecord | undefined> {
    return structuredClone(this.state.changeRequests.find((entry) => entry.id === changeRequestId));
  }

  async listChangeRequestsByAgency(
    agencyId: string,
    status?: ChangeRequestStatus
  ): Promise<AssetChangeRequestRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.changeRequests.filter(
          (entry) => entry.agencyId === agencyId && (status ? entry.status === status : true)
        )
      )
    );
  }

  async listChangeRequestsByAsset(assetId: string): Promise<AssetChangeRequestRecord[]> {
    return structuredClone(newestFirst(this.state.changeRequests.filter((entry) => entry.assetId === assetId)));
  }

  async saveChangeRequest(changeRequest: AssetChangeRequestRecord): Promise<void> {
    upsertById(this.state.changeRequests, structuredClone(changeRequest));
    this.persist();
  }

  async appendAssetHistory(entry: AssetHistoryRecord): Promise<void> {
    const duplicate = this.state.history.some(
      (existing) =>
        existing.id === entry.id || (existing.agencyId === entry.agencyId && existing.sequence === entry.sequence)
    );
    if (duplicate) {
      throw new StateConflictError(`History entry already recorded: ${entry.agencyId}#${entry.sequence}`);
    }
    this.state.history.push(structuredClone(entry));
    this.persist();
  }

  async getLatestAssetHistory(agencyId: string): Promise<AssetHistoryRecord | undefined> {
    let latest: AssetHistoryRecord | undefined;
    for (const entry of this.state.history) {
      if (entry.agencyId === agencyId && (!latest || entry.sequence > latest.sequence)) {
        latest = entry;
      }
    }
    return structuredClone(latest);
  }

  async listAssetHistory(query: AssetHistoryQuery): Promise<AssetHistoryRecord[]> {
    const filtered = this.state.history
      .filter((entry) => entry.agencyId === query.agencyId)
      .filter((entry) => (query.assetId ? entry.assetId === query.assetId : true))
      .filter((entry) => (query.from ? entry.occurredAt >= query.from : true))
      .filter((entry) => (query.to ? entry.occurredAt <= query.to : true))
      .sort((a, b) => a.sequence - b.sequence);
    const limited = query.limit !== undefined ? filtered.slice(-query.limit) : filtered;
    return structuredClone(limited);
  }

  async getExitRequest(exitId: string): Promise<ExitRequestRecord | undefined> {
    return structuredClone(this.state.exitRequests.find((entry) => entry.id === exitId));
  }

  async listActiveExitRequests(agencyId: string, userId: string): Promise<ExitRequestRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.exitRequests.filter(
          (entry) => entry.agencyId === agencyId && entry.userId === userId && entry.status !== "cleared"
        )
      )
    );
  }

  async saveExitRequest(exitRequest: ExitRequestRecord): Promise<void> {
    upsertById(this.state.exitRequests, structuredClone(exitRequest));
    this.persist();
  }

  async getCommunicationLine(lineId: string): Promise<CommunicationLineRecord | undefined> {
    return structuredClone(this.state.communicationLines.find((line) => line.id === lineId));
  }

  async findCommunicationLineByMsisdn(msisdn: string): Promise<CommunicationLineRecord | undefined> {
    return structuredClone(this.state.communicationLines.find((line) => line.msisdn === msisdn));
  }

  async listCommunicationLinesByAssignee(
    agencyId: string,
    userId: string,
    status?: CommunicationLineStatus
  ): Promise<CommunicationLineRecord[]> {
    return structuredClone(
      newestFirst(
        this.state.communicationLines.filter(
          (line) =>
            line.agencyId === agencyId && line.assignedToId === userId && (status ? line.status === status : true)
        )
      )
    );
  }

  async saveCommunicationLine(line: CommunicationLineRecord): Promise<void> {
    const clash = this.state.communicationLines.find((entry) => entry.msisdn === line.msisdn && entry.id !== line.id);
    if (clash) {
      throw new StateConflictError(`MSISDN already registered: ${line.msisdn}`);
    }
    upsertById(this.state.communicationLines, structuredClone(line));
    this.persist();
  }

  async saveAssetVerification(verification: AssetVerificationRecord): Promise<void> {
    if (this.state.assetVerifications.some((entry) => entry.id === verification.id)) {
      throw new StateConflictError(`Verification already recorded: ${verification.id}`);
    }
    this.state.assetVerifications.push(structuredClone(verification));
    this.persist();
  }

  async listAssetVerifications(query: AssetVerificationQuery): Promise<AssetVerificationRecord[]> {
    const filtered = this.state.assetVerifications.filter((entry) => {
      const day = entry.verifiedAt.slice(0, 10);
      return (
        entry.agencyId === query.agencyId &&
        (query.assetId ? entry.assetId === query.assetId : true) &&
        (query.verifiedById ? entry.verifiedById === query.verifiedById : true) &&
        (query.fromDate ? day >= query.fromDate : true) &&
        (query.toDate ? day <= query.toDate : true)
      );
    });
    return structuredClone([...filtered].sort((a, b) => b.verifiedAt.localeCompare(a.verifiedAt)));
  }
}
