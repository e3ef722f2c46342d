import { createRequire } from "node:module";
import type { Pool as PgPool, PoolClient, QueryResult, QueryResultRow } from "pg";
import { StateConflictError } from "../errors.js";
import type { PlatformStore } from "./platform-store.js";
import type {
  AgencyAssetRolesRecord,
  AgencyConfigRecord,
  AgencyRecord,
  AssetCategoryRecord,
  AssetChangeRequestRecord,
  AssetHistoryQuery,
  AssetHistoryRecord,
  AssetListFilter,
  AssetRecord,
  AssetRequestRecord,
  AssetRequestStatus,
  AssetReturnRequestRecord,
  AssetVerificationQuery,
  AssetVerificationRecord,
  ChangeRequestStatus,
  CommunicationLineRecord,
  CommunicationLineStatus,
  ExitRequestRecord,
  ReturnRequestStatus,
  UnitRecord,
  UserProfile
} from "../types/domain.js";

const require = createRequire(import.meta.url);
const { Pool } = require("pg") as { Pool: new (opts: { connectionString: string }) => PgPool };

type PgJsonRow<T> = { data: T };

type Migration = {
  id: string;
  statements: string[];
};

interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

interface PostgresSession {
  client: PoolClient;
  ready: Promise<void>;
}

function safeDate(iso: string | null | undefined, fallback: Date): Date {
  if (!iso) return fallback;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? fallback : new Date(ms);
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "23505";
}

const SCHEMA_STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS assetline_agencies (
    id TEXT PRIMARY KEY,
    code TEXT NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_agencies_code ON assetline_agencies (code);`,
  `CREATE TABLE IF NOT EXISTS assetline_agency_configs (
    agency_id TEXT PRIMARY KEY,
    updated_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS assetline_units (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    name TEXT NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_units_agency ON assetline_units (agency_id, name);`,
  `CREATE TABLE IF NOT EXISTS assetline_asset_roles (
    agency_id TEXT PRIMARY KEY,
    updated_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS assetline_users (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    display_name TEXT NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_users_agency ON assetline_users (agency_id, display_name);`,
  `CREATE TABLE IF NOT EXISTS assetline_categories (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    name TEXT NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_categories_agency ON assetline_categories (agency_id, name);`,
  `CREATE TABLE IF NOT EXISTS assetline_assets (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    status TEXT NOT NULL,
    current_holder_id TEXT NULL,
    asset_tag TEXT NULL,
    serial_number TEXT NULL,
    version INT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_assets_agency_created ON assetline_assets (agency_id, created_at DESC);`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_assets_holder ON assetline_assets (agency_id, current_holder_id, status);`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_assets_tag ON assetline_assets (agency_id, asset_tag) WHERE asset_tag IS NOT NULL;`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_assets_serial ON assetline_assets (agency_id, serial_number) WHERE serial_number IS NOT NULL;`,
  `CREATE TABLE IF NOT EXISTS assetline_asset_requests (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    requester_id TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_asset_requests_agency_status ON assetline_asset_requests (agency_id, status, created_at DESC);`,
  `CREATE TABLE IF NOT EXISTS assetline_return_requests (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    asset_id TEXT NOT NULL,
    requested_by_id TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_return_requests_agency_status ON assetline_return_requests (agency_id, status, created_at DESC);`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_return_requests_open ON assetline_return_requests (asset_id) WHERE status IN ('pending_ict','in_transit');`,
  `CREATE TABLE IF NOT EXISTS assetline_change_requests (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    asset_id TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_change_requests_agency_status ON assetline_change_requests (agency_id, status, created_at DESC);`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_change_requests_asset ON assetline_change_requests (asset_id, created_at DESC);`,
  `CREATE TABLE IF NOT EXISTS assetline_asset_history (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    sequence BIGINT NOT NULL,
    asset_id TEXT NULL,
    occurred_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_asset_history_sequence ON assetline_asset_history (agency_id, sequence);`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_asset_history_asset ON assetline_asset_history (asset_id, sequence);`,
  `CREATE TABLE IF NOT EXISTS assetline_exit_requests (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_exit_requests_user ON assetline_exit_requests (agency_id, user_id, status);`,
  `CREATE TABLE IF NOT EXISTS assetline_communication_lines (
    id TEXT PRIMARY KEY,
    agency_id TEXT NOT NULL,
    msisdn TEXT NOT NULL,
    assigned_to_id TEXT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    data JSONB NOT NULL
  );`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_assetline_communication_lines_msisdn ON assetline_communication_lines (msisdn);`,
  `CREATE INDEX IF NOT EXISTS idx_assetline_communication_lines_assignee ON assetline_communication_lines (agency_id, assigned_to_id, status);`
];

const MIGRATIONS: Migration[] = [
  {
    id: "2026-10-01-01-initial-schema",
    statements: SCHEMA_STATEMENTS
  },
  {
    id: "2026-10-20-01-asset-verifications",
    statements: [
      `CREATE TABLE IF NOT EXISTS assetline_asset_verifications (
        id TEXT PRIMARY KEY,
        agency_id TEXT NOT NULL,
        asset_id TEXT NOT NULL,
        verified_by_id TEXT NOT NULL,
        verified_at TIMESTAMPTZ NOT NULL,
        data JSONB NOT NULL
      );`,
      `CREATE INDEX IF NOT EXISTS idx_assetline_asset_verifications_agency ON assetline_asset_verifications (agency_id, verified_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_assetline_asset_verifications_asset ON assetline_asset_verifications (asset_id, verified_at DESC);`
    ]
  }
];

export class PostgresPlatformStore implements PlatformStore {
  private readonly pool: PgPool;
  private readonly client: PoolClient | null;
  private readonly ready: Promise<void>;

  constructor(connection: string | PgPool, session?: PostgresSession) {
    this.pool = typeof connection === "string" ? new Pool({ connectionString: connection }) : connection;
    this.client = session?.client ?? null;
    this.ready = session?.ready ?? this.init();
  }

  private get db(): Queryable {
    return this.client ?? this.pool;
  }

  async close(): Promise<void> {
    if (this.client) {
      return;
    }
    await this.ready.catch(() => undefined);
    await this.pool.end();
  }

  private async init(): Promise<void> {
    await this.pool.query(
      "CREATE TABLE IF NOT EXISTS assetline_schema_migrations (id TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW());"
    );

    const appliedRows = await this.pool.query<{ id: string }>("SELECT id FROM assetline_schema_migrations");
    const applied = new Set(appliedRows.rows.map((row) => row.id));
    const pending = MIGRATIONS.filter((migration) => !applied.has(migration.id));
    if (pending.length === 0) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const migration of pending) {
        for (const statement of migration.statements) {
          await client.query(statement);
        }
        await client.query(
          "INSERT INTO assetline_schema_migrations (id) VALUES ($1) ON CONFLICT (id) DO NOTHING",
          [migration.id]
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async ensureReady(): Promise<void> {
    await this.ready;
  }

  async transaction<T>(work: (tx: PlatformStore) => Promise<T>): Promise<T> {
    await this.ensureReady();
    if (this.client) {
      return work(this);
    }
    const client = await this.pool.connect();
    const tx = new PostgresPlatformStore(this.pool, { client, ready: this.ready });
    try {
      await client.query("BEGIN");
      const result = await work(tx);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async selectOne<T>(sql: string, values: unknown[]): Promise<T | undefined> {
    await this.ensureReady();
    const result = await this.db.query<PgJsonRow<T>>(sql, values);
    return result.rows[0]?.data;
  }

  private async selectMany<T>(sql: string, values: unknown[]): Promise<T[]> {
    await this.ensureReady();
    const result = await this.db.query<PgJsonRow<T>>(sql, values);
    return result.rows.map((row) => row.data);
  }

  /**
   * Inserts or replaces a row keyed by `conflictColumn`. Column names come from this file only.
   */
  private async upsert(
    table: string,
    conflictColumn: string,
    columns: Record<string, unknown>,
    data: object
  ): Promise<void> {
    await this.ensureReady();
    const names = [...Object.keys(columns), "data"];
    const values = [...Object.values(columns), JSON.stringify(data)];
    const placeholders = names.map((name, index) => (name === "data" ? `$${index + 1}::jsonb` : `$${index + 1}`));
    const updates = names
      .filter((name) => name !== conflictColumn)
      .map((name) => `${name}=EXCLUDED.${name}`);
    try {
      await this.db.query(
        `INSERT INTO ${table} (${names.join(", ")}) VALUES (${placeholders.join(", ")})
         ON CONFLICT (${conflictColumn}) DO UPDATE SET ${updates.join(", ")}`,
        values
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`Uniqueness constraint violated on ${table}.`);
      }
      throw error;
    }
  }

  async getAgency(agencyId: string): Promise<AgencyRecord | undefined> {
    return this.selectOne<AgencyRecord>("SELECT data FROM assetline_agencies WHERE id=$1", [agencyId]);
  }

  async listAgencies(): Promise<AgencyRecord[]> {
    return this.selectMany<AgencyRecord>("SELECT data FROM assetline_agencies ORDER BY code ASC", []);
  }

  async saveAgency(agency: AgencyRecord): Promise<void> {
    await this.upsert(
      "assetline_agencies",
      "id",
      { id: agency.id, code: agency.code, updated_at: safeDate(agency.updatedAt, new Date()) },
      agency
    );
  }

  async getAgencyConfig(agencyId: string): Promise<AgencyConfigRecord | undefined> {
    return this.selectOne<AgencyConfigRecord>("SELECT data FROM assetline_agency_configs WHERE agency_id=$1", [
      agencyId
    ]);
  }

  async saveAgencyConfig(config: AgencyConfigRecord): Promise<void> {
    await this.upsert(
      "assetline_agency_configs",
      "agency_id",
      { agency_id: config.agencyId, updated_at: safeDate(config.updatedAt, new Date()) },
      config
    );
  }

  async getUnit(unitId: string): Promise<UnitRecord | undefined> {
    return this.selectOne<UnitRecord>("SELECT data FROM assetline_units WHERE id=$1", [unitId]);
  }

  async listUnitsByAgency(agencyId: string): Promise<UnitRecord[]> {
    return this.selectMany<UnitRecord>("SELECT data FROM assetline_units WHERE agency_id=$1 ORDER BY name ASC", [
      agencyId
    ]);
  }

  async saveUnit(unit: UnitRecord): Promise<void> {
    await this.upsert(
      "assetline_units",
      "id",
      { id: unit.id, agency_id: unit.agencyId, name: unit.name, updated_at: safeDate(unit.updatedAt, new Date()) },
      unit
    );
  }

  async getAssetRoles(agencyId: string): Promise<AgencyAssetRolesRecord | undefined> {
    return this.selectOne<AgencyAssetRolesRecord>("SELECT data FROM assetline_asset_roles WHERE agency_id=$1", [
      agencyId
    ]);
  }

  async saveAssetRoles(roles: AgencyAssetRolesRecord): Promise<void> {
    await this.upsert(
      "assetline_asset_roles",
      "agency_id",
      { agency_id: roles.agencyId, updated_at: safeDate(roles.updatedAt, new Date()) },
      roles
    );
  }

  async getUser(userId: string): Promise<UserProfile | undefined> {
    return this.selectOne<UserProfile>("SELECT data FROM assetline_users WHERE id=$1", [userId]);
  }

  async listUsersByAgency(agencyId: string): Promise<UserProfile[]> {
    return this.selectMany<UserProfile>(
      "SELECT data FROM assetline_users WHERE agency_id=$1 ORDER BY display_name ASC",
      [agencyId]
    );
  }

  async saveUser(user: UserProfile): Promise<void> {
    await this.upsert(
      "assetline_users",
      "id",
      { id: user.id, agency_id: user.agencyId, display_name: user.displayName },
      user
    );
  }

  async getCategory(categoryId: string): Promise<AssetCategoryRecord | undefined> {
    return this.selectOne<AssetCategoryRecord>("SELECT data FROM assetline_categories WHERE id=$1", [categoryId]);
  }

  async listCategoriesByAgency(agencyId: string): Promise<AssetCategoryRecord[]> {
    return this.selectMany<AssetCategoryRecord>(
      "SELECT data FROM assetline_categories WHERE agency_id=$1 ORDER BY name ASC",
      [agencyId]
    );
  }

  async saveCategory(category: AssetCategoryRecord): Promise<void> {
    await this.upsert(
      "assetline_categories",
      "id",
      { id: category.id, agency_id: category.agencyId, name: category.name },
      category
    );
  }

  async getAsset(assetId: string): Promise<AssetRecord | undefined> {
    return this.selectOne<AssetRecord>("SELECT data FROM assetline_assets WHERE id=$1", [assetId]);
  }

  async lockAsset(assetId: string): Promise<AssetRecord | undefined> {
    return this.selectOne<AssetRecord>("SELECT data FROM assetline_assets WHERE id=$1 FOR UPDATE", [assetId]);
  }

  async listAssetsByAgency(agencyId: string, filter?: AssetListFilter): Promise<AssetRecord[]> {
    const clauses = ["agency_id=$1"];
    const values: unknown[] = [agencyId];
    if (filter?.status) {
      values.push(filter.status);
      clauses.push(`status=$${values.length}`);
    }
    if (filter?.holderId) {
      values.push(filter.holderId);
      clauses.push(`current_holder_id=$${values.length}`);
    }
    if (filter?.unitId) {
      values.push(filter.unitId);
      clauses.push(`data->>'unitId'=$${values.length}`);
    }
    if (filter?.categoryId) {
      values.push(filter.categoryId);
      clauses.push(`data->>'categoryId'=$${values.length}`);
    }
    return this.selectMany<AssetRecord>(
      `SELECT data FROM assetline_assets WHERE ${clauses.join(" AND ")} ORDER BY created_at DESC`,
      values
    );
  }

  async findAssetByTag(
    agencyId: string,
    assetTag: string,
    options?: { ignoreCase?: boolean }
  ): Promise<AssetRecord | undefined> {
    if (!options?.ignoreCase) {
      return this.selectOne<AssetRecord>("SELECT data FROM assetline_assets WHERE agency_id=$1 AND asset_tag=$2", [
        agencyId,
        assetTag
      ]);
    }
    return this.selectOne<AssetRecord>(
      `SELECT data FROM assetline_assets
       WHERE agency_id=$1 AND lower(asset_tag)=lower($2)
       ORDER BY (asset_tag=$2) DESC, created_at ASC LIMIT 1`,
      [agencyId, assetTag]
    );
  }

  async findAssetBySerial(agencyId: string, serialNumber: string): Promise<AssetRecord | undefined> {
    return this.selectOne<AssetRecord>(
      "SELECT data FROM assetline_assets WHERE agency_id=$1 AND serial_number=$2",
      [agencyId, serialNumber]
    );
  }

  async insertAsset(asset: AssetRecord): Promise<void> {
    await this.ensureReady();
    try {
      await this.db.query(
        `INSERT INTO assetline_assets (id, agency_id, status, current_holder_id, asset_tag, serial_number, version, created_at, updated_at, data)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10::jsonb)`,
        [
          asset.id,
          asset.agencyId,
          asset.status,
          asset.currentHolderId,
          asset.assetTag,
          asset.serialNumber,
          asset.version,
          safeDate(asset.createdAt, new Date()),
          safeDate(asset.updatedAt, new Date()),
          JSON.stringify(asset)
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`Asset tag, serial number or id already in use: ${asset.id}`);
      }
      throw error;
    }
  }

  async updateAsset(asset: AssetRecord): Promise<AssetRecord> {
    await this.ensureReady();
    const stored: AssetRecord = { ...asset, version: asset.version + 1 };
    let rowCount: number | null;
    try {
      const result = await this.db.query(
        `UPDATE assetline_assets
         SET status=$3, current_holder_id=$4, asset_tag=$5, serial_number=$6, version=$7, updated_at=$8, data=$9::jsonb
         WHERE id=$1 AND version=$2`,
        [
          asset.id,
          asset.version,
          stored.status,
          stored.currentHolderId,
          stored.assetTag,
          stored.serialNumber,
          stored.version,
          safeDate(stored.updatedAt, new Date()),
          JSON.stringify(stored)
        ]
      );
      rowCount = result.rowCount;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`Asset tag or serial number already in use for asset ${asset.id}.`);
      }
      throw error;
    }
    if (rowCount !== 1) {
      throw new StateConflictError(`Asset ${asset.id} was modified concurrently; reload and retry.`);
    }
    return stored;
  }

  async getAssetRequest(requestId: string): Promise<AssetRequestRecord | undefined> {
    return this.selectOne<AssetRequestRecord>("SELECT data FROM assetline_asset_requests WHERE id=$1", [requestId]);
  }

  async listAssetRequestsByAgency(agencyId: string, status?: AssetRequestStatus): Promise<AssetRequestRecord[]> {
    return status
      ? this.selectMany<AssetRequestRecord>(
          "SELECT data FROM assetline_asset_requests WHERE agency_id=$1 AND status=$2 ORDER BY created_at DESC",
          [agencyId, status]
        )
      : this.selectMany<AssetRequestRecord>(
          "SELECT data FROM assetline_asset_requests WHERE agency_id=$1 ORDER BY created_at DESC",
          [agencyId]
        );
  }

  async saveAssetRequest(request: AssetRequestRecord): Promise<void> {
    await this.upsert(
      "assetline_asset_requests",
      "id",
      {
        id: request.id,
        agency_id: request.agencyId,
        requester_id: request.requesterId,
        status: request.status,
        created_at: safeDate(request.createdAt, new Date())
      },
      request
    );
  }

  async getReturnRequest(returnId: string): Promise<AssetReturnRequestRecord | undefined> {
    return this.selectOne<AssetReturnRequestRecord>("SELECT data FROM assetline_return_requests WHERE id=$1", [
      returnId
    ]);
  }

  async listReturnRequestsByAgency(
    agencyId: string,
    status?: ReturnRequestStatus
  ): Promise<AssetReturnRequestRecord[]> {
    return status
      ? this.selectMany<AssetReturnRequestRecord>(
          "SELECT data FROM assetline_return_requests WHERE agency_id=$1 AND status=$2 ORDER BY created_at DESC",
          [agencyId, status]
        )
      : this.selectMany<AssetReturnRequestRecord>(
          "SELECT data FROM assetline_return_requests WHERE agency_id=$1 ORDER BY created_at DESC",
          [agencyId]
        );
  }

  async findOpenReturnForAsset(assetId: string): Promise<AssetReturnRequestRecord | undefined> {
    return this.selectOne<AssetReturnRequestRecord>(
      "SELECT data FROM assetline_return_requests WHERE asset_id=$1 AND status IN ('pending_ict','in_transit')",
      [assetId]
    );
  }

  async listOpenReturnsByRequester(agencyId: string, userId: string): Promise<AssetReturnRequestRecord[]> {
    return this.selectMany<AssetReturnRequestRecord>(
      `SELECT data FROM assetline_return_requests
       WHERE agency_id=$1 AND requested_by_id=$2 AND status IN ('pending_ict','in_transit')
       ORDER BY created_at DESC`,
      [agencyId, userId]
    );
  }

  async saveReturnRequest(returnRequest: AssetReturnRequestRecord): Promise<void> {
    await this.upsert(
      "assetline_return_requests",
      "id",
      {
        id: returnRequest.id,
        agency_id: returnRequest.agencyId,
        asset_id: returnRequest.assetId,
        requested_by_id: returnRequest.requestedById,
        status: returnRequest.status,
        created_at: safeDate(returnRequest.createdAt, new Date())
      },
      returnRequest
    );
  }

  async getChangeRequest(changeRequestId: string): Promise<AssetChangeRequestRecord | undefined> {
    return this.selectOne<AssetChangeRequestRecord>("SELECT data FROM assetline_change_requests WHERE id=$1", [
      changeRequestId
    ]);
  }

  async listChangeRequestsByAgency(
    agencyId: string,
    status?: ChangeRequestStatus
  ): Promise<AssetChangeRequestRecord[]> {
    return status
      ? this.selectMany<AssetChangeRequestRecord>(
          "SELECT data FROM assetline_change_requests WHERE agency_id=$1 AND status=$2 ORDER BY created_at DESC",
          [agencyId, status]
        )
      : this.selectMany<AssetChangeRequestRecord>(
          "SELECT data FROM assetline_change_requests WHERE agency_id=$1 ORDER BY created_at DESC",
          [agencyId]
        );
  }

  async listChangeRequestsByAsset(assetId: string): Promise<AssetChangeRequestRecord[]> {
    return this.selectMany<AssetChangeRequestRecord>(
      "SELECT data FROM assetline_change_requests WHERE asset_id=$1 ORDER BY created_at DESC",
      [assetId]
    );
  }

  async saveChangeRequest(changeRequest: AssetChangeRequestRecord): Promise<void> {
    await this.upsert(
      "assetline_change_requests",
      "id",
      {
        id: changeRequest.id,
        agency_id: changeRequest.agencyId,
        asset_id: changeRequest.assetId,
        status: changeRequest.status,
        created_at: safeDate(changeRequest.createdAt, new Date())
      },
      changeRequest
    );
  }

  async appendAssetHistory(entry: AssetHistoryRecord): Promise<void> {
    await this.ensureReady();
    try {
      await this.db.query(
        `INSERT INTO assetline_asset_history (id, agency_id, sequence, asset_id, occurred_at, data)
         VALUES ($1,$2,$3,$4,$5,$6::jsonb)`,
        [
          entry.id,
          entry.agencyId,
          entry.sequence,
          entry.assetId,
          safeDate(entry.occurredAt, new Date()),
          JSON.stringify(entry)
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`History entry already recorded: ${entry.agencyId}#${entry.sequence}`);
      }
      throw error;
    }
  }

  async getLatestAssetHistory(agencyId: string): Promise<AssetHistoryRecord | undefined> {
    if (this.client) {
      // Appends to one agency's chain queue behind each other until commit.
      await this.client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [agencyId]);
    }
    return this.selectOne<AssetHistoryRecord>(
      "SELECT data FROM assetline_asset_history WHERE agency_id=$1 ORDER BY sequence DESC LIMIT 1",
      [agencyId]
    );
  }

  async listAssetHistory(query: AssetHistoryQuery): Promise<AssetHistoryRecord[]> {
    const clauses = ["agency_id=$1"];
    const values: unknown[] = [query.agencyId];
    if (query.assetId) {
      values.push(query.assetId);
      clauses.push(`asset_id=$${values.length}`);
    }
    if (query.from) {
      values.push(safeDate(query.from, new Date(0)));
      clauses.push(`occurred_at>=$${values.length}`);
    }
    if (query.to) {
      values.push(safeDate(query.to, new Date()));
      clauses.push(`occurred_at<=$${values.length}`);
    }
    let limitClause = "";
    if (query.limit !== undefined) {
      values.push(query.limit);
      limitClause = ` LIMIT $${values.length}`;
    }
    return this.selectMany<AssetHistoryRecord>(
      `SELECT data FROM (
         SELECT data, sequence FROM assetline_asset_history
         WHERE ${clauses.join(" AND ")}
         ORDER BY sequence DESC${limitClause}
       ) recent ORDER BY sequence ASC`,
      values
    );
  }

  async getExitRequest(exitId: string): Promise<ExitRequestRecord | undefined> {
    return this.selectOne<ExitRequestRecord>("SELECT data FROM assetline_exit_requests WHERE id=$1", [exitId]);
  }

  async listActiveExitRequests(agencyId: string, userId: string): Promise<ExitRequestRecord[]> {
    return this.selectMany<ExitRequestRecord>(
      `SELECT data FROM assetline_exit_requests
       WHERE agency_id=$1 AND user_id=$2 AND status <> 'cleared'
       ORDER BY created_at DESC`,
      [agencyId, userId]
    );
  }

  async saveExitRequest(exitRequest: ExitRequestRecord): Promise<void> {
    await this.upsert(
      "assetline_exit_requests",
      "id",
      {
        id: exitRequest.id,
        agency_id: exitRequest.agencyId,
        user_id: exitRequest.userId,
        status: exitRequest.status,
        created_at: safeDate(exitRequest.createdAt, new Date())
      },
      exitRequest
    );
  }

  async getCommunicationLine(lineId: string): Promise<CommunicationLineRecord | undefined> {
    return this.selectOne<CommunicationLineRecord>("SELECT data FROM assetline_communication_lines WHERE id=$1", [
      lineId
    ]);
  }

  async findCommunicationLineByMsisdn(msisdn: string): Promise<CommunicationLineRecord | undefined> {
    return this.selectOne<CommunicationLineRecord>(
      "SELECT data FROM assetline_communication_lines WHERE msisdn=$1",
      [msisdn]
    );
  }

  async listCommunicationLinesByAssignee(
    agencyId: string,
    userId: string,
    status?: CommunicationLineStatus
  ): Promise<CommunicationLineRecord[]> {
    return status
      ? this.selectMany<CommunicationLineRecord>(
          `SELECT data FROM assetline_communication_lines
           WHERE agency_id=$1 AND assigned_to_id=$2 AND status=$3 ORDER BY created_at DESC`,
          [agencyId, userId, status]
        )
      : this.selectMany<CommunicationLineRecord>(
          `SELECT data FROM assetline_communication_lines
           WHERE agency_id=$1 AND assigned_to_id=$2 ORDER BY created_at DESC`,
          [agencyId, userId]
        );
  }

  async saveCommunicationLine(line: CommunicationLineRecord): Promise<void> {
    await this.upsert(
      "assetline_communication_lines",
      "id",
      {
        id: line.id,
        agency_id: line.agencyId,
        msisdn: line.msisdn,
        assigned_to_id: line.assignedToId,
        status: line.status,
        created_at: safeDate(line.createdAt, new Date())
      },
      line
    );
  }

  async saveAssetVerification(verification: AssetVerificationRecord): Promise<void> {
    await this.ensureReady();
    try {
      await this.db.query(
        `INSERT INTO assetline_asset_verifications (id, agency_id, asset_id, verified_by_id, verified_at, data)
         VALUES ($1,$2,$3,$4,$5,$6::jsonb)`,
        [
          verification.id,
          verification.agencyId,
          verification.assetId,
          verification.verifiedById,
          safeDate(verification.verifiedAt, new Date()),
          JSON.stringify(verification)
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictError(`Verification already recorded: ${verification.id}`);
      }
      throw error;
    }
  }

  async listAssetVerifications(query: AssetVerificationQuery): Promise<AssetVerificationRecord[]> {
    const clauses = ["agency_id=$1"];
    const values: unknown[] = [query.agencyId];
    if (query.assetId) {
      values.push(query.assetId);
      clauses.push(`asset_id=$${values.length}`);
    }
    if (query.verifiedById) {
      values.push(query.verifiedById);
      clauses.push(`verified_by_id=$${values.length}`);
    }
    if (query.fromDate) {
      values.push(query.fromDate);
      clauses.push(`(verified_at AT TIME ZONE 'UTC')::date >= $${values.length}::date`);
    }
    if (query.toDate) {
      values.push(query.toDate);
      clauses.push(`(verified_at AT TIME ZONE 'UTC')::date <= $${values.length}::date`);
    }
    return this.selectMany<AssetVerificationRecord>(
      `SELECT data FROM assetline_asset_verifications WHERE ${clauses.join(" AND ")} ORDER BY verified_at DESC`,
      values
    );
  }
}
