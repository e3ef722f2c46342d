import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createId } from "../src/lib/id.js";
import { createPlatformContext, type PlatformContextOptions } from "../src/core/services/platform-context.js";
import type { NotificationMessage, NotificationSink } from "../src/core/services/notification-service.js";
import type { AssetCategoryRecord, AssetRecord, UnitRecord, UserProfile } from "../src/core/types/domain.js";

export class RecordingSink implements NotificationSink {
  readonly messages: NotificationMessage[] = [];

  async send(message: NotificationMessage): Promise<void> {
    this.messages.push(message);
  }

  byTemplate(templateId: string): NotificationMessage[] {
    return this.messages.filter((message) => message.templateId === templateId);
  }
}

export class FailingSink implements NotificationSink {
  attempts = 0;

  async send(): Promise<void> {
    this.attempts += 1;
    throw new Error("smtp unavailable");
  }
}

export function cleanup(path: string): void {
  if (existsSync(path)) {
    rmSync(path, { force: true, recursive: true });
  }
}

export function makeContext(options?: PlatformContextOptions) {
  const suffix = createId("test");
  const baseDir = mkdtempSync(join(tmpdir(), `assetline-${suffix}-`));
  const sink = new RecordingSink();
  const ctx = createPlatformContext({
    dataFilePath: join(baseDir, `${suffix}-state.json`),
    notificationSink: sink,
    ...options
  });
  return { ctx, sink, baseDir };
}

export type TestContext = ReturnType<typeof makeContext>["ctx"];

export interface Seed {
  agencyId: string;
  root: UserProfile;
  custodian: UserProfile;
  opsManager: UserProfile;
  unitHead: UserProfile;
  assetManager: UserProfile;
  lineContact: UserProfile;
  staff: UserProfile;
  coreStaff: UserProfile;
  fieldUnit: UnitRecord;
  coreUnit: UnitRecord;
  laptops: AssetCategoryRecord;
  phones: AssetCategoryRecord;
}

/**
 * One agency with a field unit (head + asset manager), a core unit, an ICT custodian,
 * an operations manager and a line-provider contact. Every user has an email.
 */
export async function seedAgency(ctx: TestContext): Promise<Seed> {
  const org = ctx.organizationService;
  const bootstrapped = await org.bootstrap({
    agencyCode: "mof",
    agencyName: "Ministry of Files",
    superuserId: "root",
    displayName: "Root Admin",
    email: "root@agency.test"
  });
  if (!bootstrapped) {
    throw new Error("store was not empty");
  }
  const root = bootstrapped.superuser;
  const agencyId = bootstrapped.agency.id;

  const user = (id: string, displayName: string, unitId: string | null = null) =>
    org.upsertUser(root, agencyId, { id, displayName, unitId, email: `${id}@agency.test` });

  const custodian = await user("ict_1", "Ivy Custodian");
  const opsManager = await user("ops_1", "Omar Operations");
  const unitHead = await user("head_1", "Hana Head");
  const assetManager = await user("amgr_1", "Alex Manager");
  const lineContact = await user("telco_1", "Tara Telco");

  const fieldUnit = await org.upsertUnit(root, agencyId, {
    id: "unit_field",
    name: "Field Office",
    unitHeadId: unitHead.id,
    assetManagerIds: [assetManager.id]
  });
  const coreUnit = await org.upsertUnit(root, agencyId, { id: "unit_core", name: "Headquarters", isCoreUnit: true });

  const staff = await user("staff_1", "Sam Staff", fieldUnit.id);
  const coreStaff = await user("staff_core", "Cory Core", coreUnit.id);

  await org.setAssetRoles(root, agencyId, {
    operationsManagerId: opsManager.id,
    ictCustodianIds: [custodian.id],
    lineProviderContactIds: [lineContact.id]
  });

  const laptops = await org.upsertCategory(root, agencyId, "Laptops", "cat_laptop");
  const phones = await org.upsertCategory(root, agencyId, "Phones", "cat_phone");

  return {
    agencyId,
    root,
    custodian,
    opsManager,
    unitHead,
    assetManager,
    lineContact,
    staff,
    coreStaff,
    fieldUnit,
    coreUnit,
    laptops,
    phones
  };
}

export async function registerLaptop(
  ctx: TestContext,
  seed: Seed,
  overrides?: { name?: string; unitId?: string | null; serialNumber?: string | null; assetTag?: string | null }
): Promise<AssetRecord> {
  return ctx.assetRegistryService.register(seed.custodian, {
    agencyId: seed.agencyId,
    categoryId: seed.laptops.id,
    name: overrides?.name ?? "ThinkBook 14",
    unitId: overrides?.unitId === undefined ? seed.fieldUnit.id : overrides.unitId,
    serialNumber: overrides?.serialNumber ?? null,
    assetTag: overrides?.assetTag ?? null
  });
}

/** Drives a fresh request for `holder` through approval and assignment of `asset`. */
export async function assignTo(ctx: TestContext, seed: Seed, holder: UserProfile, asset: AssetRecord) {
  const request = await ctx.requestWorkflowService.create(holder, {
    categoryId: asset.categoryId,
    justification: "Needed for field work"
  });
  if (request.status === "pending_manager") {
    await ctx.requestWorkflowService.approve(seed.root, request.id);
  }
  return ctx.requestWorkflowService.assignAsset(seed.custodian, request.id, asset.id);
}
