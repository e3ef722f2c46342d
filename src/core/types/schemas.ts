import { z } from "zod";

const id = z.string().min(1).max(128);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date.");
// Stored timestamps always carry milliseconds, so bounds are normalized to the same form.
const instant = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

export const createAgencySchema = z.object({
  code: z.string().min(2).max(16),
  name: z.string().min(1).max(200)
});

export const upsertUnitSchema = z.object({
  id: id.optional(),
  name: z.string().min(1).max(200),
  unitHeadId: id.nullable().optional(),
  assetManagerIds: z.array(id).max(100).optional(),
  isCoreUnit: z.boolean().optional()
});

export const upsertCategorySchema = z.object({
  id: id.optional(),
  name: z.string().min(1).max(200)
});

export const upsertUserSchema = z.object({
  id,
  unitId: id.nullable().optional(),
  displayName: z.string().min(1).max(200),
  email: z.string().email().nullable().optional(),
  isSuperuser: z.boolean().optional(),
  active: z.boolean().optional()
});

export const assetRolesSchema = z.object({
  operationsManagerId: id.nullable().optional(),
  ictCustodianIds: z.array(id).max(100).optional(),
  lineProviderContactIds: z.array(id).max(100).optional()
});

export const agencyConfigPatchSchema = z
  .object({
    assetMgmtEnabled: z.boolean(),
    requireManagerApproval: z.boolean(),
    assetTagAutoGenerate: z.boolean(),
    assetTagPrefix: z.string().max(16),
    assetTagLength: z.number().int().min(1).max(12),
    assetQrIncludeUrl: z.boolean()
  })
  .partial()
  .strict();

export const registerAssetSchema = z.object({
  categoryId: id,
  name: z.string().min(1).max(200),
  unitId: id.nullable().optional(),
  serialNumber: z.string().max(128).nullable().optional(),
  assetTag: z.string().max(64).nullable().optional(),
  acquiredAt: isoDate.nullable().optional(),
  eolDueDate: isoDate.nullable().optional()
});

export const assetListQuerySchema = z.object({
  status: z.enum(["available", "assigned", "maintenance", "retired"]).optional(),
  unitId: id.optional(),
  categoryId: id.optional(),
  holderId: id.optional()
});

export const retireAssetSchema = z.object({
  note: z.string().max(2000).default("")
});

export const eolQuerySchema = z.object({
  asOf: isoDate.optional()
});

export const lookupQuerySchema = z.object({
  ref: z.string().min(1).max(512)
});

export const verifyAssetSchema = z.object({
  reference: z.string().min(1).max(512),
  method: z.enum(["manual", "scan"]).default("manual"),
  note: z.string().max(2000).default(""),
  location: z.string().max(200).default("")
});

export const verificationQuerySchema = z.object({
  tag: z.string().min(1).max(64).optional(),
  unitId: id.optional(),
  categoryId: id.optional(),
  verifiedById: id.optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export const createAssetRequestSchema = z.object({
  categoryId: id,
  unitId: id.nullable().optional(),
  justification: z.string().min(1).max(4000)
});

export const rejectRequestSchema = z.object({
  reason: z.string().min(1).max(2000)
});

export const assignAssetSchema = z.object({
  assetId: id
});

export const initiateReturnSchema = z.object({
  assetId: id,
  reason: z.string().max(2000).default("")
});

export const verifyReturnSchema = z.object({
  note: z.string().max(2000).default("")
});

/**
 * The only fields a change request may touch. Unknown keys are rejected; `acquiredAt` is
 * checked as a calendar date by the service.
 */
export const proposedChangesSchema = z
  .object({
    name: z.string().min(1).max(200),
    status: z.enum(["available", "maintenance", "retired"]),
    categoryId: id,
    unitId: id.nullable(),
    serialNumber: z.string().max(128).nullable(),
    assetTag: z.string().max(64).nullable(),
    acquiredAt: z.string().max(32).nullable()
  })
  .partial()
  .strict();

export const proposeChangeSchema = z.object({
  assetId: id,
  changes: proposedChangesSchema,
  reason: z.string().max(2000).default("")
});

export const decideChangeSchema = z.object({
  note: z.string().max(2000).default("")
});

export const exitOrganizationSchema = z.object({
  reason: z.enum(["resigned", "reassigned"]),
  typedConfirmation: z.string().min(1).max(32)
});

export const registerLineSchema = z.object({
  lineType: z.enum(["voice", "data", "voice_data"]),
  provider: z.string().min(1).max(100),
  msisdn: z.string().min(6).max(32),
  simSerial: z.string().max(64).nullable().optional()
});

export const assignLineSchema = z.object({
  userId: id
});

export const historyQuerySchema = z.object({
  assetId: id.optional(),
  from: instant.optional(),
  to: instant.optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional()
});
