export interface AgencyRecord {
  id: string;
  code: string;
  name: string;
  createdAt: string;
  updatedAt: string;
}

export interface AgencyConfigRecord {
  agencyId: string;
  assetMgmtEnabled: boolean;
  requireManagerApproval: boolean;
  assetTagAutoGenerate: boolean;
  assetTagPrefix: string;
  assetTagLength: number;
  assetQrIncludeUrl: boolean;
  updatedAt: string;
}

export interface UnitRecord {
  id: string;
  agencyId: string;
  name: string;
  unitHeadId: string | null;
  assetManagerIds: string[];
  isCoreUnit: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface AgencyAssetRolesRecord {
  agencyId: string;
  operationsManagerId: string | null;
  ictCustodianIds: string[];
  lineProviderContactIds: string[];
  updatedAt: string;
}

/** Directory entry mirrored from the identity provider. */
export interface UserProfile {
  id: string;
  agencyId: string;
  unitId: string | null;
  displayName: string;
  email: string | null;
  isSuperuser: boolean;
  active: boolean;
}

export interface AssetCategoryRecord {
  id: string;
  agencyId: string;
  name: string;
  createdAt: string;
}

export type AssetStatus = "available" | "assigned" | "maintenance" | "retired";

export interface AssetRecord {
  id: string;
  agencyId: string;
  categoryId: string;
  unitId: string | null;
  name: string;
  serialNumber: string | null;
  assetTag: string | null;
  tagGenerated: boolean;
  status: AssetStatus;
  currentHolderId: string | null;
  qrPayload: string;
  acquiredAt: string | null;
  retiredAt: string | null;
  eolDueDate: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type AssetRequestStatus =
  | "draft"
  | "pending_manager"
  | "pending_ict"
  | "assigned"
  | "received"
  | "rejected"
  | "cancelled";

export interface AssetRequestRecord {
  id: string;
  agencyId: string;
  requesterId: string;
  unitId: string | null;
  categoryId: string;
  justification: string;
  status: AssetRequestStatus;
  assignedAssetId: string | null;
  approverId: string | null;
  approvedAt: string | null;
  rejectionReason: string | null;
  assignedById: string | null;
  assignedAt: string | null;
  receivedAt: string | null;
  cancelledAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ReturnRequestStatus = "pending_ict" | "in_transit" | "received" | "cancelled";

export const OPEN_RETURN_STATUSES: readonly ReturnRequestStatus[] = ["pending_ict", "in_transit"];

export interface AssetReturnRequestRecord {
  id: string;
  agencyId: string;
  assetId: string;
  requestedById: string;
  reason: string;
  status: ReturnRequestStatus;
  exitRequestId: string | null;
  verifiedById: string | null;
  verifiedAt: string | null;
  verificationNote: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Statuses a change request may move an asset into. `assigned` only happens through the request workflow. */
export type ChangeableAssetStatus = Exclude<AssetStatus, "assigned">;

/**
 * Editable asset fields and the value each carries in a change request.
 * A proposal holds only the fields that differ from the asset.
 */
export interface AssetChangeValues {
  name: string;
  status: ChangeableAssetStatus;
  categoryId: string;
  unitId: string | null;
  serialNumber: string | null;
  assetTag: string | null;
  acquiredAt: string | null;
}

export type ProposedChanges = Partial<AssetChangeValues>;

export type ChangeRequestStatus = "pending_manager" | "approved" | "rejected" | "cancelled";

export interface AssetChangeRequestRecord {
  id: string;
  agencyId: string;
  assetId: string;
  requestedById: string;
  proposedChanges: ProposedChanges;
  reason: string;
  status: ChangeRequestStatus;
  decidedById: string | null;
  decidedAt: string | null;
  decisionNote: string;
  createdAt: string;
  updatedAt: string;
}

export type AssetHistoryEvent =
  | "registered"
  | "assigned"
  | "receipt_verified"
  | "return_initiated"
  | "return_in_transit"
  | "return_cancelled"
  | "return_received"
  | "retired"
  | "status_change"
  | "request_submitted"
  | "request_approved"
  | "request_rejected"
  | "request_cancelled"
  | "exit_initiated"
  | "exit_cleared"
  | "line_suspended"
  | "verified";

export interface AssetHistoryRecord {
  id: string;
  agencyId: string;
  sequence: number;
  assetId: string | null;
  actorId: string | null;
  event: AssetHistoryEvent;
  note: string;
  meta: Record<string, unknown>;
  occurredAt: string;
  prevEntryHash: string | null;
  entryHash: string;
}

export type ExitReason = "resigned" | "reassigned";

export type ExitRequestStatus = "pending_returns" | "pending_ict_confirmation" | "cleared";

export interface ExitRequestRecord {
  id: string;
  agencyId: string;
  userId: string;
  reason: ExitReason;
  status: ExitRequestStatus;
  returnRequestIds: string[];
  suspendedLineIds: string[];
  createdAt: string;
  updatedAt: string;
  clearedAt: string | null;
  clearedById: string | null;
}

export type CommunicationLineType = "voice" | "data" | "voice_data";

export type CommunicationLineStatus = "available" | "assigned" | "suspended" | "retired";

export interface CommunicationLineRecord {
  id: string;
  agencyId: string;
  lineType: CommunicationLineType;
  provider: string;
  msisdn: string;
  simSerial: string | null;
  status: CommunicationLineStatus;
  assignedToId: string | null;
  issuedAt: string | null;
  suspendedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type VerificationMethod = "manual" | "scan";

/** A physical sighting of an asset, recorded by someone entitled to vouch for it. */
export interface AssetVerificationRecord {
  id: string;
  agencyId: string;
  assetId: string;
  verifiedById: string;
  verifiedAt: string;
  method: VerificationMethod;
  /** What was typed or scanned: the tag as entered, or the asset id a scan resolved to. */
  tagEntered: string;
  note: string;
  location: string;
}

export interface PersistedState {
  agencies: AgencyRecord[];
  agencyConfigs: AgencyConfigRecord[];
  units: UnitRecord[];
  assetRoles: AgencyAssetRolesRecord[];
  users: UserProfile[];
  categories: AssetCategoryRecord[];
  assets: AssetRecord[];
  assetRequests: AssetRequestRecord[];
  returnRequests: AssetReturnRequestRecord[];
  changeRequests: AssetChangeRequestRecord[];
  history: AssetHistoryRecord[];
  exitRequests: ExitRequestRecord[];
  communicationLines: CommunicationLineRecord[];
  assetVerifications: AssetVerificationRecord[];
}

export interface AssetListFilter {
  status?: AssetStatus | undefined;
  unitId?: string | undefined;
  categoryId?: string | undefined;
  holderId?: string | undefined;
}

export interface AssetHistoryQuery {
  agencyId: string;
  assetId?: string | undefined;
  from?: string | undefined;
  to?: string | undefined;
  limit?: number | undefined;
}

export interface AssetVerificationQuery {
  agencyId: string;
  assetId?: string | undefined;
  verifiedById?: string | undefined;
  /** Inclusive UTC calendar dates (`YYYY-MM-DD`). */
  fromDate?: string | undefined;
  toDate?: string | undefined;
}
