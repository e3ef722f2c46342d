import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type { CommunicationLineRecord, CommunicationLineType, UserProfile } from "../types/domain.js";
import type { RoleResolver } from "./role-resolver.js";

export interface RegisterLineInput {
  agencyId: string;
  lineType: CommunicationLineType;
  provider: string;
  msisdn: string;
  simSerial?: string | null | undefined;
}

function normalizeMsisdn(value: string): string {
  const compact = value.replace(/[\s-]/g, "");
  if (!/^\+?\d{6,15}$/.test(compact)) {
    throw new ValidationError(`Not a valid MSISDN: ${value}`);
  }
  return compact;
}

/** SIM voice/data lines issued to staff. Exits suspend them alongside asset returns. */
export class CommunicationLineService {
  constructor(
    private readonly store: PlatformStore,
    private readonly roles: RoleResolver
  ) {}

  async register(actor: UserProfile, input: RegisterLineInput): Promise<CommunicationLineRecord> {
    const msisdn = normalizeMsisdn(input.msisdn);
    const provider = input.provider.trim();
    if (!provider) {
      throw new ValidationError("Line provider is required.");
    }
    this.roles.requireSameAgency(actor, input.agencyId);

    return this.store.transaction(async (tx) => {
      await this.roles.requireCustodian(actor, { agencyId: input.agencyId, unitId: null, currentHolderId: null }, tx);
      if (await tx.findCommunicationLineByMsisdn(msisdn)) {
        throw new ValidationError(`MSISDN already registered: ${msisdn}`);
      }
      const now = nowIso();
      const line: CommunicationLineRecord = {
        id: createId("line"),
        agencyId: input.agencyId,
        lineType: input.lineType,
        provider,
        msisdn,
        simSerial: input.simSerial?.trim() || null,
        status: "available",
        assignedToId: null,
        issuedAt: null,
        suspendedAt: null,
        createdAt: now,
        updatedAt: now
      };
      await tx.saveCommunicationLine(line);
      return line;
    });
  }

  async assign(actor: UserProfile, lineId: string, userId: string): Promise<CommunicationLineRecord> {
    return this.store.transaction(async (tx) => {
      const line = await tx.getCommunicationLine(lineId);
      if (!line) {
        throw new NotFoundError(`Communication line not found: ${lineId}`);
      }
      this.roles.requireSameAgency(actor, line.agencyId);
      await this.roles.requireCustodian(actor, { agencyId: line.agencyId, unitId: null, currentHolderId: null }, tx);
      if (line.status !== "available") {
        throw new StateConflictError(`Line ${line.msisdn} is not available (status ${line.status}).`);
      }
      const user = await tx.getUser(userId);
      if (!user || user.agencyId !== line.agencyId) {
        throw new ValidationError(`Unknown user for this agency: ${userId}`);
      }
      const now = nowIso();
      const assigned: CommunicationLineRecord = {
        ...line,
        status: "assigned",
        assignedToId: user.id,
        issuedAt: now,
        updatedAt: now
      };
      await tx.saveCommunicationLine(assigned);
      return assigned;
    });
  }

  async listForUser(actor: UserProfile, userId: string): Promise<CommunicationLineRecord[]> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User not found: ${userId}`);
    }
    this.roles.requireSameAgency(actor, user.agencyId);
    if (actor.id !== user.id) {
      const resolved = await this.roles.resolve(actor, { agencyId: user.agencyId, unitId: null, currentHolderId: null });
      if (!resolved.isCustodian) {
        throw new AuthorizationError("Only ICT custodians may view another user's lines.");
      }
    }
    return this.store.listCommunicationLinesByAssignee(user.agencyId, user.id);
  }
}
