import { canonicalStringify } from "../../lib/canonical-json.js";
import { sha256Hex } from "../../lib/hash.js";
import { createId } from "../../lib/id.js";
import { nowIso } from "../../lib/time.js";
import { ValidationError } from "../errors.js";
import type { PlatformStore } from "../store/platform-store.js";
import type { AssetHistoryEvent, AssetHistoryQuery, AssetHistoryRecord } from "../types/domain.js";

export interface AuditEntryInput {
  agencyId: string;
  assetId: string | null;
  actorId: string | null;
  event: AssetHistoryEvent;
  note?: string | undefined;
  meta?: Record<string, unknown> | undefined;
}

export interface ChainVerification {
  isValid: boolean;
  checkedEntries: number;
  lastSequence: number;
  lastEntryHash: string | null;
  errors: string[];
}

function computeEntryHash(entry: Omit<AssetHistoryRecord, "id" | "entryHash">): string {
  return sha256Hex(
    canonicalStringify({
      sequence: entry.sequence,
      agencyId: entry.agencyId,
      assetId: entry.assetId,
      actorId: entry.actorId,
      event: entry.event,
      note: entry.note,
      meta: entry.meta,
      occurredAt: entry.occurredAt,
      prevEntryHash: entry.prevEntryHash
    })
  );
}

/** History timestamps compare as strings, so bounds must use the stored `toISOString()` form. */
function normalizeBound(field: string, value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ValidationError(`${field} must be an ISO-8601 timestamp.`);
  }
  return new Date(time).toISOString();
}

/**
 * Append-only asset history. Each agency has its own hash chain; an entry's hash covers
 * its content and the previous entry's hash.
 */
export class AuditLedgerService {
  constructor(private readonly store: PlatformStore) {}

  /** Must be called with the transaction store of the operation being recorded. */
  async append(tx: PlatformStore, input: AuditEntryInput): Promise<AssetHistoryRecord> {
    const previous = await tx.getLatestAssetHistory(input.agencyId);
    const unhashed = {
      agencyId: input.agencyId,
      sequence: (previous?.sequence ?? 0) + 1,
      assetId: input.assetId,
      actorId: input.actorId,
      event: input.event,
      note: input.note ?? "",
      meta: input.meta ?? {},
      occurredAt: nowIso(),
      prevEntryHash: previous?.entryHash ?? null
    };
    const entry: AssetHistoryRecord = {
      id: createId("hist"),
      ...unhashed,
      entryHash: computeEntryHash(unhashed)
    };
    await tx.appendAssetHistory(entry);
    return entry;
  }

  async list(query: AssetHistoryQuery): Promise<AssetHistoryRecord[]> {
    const limit = query.limit === undefined ? undefined : Math.min(1000, Math.max(1, query.limit));
    return this.store.listAssetHistory({
      ...query,
      from: normalizeBound("from", query.from),
      to: normalizeBound("to", query.to),
      limit
    });
  }

  async verifyChain(agencyId: string): Promise<ChainVerification> {
    const entries = await this.store.listAssetHistory({ agencyId });
    const errors: string[] = [];
    let previousHash: string | null = null;
    for (let index = 0; index < entries.length; index += 1) {
      const current = entries[index];
      if (!current) {
        continue;
      }
      const expectedSequence = index + 1;
      if (current.sequence !== expectedSequence) {
        errors.push(`Invalid sequence at index ${index}: expected ${expectedSequence} got ${current.sequence}.`);
      }
      if (current.prevEntryHash !== previousHash) {
        errors.push(`Broken link at sequence ${current.sequence}.`);
      }
      if (computeEntryHash(current) !== current.entryHash) {
        errors.push(`Entry hash mismatch at sequence ${current.sequence}.`);
      }
      previousHash = current.entryHash;
    }
    const last = entries.at(-1);
    return {
      isValid: errors.length === 0,
      checkedEntries: entries.length,
      lastSequence: last?.sequence ?? 0,
      lastEntryHash: last?.entryHash ?? null,
      errors
    };
  }
}
