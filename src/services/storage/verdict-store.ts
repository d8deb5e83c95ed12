/**
 * Verdict Store
 *
 * Persistence boundary for verification runs. The engine only ever talks to
 * the VerdictStore interface; MemoryVerdictStore keeps verdicts in process
 * and is what the server ships with.
 *
 * @module services/storage/verdict-store
 */

import { v4 as uuidv4 } from 'uuid';

import type { ExtractedRecordJson } from '../../models/extraction.js';
import type {
  OverallStatus,
  StoredVerdict,
  VerdictCounts,
  VerificationVerdict,
} from '../../models/verdict.js';
import { countVerdictFields } from '../verification/aggregator.js';

export interface SaveVerdictInput {
  application_id: string;
  document_id: string;
  verdict: VerificationVerdict;
  extracted_record: ExtractedRecordJson | null;
}

export interface ListVerdictsOptions {
  limit?: number;
  offset?: number;
}

/**
 * Keyed by (application_id, document_id); every save is a new record
 */
export interface VerdictStore {
  save(input: SaveVerdictInput): Promise<StoredVerdict>;
  get(id: string): Promise<StoredVerdict | null>;
  /** Newest first */
  listByApplication(applicationId: string, options?: ListVerdictsOptions): Promise<StoredVerdict[]>;
  latestForApplication(applicationId: string): Promise<StoredVerdict | null>;
  /** Newest first */
  listAll(options?: ListVerdictsOptions): Promise<StoredVerdict[]>;
}

export interface MemoryVerdictStoreOptions {
  /** Clock for created_at */
  now?: () => Date;
}

export class MemoryVerdictStore implements VerdictStore {
  private readonly records: StoredVerdict[] = [];
  private readonly now: () => Date;

  constructor(options: MemoryVerdictStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.records.length;
  }

  async save(input: SaveVerdictInput): Promise<StoredVerdict> {
    const record: StoredVerdict = Object.freeze({
      id: uuidv4(),
      application_id: input.application_id,
      document_id: input.document_id,
      verdict: input.verdict,
      extracted_record: input.extracted_record,
      created_at: this.now().toISOString(),
    });
    this.records.push(record);
    return record;
  }

  async get(id: string): Promise<StoredVerdict | null> {
    return this.records.find((record) => record.id === id) ?? null;
  }

  async listByApplication(applicationId: string, options: ListVerdictsOptions = {}): Promise<StoredVerdict[]> {
    return paginate(
      newestFirst(this.records.filter((record) => record.application_id === applicationId)),
      options
    );
  }

  async latestForApplication(applicationId: string): Promise<StoredVerdict | null> {
    const [latest] = await this.listByApplication(applicationId, { limit: 1 });
    return latest ?? null;
  }

  async listAll(options: ListVerdictsOptions = {}): Promise<StoredVerdict[]> {
    return paginate(newestFirst(this.records), options);
  }
}

/**
 * Reverse insertion order, then stable by created_at descending
 */
function newestFirst(records: StoredVerdict[]): StoredVerdict[] {
  return [...records].reverse().sort((a, b) => b.created_at.localeCompare(a.created_at));
}

function paginate<T>(items: T[], options: ListVerdictsOptions): T[] {
  const offset = options.offset ?? 0;
  return options.limit === undefined ? items.slice(offset) : items.slice(offset, offset + options.limit);
}

// ═══════════════════════════════════════════════════════════════════════════════
// HISTORY QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export type VerificationStatus =
  | { status: 'no_documents'; message: string }
  | { status: OverallStatus; message: string; last_updated: string };

export interface LatestVerificationSummary extends VerdictCounts {
  application_id: string;
  overall_status: OverallStatus;
  verification: StoredVerdict;
}

export async function getVerificationStatus(
  store: VerdictStore,
  applicationId: string
): Promise<VerificationStatus> {
  const latest = await store.latestForApplication(applicationId);
  if (!latest) {
    return { status: 'no_documents', message: 'No documents uploaded for verification' };
  }
  const status = latest.verdict.overall_status;
  return { status, message: `Verification ${status}`, last_updated: latest.created_at };
}

/**
 * Latest verdict plus field counts, or null when the application has none
 */
export async function getLatestSummary(
  store: VerdictStore,
  applicationId: string
): Promise<LatestVerificationSummary | null> {
  const latest = await store.latestForApplication(applicationId);
  if (!latest) return null;
  return {
    application_id: applicationId,
    overall_status: latest.verdict.overall_status,
    ...countVerdictFields(latest.verdict),
    verification: latest,
  };
}
