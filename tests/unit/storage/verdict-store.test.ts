/**
 * Unit tests for the in-memory verdict store and history queries
 *
 * @module tests/unit/storage/verdict-store
 */

import { describe, it, expect } from 'vitest';
import {
  MemoryVerdictStore,
  getLatestSummary,
  getVerificationStatus,
  type SaveVerdictInput,
} from '../../../src/services/storage/verdict-store.js';
import { aggregateVerdicts, errorVerdict } from '../../../src/services/verification/aggregator.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function steppingClock(start: string, stepMs = 1000): () => Date {
  let tick = 0;
  return () => new Date(Date.parse(start) + stepMs * tick++);
}

function input(application_id: string, document_id: string, matched = true): SaveVerdictInput {
  return {
    application_id,
    document_id,
    verdict: aggregateVerdicts([
      { field_name: 'name', matched, reason: 'r' },
      { field_name: 'salary', matched: true, reason: 'r' },
      { field_name: 'employer', matched: true, reason: 'r' },
      { field_name: 'ssn', matched: true, reason: 'r' },
    ]),
    extracted_record: null,
  };
}

describe('MemoryVerdictStore', () => {
  it('assigns ids and timestamps and freezes records', async () => {
    const store = new MemoryVerdictStore({ now: steppingClock('2024-04-01T10:00:00.000Z') });
    const stored = await store.save(input('app-1', 'doc-1'));

    expect(stored.id).toMatch(UUID_V4);
    expect(stored.created_at).toBe('2024-04-01T10:00:00.000Z');
    expect(Object.isFrozen(stored)).toBe(true);
    expect(store.size).toBe(1);
    await expect(store.get(stored.id)).resolves.toBe(stored);
    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('keeps every run for the same document', async () => {
    const store = new MemoryVerdictStore();
    const first = await store.save(input('app-1', 'doc-1'));
    const second = await store.save(input('app-1', 'doc-1'));
    expect(first.id).not.toBe(second.id);
    expect(store.size).toBe(2);
  });

  it('lists newest first per application with pagination', async () => {
    const store = new MemoryVerdictStore({ now: steppingClock('2024-04-01T10:00:00.000Z') });
    const a1 = await store.save(input('app-1', 'doc-1'));
    const b1 = await store.save(input('app-2', 'doc-9'));
    const a2 = await store.save(input('app-1', 'doc-2'));
    const a3 = await store.save(input('app-1', 'doc-3'));

    expect((await store.listByApplication('app-1')).map((r) => r.id)).toEqual([a3.id, a2.id, a1.id]);
    expect((await store.listByApplication('app-1', { limit: 1, offset: 1 })).map((r) => r.id)).toEqual([a2.id]);
    expect((await store.listAll({ limit: 2 })).map((r) => r.id)).toEqual([a3.id, a2.id]);
    expect((await store.listAll({ offset: 3 })).map((r) => r.id)).toEqual([a1.id]);
    await expect(store.latestForApplication('app-2')).resolves.toBe(b1);
    await expect(store.latestForApplication('app-3')).resolves.toBeNull();
  });

  it('breaks timestamp ties by insertion order', async () => {
    const store = new MemoryVerdictStore({ now: () => new Date('2024-04-01T10:00:00.000Z') });
    await store.save(input('app-1', 'doc-1'));
    const later = await store.save(input('app-1', 'doc-2'));
    await expect(store.latestForApplication('app-1')).resolves.toBe(later);
  });
});

describe('history queries', () => {
  it('reports no_documents for an unknown application', async () => {
    const store = new MemoryVerdictStore();
    await expect(getVerificationStatus(store, 'app-1')).resolves.toEqual({
      status: 'no_documents',
      message: 'No documents uploaded for verification',
    });
    await expect(getLatestSummary(store, 'app-1')).resolves.toBeNull();
  });

  it('reports the latest verdict status', async () => {
    const store = new MemoryVerdictStore({ now: steppingClock('2024-04-01T10:00:00.000Z') });
    await store.save(input('app-1', 'doc-1', true));
    await store.save(input('app-1', 'doc-2', false));

    await expect(getVerificationStatus(store, 'app-1')).resolves.toEqual({
      status: 'mismatch',
      message: 'Verification mismatch',
      last_updated: '2024-04-01T10:00:01.000Z',
    });

    const summary = await getLatestSummary(store, 'app-1');
    expect(summary).toMatchObject({
      application_id: 'app-1',
      overall_status: 'mismatch',
      total_fields: 4,
      matched_fields: 3,
      mismatched_fields: 1,
    });
    expect(summary?.verification.document_id).toBe('doc-2');
  });

  it('counts an error verdict as no compared fields', async () => {
    const store = new MemoryVerdictStore();
    await store.save({ application_id: 'app-1', document_id: 'doc-1', verdict: errorVerdict('boom'), extracted_record: null });
    const status = await getVerificationStatus(store, 'app-1');
    expect(status.status).toBe('error');
    expect(await getLatestSummary(store, 'app-1')).toMatchObject({ matched_fields: 0, mismatched_fields: 0 });
  });
});
