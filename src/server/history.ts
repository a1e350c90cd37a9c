import { SweepSummaryModel, SyncAttemptModel } from '../db/models.js';
import type { DocumentKind } from '../domain/types.js';
import type { SyncAttempt } from '../sync/reconcile.js';
import type { SweepSummary } from '../sync/summary.js';

export interface AttemptRow {
  kind: string;
  documentId: string;
  outcome: string;
  message?: string;
  reusedBlob?: boolean;
  blobUrl?: string;
  ms?: number;
  ts: Date;
}

export interface AttemptQuery {
  kind?: DocumentKind;
  documentId?: string;
  since?: Date;
  limit: number;
}

/** Persisted sweep summaries and sync attempts, as the status pages read them. */
export interface SyncHistory {
  saveSummary(summary: SweepSummary): Promise<void>;
  listSummaries(limit: number): Promise<SweepSummary[]>;
  saveAttempt(attempt: SyncAttempt): Promise<void>;
  listAttempts(query: AttemptQuery): Promise<AttemptRow[]>;
}

export function toAttemptRow(attempt: SyncAttempt, ts = new Date()): AttemptRow {
  const { outcome } = attempt;
  return {
    kind: attempt.kind,
    documentId: attempt.documentId,
    outcome: outcome.status,
    message: outcome.status === 'failed' ? outcome.message : undefined,
    reusedBlob: outcome.status === 'uploaded' ? outcome.reusedBlob : undefined,
    blobUrl: outcome.status === 'uploaded' ? outcome.blobUrl : undefined,
    ms: attempt.ms,
    ts,
  };
}

export function createMongoHistory(): SyncHistory {
  return {
    async saveSummary(summary) {
      await SweepSummaryModel.create(summary);
    },
    async listSummaries(limit) {
      return await SweepSummaryModel.find({}, { _id: 0 }).sort({ start: -1 }).limit(limit).lean<SweepSummary[]>();
    },
    async saveAttempt(attempt) {
      await SyncAttemptModel.create(toAttemptRow(attempt));
    },
    async listAttempts(query) {
      const filter: Record<string, unknown> = {};
      if (query.kind) filter.kind = query.kind;
      if (query.documentId) filter.documentId = query.documentId;
      if (query.since) filter.ts = { $gte: query.since };
      return await SyncAttemptModel.find(filter, { _id: 0 }).sort({ ts: -1 }).limit(query.limit).lean<AttemptRow[]>();
    },
  };
}
