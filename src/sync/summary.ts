import type { SyncOutcomeStatus } from '../domain/types.js';

export interface EntitySweepSummary {
  entity: 'invoices' | 'contracts';
  pending: number;
  uploaded: number;
  skipped: number; // unchanged since the last upload
  ineligible: number;
  inProgress: number; // held by a live attempt elsewhere
  failed: number;
  ms: number;
}

export interface SweepSummary {
  start: string; // ISO
  end: string; // ISO
  durationMs: number;
  success: boolean;
  error?: string;
  entities: EntitySweepSummary[];
}

let lastSummary: SweepSummary | null = null;
let inProgress = false;
let startedAt = 0;

export function emptyEntitySummary(entity: EntitySweepSummary['entity']): EntitySweepSummary {
  return { entity, pending: 0, uploaded: 0, skipped: 0, ineligible: 0, inProgress: 0, failed: 0, ms: 0 };
}

export function tally(summary: EntitySweepSummary, status: SyncOutcomeStatus) {
  switch (status) {
    case 'uploaded': summary.uploaded += 1; break;
    case 'skipped_unchanged': summary.skipped += 1; break;
    case 'ineligible': summary.ineligible += 1; break;
    case 'in_progress': summary.inProgress += 1; break;
    case 'failed': summary.failed += 1; break;
  }
}

export function markSweepStart() {
  inProgress = true;
  startedAt = Date.now();
}

export function setLastSummary(summary: SweepSummary) {
  lastSummary = summary;
  inProgress = false;
}

export function getLastSummary() {
  return { lastSummary, inProgress, startedAt };
}
