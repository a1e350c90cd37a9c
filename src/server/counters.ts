import type { SyncOutcomeStatus } from '../domain/types.js';
import type { SweepSummary } from '../sync/summary.js';

let totalSweeps = 0;
let failedSweeps = 0;
let lastDurationMs = 0;
const outcomes: Record<SyncOutcomeStatus, number> = {
  ineligible: 0,
  skipped_unchanged: 0,
  in_progress: 0,
  uploaded: 0,
  failed: 0,
};

export function noteOutcome(status: SyncOutcomeStatus, count = 1) {
  outcomes[status] += count;
}

export function noteSweep(summary: SweepSummary) {
  totalSweeps += 1;
  if (!summary.success) failedSweeps += 1;
  lastDurationMs = summary.durationMs;
  for (const e of summary.entities) {
    noteOutcome('uploaded', e.uploaded);
    noteOutcome('skipped_unchanged', e.skipped);
    noteOutcome('ineligible', e.ineligible);
    noteOutcome('in_progress', e.inProgress);
    noteOutcome('failed', e.failed);
  }
}

export function getCounters() {
  return { totalSweeps, failedSweeps, lastDurationMs, outcomes: { ...outcomes } };
}

export function resetCounters() {
  totalSweeps = 0;
  failedSweeps = 0;
  lastDurationMs = 0;
  outcomes.ineligible = 0;
  outcomes.skipped_unchanged = 0;
  outcomes.in_progress = 0;
  outcomes.uploaded = 0;
  outcomes.failed = 0;
}
