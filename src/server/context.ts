import type { AppConfig } from '../config.js';
import type { PortalReconciler } from '../sync/reconcile.js';
import type { SweepSummary } from '../sync/summary.js';
import type { SyncHistory } from './history.js';

export interface StatusContext {
  status: AppConfig['status'];
  reconciler: PortalReconciler;
  history: SyncHistory;
  /** Runs one sweep; the caller does not wait for it from a request. */
  sweep: () => Promise<SweepSummary>;
  isSweepRunning: () => boolean;
}
