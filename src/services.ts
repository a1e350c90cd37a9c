import type { AppConfig } from './config.js';
import { createMongoDocumentStore } from './db/store.js';
import { createPdfRenderer } from './pdf/render.js';
import { createPortalBackend } from './portal/backend.js';
import { createPortalHttpClient } from './portal/client.js';
import { createMongoHistory } from './server/history.js';
import { noteSweep } from './server/counters.js';
import { createPortalReconciler } from './sync/reconcile.js';
import { runSweep } from './sync/sweep.js';
import logger from './util/logger.js';

/** Wires the Mongo-backed store and history, the portal backend and the orchestrator. */
export function createServices(cfg: AppConfig) {
    const store = createMongoDocumentStore();
    const history = createMongoHistory();
    const backend = createPortalBackend(createPortalHttpClient(cfg.portal));
    const staleAfterMs = cfg.flags.inFlightStaleMinutes * 60_000;
    const reconciler = createPortalReconciler({
        store,
        backend,
        renderer: createPdfRenderer(),
        staleAfterMs,
        recordAttempt: cfg.flags.attemptLogs
            ? async (attempt) => {
                  try {
                      await history.saveAttempt(attempt);
                  } catch (err) {
                      logger.debug({ err, kind: attempt.kind, id: attempt.documentId }, 'Failed to write sync attempt');
                  }
              }
            : undefined,
    });
    const sweep = async () => {
        const summary = await runSweep({ store, reconciler, staleAfterMs, persistSummary: history.saveSummary });
        noteSweep(summary);
        return summary;
    };
    return { store, history, backend, reconciler, sweep };
}

export type Services = ReturnType<typeof createServices>;
