import { Mutex } from 'async-mutex';
import logger from '../util/logger.js';
import type { DocumentStore, SyncCollection } from '../db/store.js';
import type { PortalReconciler } from './reconcile.js';
import { EntitySweepSummary, SweepSummary, emptyEntitySummary, markSweepStart, setLastSummary, tally } from './summary.js';

const mutex = new Mutex();

export interface SweepDeps {
    store: DocumentStore;
    reconciler: PortalReconciler;
    staleAfterMs: number;
    /** Cap on documents picked up per collection in one sweep. */
    batchLimit?: number;
    now?: () => number;
    persistSummary?: (summary: SweepSummary) => Promise<void>;
}

export function isSweepRunning(): boolean {
    return mutex.isLocked();
}

async function sweepCollection(deps: SweepDeps, collection: SyncCollection, nowMs: number): Promise<EntitySweepSummary> {
    const started = Date.now();
    const summary = emptyEntitySummary(collection);
    const ids = await deps.store.listPendingIds(collection, nowMs - deps.staleAfterMs, deps.batchLimit);
    summary.pending = ids.length;
    for (const id of ids) {
        // Invoices and estimates share a collection; the reconciler tells them apart
        const outcome = collection === 'contracts' ? await deps.reconciler.reconcileContract(id) : await deps.reconciler.reconcileInvoice(id);
        tally(summary, outcome.status);
    }
    summary.ms = Date.now() - started;
    logger.info({ ...summary }, `Portal sweep of ${collection} completed`);
    return summary;
}

/**
 * Reconciles every document still flagged dirty, plus any whose in-flight
 * flag went stale. Sweeps never overlap; a second caller waits its turn.
 */
export async function runSweep(deps: SweepDeps): Promise<SweepSummary> {
    return mutex.runExclusive(async () => {
        const now = deps.now ?? Date.now;
        const start = Date.now();
        const startIso = new Date(start).toISOString();
        logger.info('Portal sweep started');
        markSweepStart();
        const entities: EntitySweepSummary[] = [];
        let overallError: unknown = null;
        try {
            entities.push(await sweepCollection(deps, 'invoices', now()));
            entities.push(await sweepCollection(deps, 'contracts', now()));
        } catch (err) {
            overallError = err;
            logger.error({ err }, 'Portal sweep failed');
        }
        const end = Date.now();
        const summary: SweepSummary = {
            start: startIso,
            end: new Date(end).toISOString(),
            durationMs: end - start,
            success: !overallError,
            error: overallError ? (overallError instanceof Error ? overallError.message : String(overallError)) : undefined,
            entities,
        };
        setLastSummary(summary);
        if (deps.persistSummary) {
            try {
                await deps.persistSummary(summary);
            } catch (e) {
                logger.warn({ err: e }, 'Failed to persist sweep summary');
            }
        }
        return summary;
    });
}
