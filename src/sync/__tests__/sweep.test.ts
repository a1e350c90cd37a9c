import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createPortalReconciler } from '../reconcile.js';
import { getLastSummary, tally, emptyEntitySummary } from '../summary.js';
import { isSweepRunning, runSweep } from '../sweep.js';
import { FakeRenderer, InMemoryStore, RecordingBackend, makeBusiness, makeClient, makeContract, makeInvoice } from './helpers/fakes.js';

const NOW = Date.parse('2024-03-02T10:00:00Z');
const STALE_MS = 15 * 60_000;

let store: InMemoryStore;
let backend: RecordingBackend;

function deps(extra: { persistSummary?: (s: unknown) => Promise<void> } = {}) {
    const reconciler = createPortalReconciler({ store, backend, renderer: new FakeRenderer(), staleAfterMs: STALE_MS, now: () => NOW });
    return { store, reconciler, staleAfterMs: STALE_MS, now: () => NOW, ...extra };
}

beforeEach(() => {
    backend = new RecordingBackend();
    store = new InMemoryStore({
        invoices: [
            makeInvoice({ id: 'inv-a', portalNeedsUpload: true }),
            makeInvoice({ id: 'inv-b', portalNeedsUpload: true, invoiceNumber: 'INV-002' }),
            makeInvoice({ id: 'inv-clean' }),
            // Held by a live attempt elsewhere: not picked up
            makeInvoice({ id: 'inv-held', portalNeedsUpload: true, portalUploadInFlight: true, portalUploadStartedAtMs: NOW - 1000 }),
        ],
        contracts: [
            makeContract({ id: 'con-orphan', clientId: null, portalNeedsUpload: true }),
            // Abandoned by a dead worker: picked up and finished
            makeContract({ id: 'con-stale', portalNeedsUpload: true, portalUploadInFlight: true, portalUploadStartedAtMs: NOW - STALE_MS - 1 }),
        ],
        clients: [makeClient()],
        businesses: [makeBusiness()],
    });
});

describe('runSweep', () => {
    it('reconciles pending invoices then contracts and tallies outcomes', async () => {
        const persistSummary = vi.fn(async () => undefined);
        const summary = await runSweep(deps({ persistSummary }));

        expect(summary.success).toBe(true);
        expect(summary.error).toBeUndefined();
        expect(summary.entities).toEqual([
            { entity: 'invoices', pending: 2, uploaded: 2, skipped: 0, ineligible: 0, inProgress: 0, failed: 0, ms: expect.any(Number) },
            { entity: 'contracts', pending: 2, uploaded: 1, skipped: 0, ineligible: 1, inProgress: 0, failed: 0, ms: expect.any(Number) },
        ]);
        expect(persistSummary).toHaveBeenCalledWith(summary);
        expect(getLastSummary()).toMatchObject({ lastSummary: summary, inProgress: false });
        expect(store.invoice('inv-held').portalUploadInFlight).toBe(true);
        expect(store.contract('con-stale').portalUploadInFlight).toBe(false);
        expect(isSweepRunning()).toBe(false);
    });

    it('counts per-document failures without failing the sweep', async () => {
        backend.failUpload = new Error('blob store offline');
        const summary = await runSweep(deps());
        expect(summary.success).toBe(true);
        expect(summary.entities[0]).toMatchObject({ pending: 2, failed: 2, uploaded: 0 });
        expect(store.invoice('inv-a').portalLastUploadError).toBe('blob store offline');
    });

    it('records a failed sweep when the store cannot list pending documents', async () => {
        vi.spyOn(store, 'listPendingIds').mockRejectedValueOnce(new Error('not primary'));
        const summary = await runSweep(deps());
        expect(summary).toMatchObject({ success: false, error: 'not primary', entities: [] });
    });

    it('keeps the summary when persisting it fails', async () => {
        const summary = await runSweep(deps({ persistSummary: async () => { throw new Error('write concern'); } }));
        expect(getLastSummary().lastSummary).toBe(summary);
    });

    it('runs overlapping sweeps one after the other', async () => {
        const [a, b] = await Promise.all([runSweep(deps()), runSweep(deps())]);
        expect(a.entities[0].uploaded).toBe(2);
        expect(b.entities[0].pending).toBe(0);
        expect(backend.count('upload')).toBe(3);
    });
});

describe('tally', () => {
    it('counts each outcome in its own column', () => {
        const s = emptyEntitySummary('invoices');
        tally(s, 'uploaded');
        tally(s, 'uploaded');
        tally(s, 'skipped_unchanged');
        tally(s, 'in_progress');
        tally(s, 'failed');
        expect(s).toEqual({ entity: 'invoices', pending: 0, uploaded: 2, skipped: 1, ineligible: 0, inProgress: 1, failed: 1, ms: 0 });
    });
});
