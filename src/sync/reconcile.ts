import type { Client, Contract, DocumentKind, Invoice, SyncOutcome } from '../domain/types.js';
import { resolveEffectiveTemplateKey, TemplateResolver } from '../domain/templates.js';
import type { DocumentStore, SyncCollection } from '../db/store.js';
import type { PortalBackend } from '../portal/backend.js';
import type { PdfRenderer } from '../pdf/render.js';
import logger from '../util/logger.js';
import { isEligible, resolveContractClient, resolveInvoiceClient } from './eligibility.js';
import { contractFingerprint, invoiceFingerprint } from './fingerprint.js';
import { contractPdfFileName, invoicePdfFileName } from './fileName.js';
import { KeyedMutex } from './locks.js';
import {
    formatUploadError,
    isInFlightStale,
    markFailed,
    markInFlight,
    markNeedsUploadIfChanged,
    markSkippedUnchanged,
    markUploaded,
    resetForIneligible,
    withoutDirtyFlag,
} from './state.js';

export interface SyncAttempt {
    kind: DocumentKind;
    documentId: string;
    outcome: SyncOutcome;
    ms: number;
}

export interface ReconcilerDeps {
    store: DocumentStore;
    backend: PortalBackend;
    renderer: PdfRenderer;
    /** In-flight flags older than this belong to an attempt that died. */
    staleAfterMs: number;
    now?: () => number;
    resolveTemplate?: TemplateResolver;
    /** Called after every attempt that uploaded or failed. Must not throw. */
    recordAttempt?: (attempt: SyncAttempt) => Promise<void>;
}

export interface PortalReconciler {
    reconcileInvoice(id: string): Promise<SyncOutcome>;
    /** Estimates share the invoice record and upload path. */
    reconcileEstimate(id: string): Promise<SyncOutcome>;
    reconcileContract(id: string): Promise<SyncOutcome>;
    reconcile(kind: DocumentKind, id: string): Promise<SyncOutcome>;
    markInvoiceNeedsUploadIfChanged(id: string): Promise<boolean>;
    markContractNeedsUploadIfChanged(id: string): Promise<boolean>;
}

// What differs between invoices and contracts, bound to one loaded document
interface Target<D extends Invoice | Contract> {
    kind: DocumentKind;
    collection: SyncCollection;
    doc: D;
    client: Client | null;
    fingerprint: string;
    upload: () => Promise<string>;
    index: (client: Client, pdfUrl: string) => Promise<void>;
}

export function createPortalReconciler(deps: ReconcilerDeps): PortalReconciler {
    const { store, backend, renderer } = deps;
    const now = deps.now ?? Date.now;
    const resolveTemplate = deps.resolveTemplate ?? resolveEffectiveTemplateKey;
    const locks = new KeyedMutex();

    async function loadInvoice(id: string): Promise<Target<Invoice> | null> {
        const invoice = await store.fetchInvoice(id);
        if (!invoice) return null;
        const [client, business] = await Promise.all([resolveInvoiceClient(store, invoice), store.fetchBusiness(invoice.businessId)]);
        const kind: DocumentKind = invoice.documentType === 'estimate' ? 'estimate' : 'invoice';
        return {
            kind,
            collection: 'invoices',
            doc: invoice,
            client,
            fingerprint: invoiceFingerprint(invoice, { business, resolveTemplate }),
            upload: async () => {
                const pdf = await renderer.renderInvoice(invoice, { business, client, template: resolveTemplate(invoice, business) });
                const res = await backend.uploadPdf({
                    kind: 'invoice',
                    businessId: invoice.businessId,
                    documentId: invoice.id,
                    fileName: invoicePdfFileName(invoice),
                    pdf,
                });
                return res.url;
            },
            index: (c, pdfUrl) =>
                kind === 'estimate' ? backend.indexEstimate(invoice, c, pdfUrl) : backend.indexInvoice(invoice, c, pdfUrl),
        };
    }

    async function loadContract(id: string): Promise<Target<Contract> | null> {
        const contract = await store.fetchContract(id);
        if (!contract) return null;
        const client = await resolveContractClient(store, contract);
        return {
            kind: 'contract',
            collection: 'contracts',
            doc: contract,
            client,
            fingerprint: contractFingerprint(contract, { clientId: client?.id ?? null }),
            upload: async () => {
                const business = await store.fetchBusiness(contract.businessId);
                const pdf = await renderer.renderContract(contract, { business, client });
                // Contract blobs live under the owning client's business
                const res = await backend.uploadPdf({
                    kind: 'contract',
                    businessId: client?.businessId ?? contract.businessId,
                    documentId: contract.id,
                    fileName: contractPdfFileName(contract),
                    pdf,
                });
                return res.url;
            },
            index: (c, pdfUrl) => backend.indexContract(contract, c, pdfUrl),
        };
    }

    async function record(kind: DocumentKind, documentId: string, outcome: SyncOutcome, startedAt: number) {
        if (!deps.recordAttempt) return;
        if (outcome.status !== 'uploaded' && outcome.status !== 'failed') return;
        await deps.recordAttempt({ kind, documentId, outcome, ms: now() - startedAt });
    }

    async function run<D extends Invoice | Contract>(target: Target<D>): Promise<SyncOutcome> {
        const { doc, kind, collection } = target;
        const save = () => store.saveSyncState(collection, doc.id, doc);

        if (!isEligible(target.client)) {
            resetForIneligible(doc);
            await save();
            logger.debug({ kind, id: doc.id }, 'Portal sync skipped: no client with portal access');
            return { status: 'ineligible' };
        }
        const client = target.client;

        if (doc.portalUploadInFlight && !isInFlightStale(doc, now(), deps.staleAfterMs)) {
            logger.debug({ kind, id: doc.id, startedAtMs: doc.portalUploadStartedAtMs }, 'Portal upload already in flight');
            return { status: 'in_progress' };
        }

        // A stale flag means a dead attempt already took the dirty flag
        const abandoned = doc.portalUploadInFlight;
        const fingerprint = target.fingerprint;
        if (doc.portalLastUploadedHash === fingerprint && !doc.portalNeedsUpload && !abandoned) {
            markSkippedUnchanged(doc);
            await store.saveSyncState(collection, doc.id, withoutDirtyFlag(doc));
            logger.debug({ kind, id: doc.id }, 'Portal copy up to date');
            return { status: 'skipped_unchanged' };
        }

        markInFlight(doc, now());
        await save();

        try {
            const reusedBlob = !!doc.portalLastUploadedBlobUrl && doc.portalLastUploadedHash === fingerprint;
            const blobUrl = reusedBlob && doc.portalLastUploadedBlobUrl ? doc.portalLastUploadedBlobUrl : await target.upload();
            await target.index(client, blobUrl);
            markUploaded(doc, { fingerprint, blobUrl, nowMs: now() });
            await store.saveSyncState(collection, doc.id, withoutDirtyFlag(doc));
            logger.info({ kind, id: doc.id, blobUrl, reusedBlob }, 'Portal sync completed');
            return { status: 'uploaded', blobUrl, reusedBlob };
        } catch (err) {
            const message = formatUploadError(err);
            markFailed(doc, message);
            try {
                await save();
            } catch (saveErr) {
                logger.error({ kind, id: doc.id, err: saveErr }, 'Failed to persist portal sync failure');
            }
            logger.warn({ kind, id: doc.id, error: message }, 'Portal sync failed');
            return { status: 'failed', message };
        }
    }

    async function guarded<D extends Invoice | Contract>(
        kind: DocumentKind,
        id: string,
        load: (id: string) => Promise<Target<D> | null>
    ): Promise<SyncOutcome> {
        return locks.runExclusive(id, async () => {
            const startedAt = now();
            let outcome: SyncOutcome;
            try {
                const target = await load(id);
                if (!target) {
                    logger.debug({ kind, id }, 'Portal sync skipped: document not found');
                    return { status: 'ineligible' };
                }
                outcome = await run(target);
                kind = target.kind;
            } catch (err) {
                // Store failures before the attempt started; nothing was marked in flight
                const message = formatUploadError(err);
                logger.warn({ kind, id, error: message }, 'Portal sync failed');
                outcome = { status: 'failed', message };
            }
            try {
                await record(kind, id, outcome, startedAt);
            } catch (err) {
                logger.debug({ kind, id, err }, 'Failed to record sync attempt');
            }
            return outcome;
        });
    }

    async function markIfChanged<D extends Invoice | Contract>(
        id: string,
        load: (id: string) => Promise<Target<D> | null>
    ): Promise<boolean> {
        return locks.runExclusive(id, async () => {
            const target = await load(id);
            if (!target || !isEligible(target.client)) return false;
            if (!markNeedsUploadIfChanged(target.doc, target.fingerprint)) return false;
            await store.saveSyncState(target.collection, id, { portalNeedsUpload: true });
            return true;
        });
    }

    const reconcileInvoice = (id: string) => guarded('invoice', id, loadInvoice);
    const reconcileContract = (id: string) => guarded('contract', id, loadContract);

    return {
        reconcileInvoice,
        reconcileEstimate: (id) => guarded('estimate', id, loadInvoice),
        reconcileContract,
        reconcile: (kind, id) => (kind === 'contract' ? reconcileContract(id) : guarded(kind, id, loadInvoice)),
        markInvoiceNeedsUploadIfChanged: (id) => markIfChanged(id, loadInvoice),
        markContractNeedsUploadIfChanged: (id) => markIfChanged(id, loadContract),
    };
}
