import type { DocumentStore, SyncCollection } from '../../../db/store.js';
import type { Business, Client, Contract, Invoice, SyncStatePatch } from '../../../domain/types.js';
import { emptySyncState, pickSyncPatch } from '../../../domain/types.js';
import type { PdfRenderer } from '../../../pdf/render.js';
import type { PdfUploadRequest, PortalBackend } from '../../../portal/backend.js';

export function makeBusiness(overrides: Partial<Business> = {}): Business {
    return { id: 'biz-1', name: 'Acme Plumbing', defaultInvoiceTemplateKey: null, ...overrides };
}

export function makeClient(overrides: Partial<Client> = {}): Client {
    return { id: 'client-1', businessId: 'biz-1', name: 'Jo Client', email: 'jo@example.com', portalEnabled: true, ...overrides };
}

export function makeInvoice(overrides: Partial<Invoice> = {}): Invoice {
    return {
        id: 'inv-0001-aaaa-bbbb',
        businessId: 'biz-1',
        clientId: 'client-1',
        documentType: 'invoice',
        invoiceNumber: 'INV-001',
        issueDate: new Date('2024-03-01T00:00:00Z'),
        dueDate: new Date('2024-03-15T00:00:00Z'),
        paymentTerms: 'Net 14',
        notes: '',
        thankYou: 'Thanks!',
        termsAndConditions: '',
        taxRate: 0,
        discountAmount: 0,
        isPaid: false,
        estimateStatus: 'draft',
        invoiceTemplateKeyOverride: null,
        pdfRelativePath: '',
        items: [{ id: 'li-1', itemDescription: 'Labor', quantity: 2, unitPrice: 50 }],
        ...emptySyncState(),
        ...overrides,
    };
}

export function makeContract(overrides: Partial<Contract> = {}): Contract {
    return {
        id: 'con-1234-5678',
        businessId: 'biz-1',
        clientId: 'client-1',
        invoiceId: null,
        estimateId: null,
        title: 'Service Agreement',
        templateName: 'Standard',
        templateCategory: 'services',
        renderedBody: 'The contractor agrees to do the work.',
        pdfRelativePath: '',
        status: 'sent',
        signedAt: null,
        signedByName: '',
        ...emptySyncState(),
        ...overrides,
    };
}

/** Keeps detached copies so the code under test can't mutate stored rows in place. */
export class InMemoryStore implements DocumentStore {
    readonly invoices = new Map<string, Invoice>();
    readonly contracts = new Map<string, Contract>();
    readonly clients = new Map<string, Client>();
    readonly businesses = new Map<string, Business>();
    readonly syncWrites: { collection: SyncCollection; id: string; state: SyncStatePatch }[] = [];
    failFetch: Error | null = null;

    constructor(seed: { invoices?: Invoice[]; contracts?: Contract[]; clients?: Client[]; businesses?: Business[] } = {}) {
        for (const i of seed.invoices ?? []) this.invoices.set(i.id, structuredClone(i));
        for (const c of seed.contracts ?? []) this.contracts.set(c.id, structuredClone(c));
        for (const c of seed.clients ?? []) this.clients.set(c.id, structuredClone(c));
        for (const b of seed.businesses ?? []) this.businesses.set(b.id, structuredClone(b));
    }

    invoice(id: string): Invoice {
        const doc = this.invoices.get(id);
        if (!doc) throw new Error(`no invoice ${id}`);
        return structuredClone(doc);
    }

    contract(id: string): Contract {
        const doc = this.contracts.get(id);
        if (!doc) throw new Error(`no contract ${id}`);
        return structuredClone(doc);
    }

    async fetchInvoice(id: string) {
        if (this.failFetch) throw this.failFetch;
        const doc = this.invoices.get(id);
        return doc ? structuredClone(doc) : null;
    }

    async fetchContract(id: string) {
        if (this.failFetch) throw this.failFetch;
        const doc = this.contracts.get(id);
        return doc ? structuredClone(doc) : null;
    }

    async fetchClient(id: string) {
        const doc = this.clients.get(id);
        return doc ? structuredClone(doc) : null;
    }

    async fetchBusiness(id: string) {
        const doc = this.businesses.get(id);
        return doc ? structuredClone(doc) : null;
    }

    async saveInvoice(invoice: Invoice) {
        this.invoices.set(invoice.id, structuredClone(invoice));
    }

    async saveContract(contract: Contract) {
        this.contracts.set(contract.id, structuredClone(contract));
    }

    async saveSyncState(collection: SyncCollection, id: string, patch: SyncStatePatch) {
        const picked = pickSyncPatch(patch);
        this.syncWrites.push({ collection, id, state: picked });
        if (collection === 'invoices') {
            const doc = this.invoices.get(id);
            if (doc) this.invoices.set(id, { ...doc, ...picked });
        } else {
            const doc = this.contracts.get(id);
            if (doc) this.contracts.set(id, { ...doc, ...picked });
        }
    }

    async listPendingIds(collection: SyncCollection, staleBeforeMs: number, limit = 500) {
        const docs: (Invoice | Contract)[] = collection === 'invoices' ? [...this.invoices.values()] : [...this.contracts.values()];
        return docs
            .filter((d) =>
                d.portalUploadInFlight
                    ? d.portalUploadStartedAtMs == null || d.portalUploadStartedAtMs < staleBeforeMs
                    : d.portalNeedsUpload
            )
            .slice(0, limit)
            .map((d) => d.id);
    }
}

export type BackendCall =
    | { op: 'upload'; req: PdfUploadRequest }
    | { op: 'indexInvoice' | 'indexEstimate' | 'indexContract'; documentId: string; clientId: string; pdfUrl: string };

export class RecordingBackend implements PortalBackend {
    readonly calls: BackendCall[] = [];
    failUpload: unknown = null;
    failIndex: unknown = null;
    /** Runs while an upload is on the wire, before it returns. */
    duringUpload: (() => Promise<void>) | null = null;
    private uploads = 0;

    count(op: BackendCall['op']) {
        return this.calls.filter((c) => c.op === op).length;
    }

    async uploadPdf(req: PdfUploadRequest) {
        this.calls.push({ op: 'upload', req });
        if (this.failUpload) throw this.failUpload;
        if (this.duringUpload) await this.duringUpload();
        this.uploads += 1;
        return { url: `https://blobs.test/${req.documentId}/${this.uploads}.pdf`, fileName: req.fileName };
    }

    async indexInvoice(invoice: Invoice, client: Client, pdfUrl: string) {
        this.calls.push({ op: 'indexInvoice', documentId: invoice.id, clientId: client.id, pdfUrl });
        if (this.failIndex) throw this.failIndex;
    }

    async indexEstimate(estimate: Invoice, client: Client, pdfUrl: string) {
        this.calls.push({ op: 'indexEstimate', documentId: estimate.id, clientId: client.id, pdfUrl });
        if (this.failIndex) throw this.failIndex;
    }

    async indexContract(contract: Contract, client: Client, pdfUrl: string) {
        this.calls.push({ op: 'indexContract', documentId: contract.id, clientId: client.id, pdfUrl });
        if (this.failIndex) throw this.failIndex;
    }
}

export class FakeRenderer implements PdfRenderer {
    renders = 0;

    async renderInvoice(invoice: Invoice) {
        this.renders += 1;
        return new TextEncoder().encode(`%PDF-fake ${invoice.id}`);
    }

    async renderContract(contract: Contract) {
        this.renders += 1;
        return new TextEncoder().encode(`%PDF-fake ${contract.id}`);
    }
}
