import type {
    Business,
    Client,
    Contract,
    ContractStatus,
    EstimateStatus,
    Invoice,
    PortalSyncState,
    SyncStatePatch,
} from '../domain/types.js';
import { pickSyncPatch } from '../domain/types.js';
import {
    BusinessModel,
    BusinessRecord,
    ClientModel,
    ClientRecord,
    ContractModel,
    ContractRecord,
    InvoiceModel,
    InvoiceRecord,
} from './models.js';

export type SyncCollection = 'invoices' | 'contracts';

/**
 * Persistence seen by the orchestrator and the sweep. Reads return detached
 * copies; `saveSyncState` writes only the bookkeeping fields present in the
 * patch, so a reconciliation never overwrites content edited in the meantime.
 */
export interface DocumentStore {
    fetchInvoice(id: string): Promise<Invoice | null>;
    fetchContract(id: string): Promise<Contract | null>;
    fetchClient(id: string): Promise<Client | null>;
    fetchBusiness(id: string): Promise<Business | null>;
    saveInvoice(invoice: Invoice): Promise<void>;
    saveContract(contract: Contract): Promise<void>;
    saveSyncState(collection: SyncCollection, id: string, patch: SyncStatePatch): Promise<void>;
    /** Dirty documents not held by a live attempt, plus those whose in-flight flag went stale. */
    listPendingIds(collection: SyncCollection, staleBeforeMs: number, limit?: number): Promise<string[]>;
}

const ESTIMATE_STATUSES: readonly EstimateStatus[] = ['draft', 'sent', 'accepted', 'declined'];
const CONTRACT_STATUSES: readonly ContractStatus[] = ['draft', 'sent', 'signed', 'cancelled'];
const DEFAULT_PENDING_LIMIT = 500;

function estimateStatus(raw: unknown): EstimateStatus {
    return ESTIMATE_STATUSES.find((s) => s === raw) ?? 'draft';
}

function contractStatus(raw: unknown): ContractStatus {
    return CONTRACT_STATUSES.find((s) => s === raw) ?? 'draft';
}

function date(raw: Date | string | number | null | undefined, fallback: Date): Date {
    if (raw == null) return fallback;
    const d = raw instanceof Date ? raw : new Date(raw);
    return Number.isNaN(d.getTime()) ? fallback : d;
}

// Older rows can predate the bookkeeping fields
function syncStateOf(rec: Partial<PortalSyncState>): PortalSyncState {
    return {
        portalNeedsUpload: rec.portalNeedsUpload ?? false,
        portalUploadInFlight: rec.portalUploadInFlight ?? false,
        portalUploadStartedAtMs: rec.portalUploadStartedAtMs ?? null,
        portalLastUploadedHash: rec.portalLastUploadedHash ?? null,
        portalLastUploadedBlobUrl: rec.portalLastUploadedBlobUrl ?? null,
        portalLastUploadedAtMs: rec.portalLastUploadedAtMs ?? null,
        portalLastUploadError: rec.portalLastUploadError ?? null,
    };
}

export function toBusiness(rec: BusinessRecord): Business {
    return { id: rec._id, name: rec.name ?? '', defaultInvoiceTemplateKey: rec.defaultInvoiceTemplateKey ?? null };
}

export function toClient(rec: ClientRecord): Client {
    return {
        id: rec._id,
        businessId: rec.businessId,
        name: rec.name ?? '',
        email: rec.email ?? '',
        portalEnabled: rec.portalEnabled ?? true,
    };
}

export function toInvoice(rec: InvoiceRecord): Invoice {
    const issueDate = date(rec.issueDate, new Date(0));
    return {
        id: rec._id,
        businessId: rec.businessId,
        clientId: rec.clientId ?? null,
        documentType: rec.documentType === 'estimate' ? 'estimate' : 'invoice',
        invoiceNumber: rec.invoiceNumber ?? '',
        issueDate,
        dueDate: date(rec.dueDate, issueDate),
        paymentTerms: rec.paymentTerms ?? '',
        notes: rec.notes ?? '',
        thankYou: rec.thankYou ?? '',
        termsAndConditions: rec.termsAndConditions ?? '',
        taxRate: Number(rec.taxRate ?? 0),
        discountAmount: Number(rec.discountAmount ?? 0),
        isPaid: rec.isPaid ?? false,
        estimateStatus: estimateStatus(rec.estimateStatus),
        invoiceTemplateKeyOverride: rec.invoiceTemplateKeyOverride ?? null,
        pdfRelativePath: rec.pdfRelativePath ?? '',
        items: (rec.items ?? []).map((li) => ({
            id: li.id,
            itemDescription: li.itemDescription ?? '',
            quantity: Number(li.quantity ?? 0),
            unitPrice: Number(li.unitPrice ?? 0),
        })),
        ...syncStateOf(rec),
    };
}

export function toContract(rec: ContractRecord): Contract {
    return {
        id: rec._id,
        businessId: rec.businessId,
        clientId: rec.clientId ?? null,
        invoiceId: rec.invoiceId ?? null,
        estimateId: rec.estimateId ?? null,
        title: rec.title ?? '',
        templateName: rec.templateName ?? '',
        templateCategory: rec.templateCategory ?? '',
        renderedBody: rec.renderedBody ?? '',
        pdfRelativePath: rec.pdfRelativePath ?? '',
        status: contractStatus(rec.status),
        signedAt: rec.signedAt ? date(rec.signedAt, new Date(0)) : null,
        signedByName: rec.signedByName ?? '',
        ...syncStateOf(rec),
    };
}

export function fromInvoice(invoice: Invoice): InvoiceRecord {
    const { id, ...rest } = invoice;
    return { _id: id, ...rest };
}

export function fromContract(contract: Contract): ContractRecord {
    const { id, ...rest } = contract;
    return { _id: id, ...rest };
}

export function pendingQuery(staleBeforeMs: number) {
    return {
        $or: [
            { portalNeedsUpload: true, portalUploadInFlight: { $ne: true } },
            {
                portalUploadInFlight: true,
                $or: [{ portalUploadStartedAtMs: null }, { portalUploadStartedAtMs: { $lt: staleBeforeMs } }],
            },
        ],
    };
}

export function createMongoDocumentStore(): DocumentStore {
    return {
        async fetchInvoice(id) {
            const rec: InvoiceRecord | null = await InvoiceModel.findById(id).lean<InvoiceRecord>();
            return rec ? toInvoice(rec) : null;
        },
        async fetchContract(id) {
            const rec: ContractRecord | null = await ContractModel.findById(id).lean<ContractRecord>();
            return rec ? toContract(rec) : null;
        },
        async fetchClient(id) {
            const rec: ClientRecord | null = await ClientModel.findById(id).lean<ClientRecord>();
            return rec ? toClient(rec) : null;
        },
        async fetchBusiness(id) {
            const rec: BusinessRecord | null = await BusinessModel.findById(id).lean<BusinessRecord>();
            return rec ? toBusiness(rec) : null;
        },
        async saveInvoice(invoice) {
            await InvoiceModel.replaceOne({ _id: invoice.id }, { ...fromInvoice(invoice), updatedAt: new Date() }, { upsert: true });
        },
        async saveContract(contract) {
            await ContractModel.replaceOne({ _id: contract.id }, { ...fromContract(contract), updatedAt: new Date() }, { upsert: true });
        },
        async saveSyncState(collection, id, patch) {
            const $set = pickSyncPatch(patch);
            if (collection === 'invoices') await InvoiceModel.updateOne({ _id: id }, { $set });
            else await ContractModel.updateOne({ _id: id }, { $set });
        },
        async listPendingIds(collection, staleBeforeMs, limit = DEFAULT_PENDING_LIMIT) {
            const query = pendingQuery(staleBeforeMs);
            const rows: { _id: string }[] =
                collection === 'invoices'
                    ? await InvoiceModel.find(query, { _id: 1 }).sort({ updatedAt: 1 }).limit(limit).lean<{ _id: string }[]>()
                    : await ContractModel.find(query, { _id: 1 }).sort({ updatedAt: 1 }).limit(limit).lean<{ _id: string }[]>();
            return rows.map((r) => r._id);
        },
    };
}
