export type DocumentKind = 'invoice' | 'estimate' | 'contract';
export const DOCUMENT_KINDS: readonly DocumentKind[] = ['invoice', 'estimate', 'contract'];

export type InvoiceDocumentType = 'invoice' | 'estimate';
export type EstimateStatus = 'draft' | 'sent' | 'accepted' | 'declined';
export type ContractStatus = 'draft' | 'sent' | 'signed' | 'cancelled';

/**
 * Portal reconciliation bookkeeping carried by every syncable document.
 * Created with the document (not needed, not in flight, no hash) and only
 * mutated by edits that mark it dirty or by the orchestrator.
 */
export interface PortalSyncState {
    portalNeedsUpload: boolean;
    portalUploadInFlight: boolean;
    /** When the current in-flight attempt started; used to detect abandoned attempts. */
    portalUploadStartedAtMs: number | null;
    portalLastUploadedHash: string | null;
    portalLastUploadedBlobUrl: string | null;
    portalLastUploadedAtMs: number | null;
    portalLastUploadError: string | null;
}

export interface Business {
    id: string;
    name: string;
    defaultInvoiceTemplateKey: string | null;
}

export interface Client {
    id: string;
    businessId: string;
    name: string;
    email: string;
    portalEnabled: boolean;
}

export interface LineItem {
    id: string;
    itemDescription: string;
    quantity: number;
    unitPrice: number;
}

/** Invoices and estimates share one record, told apart by `documentType`. */
export interface Invoice extends PortalSyncState {
    id: string;
    businessId: string;
    clientId: string | null;
    documentType: InvoiceDocumentType;
    invoiceNumber: string;
    issueDate: Date;
    dueDate: Date;
    paymentTerms: string;
    notes: string;
    thankYou: string;
    termsAndConditions: string;
    taxRate: number;
    discountAmount: number;
    isPaid: boolean;
    estimateStatus: EstimateStatus;
    invoiceTemplateKeyOverride: string | null;
    pdfRelativePath: string;
    items: LineItem[];
}

export interface Contract extends PortalSyncState {
    id: string;
    businessId: string;
    clientId: string | null;
    /** Invoice the contract was created from, if any. */
    invoiceId: string | null;
    /** Estimate the contract was generated from, if any. */
    estimateId: string | null;
    title: string;
    templateName: string;
    templateCategory: string;
    renderedBody: string;
    pdfRelativePath: string;
    status: ContractStatus;
    signedAt: Date | null;
    signedByName: string;
}

export type SyncOutcome =
    | { status: 'ineligible' }
    | { status: 'skipped_unchanged' }
    | { status: 'in_progress' }
    | { status: 'uploaded'; blobUrl: string; reusedBlob: boolean }
    | { status: 'failed'; message: string };

export type SyncOutcomeStatus = SyncOutcome['status'];

export function emptySyncState(): PortalSyncState {
    return {
        portalNeedsUpload: false,
        portalUploadInFlight: false,
        portalUploadStartedAtMs: null,
        portalLastUploadedHash: null,
        portalLastUploadedBlobUrl: null,
        portalLastUploadedAtMs: null,
        portalLastUploadError: null,
    };
}

/** A write to some of the sync fields; absent fields are left as stored. */
export type SyncStatePatch = Partial<PortalSyncState>;

/** Copies only the sync fields that are set, dropping content and unset keys. */
export function pickSyncPatch(src: SyncStatePatch): SyncStatePatch {
    const out: SyncStatePatch = {};
    if (src.portalNeedsUpload !== undefined) out.portalNeedsUpload = src.portalNeedsUpload;
    if (src.portalUploadInFlight !== undefined) out.portalUploadInFlight = src.portalUploadInFlight;
    if (src.portalUploadStartedAtMs !== undefined) out.portalUploadStartedAtMs = src.portalUploadStartedAtMs;
    if (src.portalLastUploadedHash !== undefined) out.portalLastUploadedHash = src.portalLastUploadedHash;
    if (src.portalLastUploadedBlobUrl !== undefined) out.portalLastUploadedBlobUrl = src.portalLastUploadedBlobUrl;
    if (src.portalLastUploadedAtMs !== undefined) out.portalLastUploadedAtMs = src.portalLastUploadedAtMs;
    if (src.portalLastUploadError !== undefined) out.portalLastUploadError = src.portalLastUploadError;
    return out;
}

export function isDocumentKind(value: string): value is DocumentKind {
    return DOCUMENT_KINDS.some((k) => k === value);
}
