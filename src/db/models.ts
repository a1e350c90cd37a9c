import mongoose from './mongoose.js';
import { v4 as uuidv4 } from 'uuid';
import type { Business, Client, Contract, Invoice, LineItem } from '../domain/types.js';

// Documents are keyed by the app's own UUIDs rather than ObjectIds
type Keyed<T extends { id: string }> = Omit<T, 'id'> & { _id: string; createdAt?: Date; updatedAt?: Date };

export type BusinessRecord = Keyed<Business>;
export type ClientRecord = Keyed<Client>;
export type InvoiceRecord = Keyed<Invoice>;
export type ContractRecord = Keyed<Contract>;

const timestamps = {
    createdAt: { type: Date, default: () => new Date() },
    updatedAt: { type: Date, default: () => new Date() },
};

const portalSync = {
    portalNeedsUpload: { type: Boolean, default: false, index: true },
    portalUploadInFlight: { type: Boolean, default: false },
    portalUploadStartedAtMs: { type: Number, default: null },
    portalLastUploadedHash: { type: String, default: null },
    portalLastUploadedBlobUrl: { type: String, default: null },
    portalLastUploadedAtMs: { type: Number, default: null },
    portalLastUploadError: { type: String, default: null },
};

const businessSchema = new mongoose.Schema<BusinessRecord>(
    {
        _id: { type: String, default: () => uuidv4() },
        name: { type: String, default: '' },
        defaultInvoiceTemplateKey: { type: String, default: null },
        ...timestamps,
    },
    { collection: 'businesses', versionKey: false }
);
export const BusinessModel = mongoose.model<BusinessRecord>('Business', businessSchema);

const clientSchema = new mongoose.Schema<ClientRecord>(
    {
        _id: { type: String, default: () => uuidv4() },
        businessId: { type: String, required: true, index: true },
        name: { type: String, default: '' },
        email: { type: String, default: '' },
        portalEnabled: { type: Boolean, default: true },
        ...timestamps,
    },
    { collection: 'clients', versionKey: false }
);
export const ClientModel = mongoose.model<ClientRecord>('Client', clientSchema);

const lineItemSchema = new mongoose.Schema<LineItem>(
    {
        id: { type: String, default: () => uuidv4() },
        itemDescription: { type: String, default: '' },
        quantity: { type: Number, default: 1 },
        unitPrice: { type: Number, default: 0 },
    },
    { _id: false }
);

const invoiceSchema = new mongoose.Schema<InvoiceRecord>(
    {
        _id: { type: String, default: () => uuidv4() },
        businessId: { type: String, required: true, index: true },
        clientId: { type: String, default: null, index: true },
        documentType: { type: String, enum: ['invoice', 'estimate'], default: 'invoice' },
        invoiceNumber: { type: String, default: '' },
        issueDate: { type: Date, default: () => new Date() },
        dueDate: { type: Date, default: () => new Date(Date.now() + 14 * 86_400_000) },
        paymentTerms: { type: String, default: 'Net 14' },
        notes: { type: String, default: '' },
        thankYou: { type: String, default: '' },
        termsAndConditions: { type: String, default: '' },
        taxRate: { type: Number, default: 0 },
        discountAmount: { type: Number, default: 0 },
        isPaid: { type: Boolean, default: false },
        estimateStatus: { type: String, enum: ['draft', 'sent', 'accepted', 'declined'], default: 'draft' },
        invoiceTemplateKeyOverride: { type: String, default: null },
        pdfRelativePath: { type: String, default: '' },
        items: { type: [lineItemSchema], default: [] },
        ...portalSync,
        ...timestamps,
    },
    { collection: 'invoices', versionKey: false }
);
invoiceSchema.index({ portalNeedsUpload: 1, portalUploadInFlight: 1 });
export const InvoiceModel = mongoose.model<InvoiceRecord>('Invoice', invoiceSchema);

const contractSchema = new mongoose.Schema<ContractRecord>(
    {
        _id: { type: String, default: () => uuidv4() },
        businessId: { type: String, required: true, index: true },
        clientId: { type: String, default: null, index: true },
        invoiceId: { type: String, default: null },
        estimateId: { type: String, default: null },
        title: { type: String, default: '' },
        templateName: { type: String, default: '' },
        templateCategory: { type: String, default: '' },
        renderedBody: { type: String, default: '' },
        pdfRelativePath: { type: String, default: '' },
        status: { type: String, enum: ['draft', 'sent', 'signed', 'cancelled'], default: 'draft' },
        signedAt: { type: Date, default: null },
        signedByName: { type: String, default: '' },
        ...portalSync,
        ...timestamps,
    },
    { collection: 'contracts', versionKey: false }
);
contractSchema.index({ portalNeedsUpload: 1, portalUploadInFlight: 1 });
export const ContractModel = mongoose.model<ContractRecord>('Contract', contractSchema);

// Sweep summaries (historical)
const sweepSummarySchema = new mongoose.Schema(
    {
        start: { type: String, index: true },
        end: { type: String },
        durationMs: { type: Number },
        success: { type: Boolean },
        error: { type: String },
        entities: [
            {
                _id: false,
                entity: String,
                pending: Number,
                uploaded: Number,
                skipped: Number,
                ineligible: Number,
                inProgress: Number,
                failed: Number,
                ms: Number,
            },
        ],
    },
    { collection: 'sweep_summaries', strict: true, versionKey: false }
);
export const SweepSummaryModel = mongoose.model('SweepSummary', sweepSummarySchema);

// One row per reconciliation that did work or failed
const syncAttemptSchema = new mongoose.Schema(
    {
        kind: { type: String, index: true },
        documentId: { type: String, index: true },
        outcome: { type: String, index: true },
        message: { type: String },
        reusedBlob: { type: Boolean },
        blobUrl: { type: String },
        ms: { type: Number },
        ts: { type: Date, default: () => new Date(), index: true },
    },
    { collection: 'sync_attempts', strict: true, versionKey: false }
);
syncAttemptSchema.index({ kind: 1, ts: -1 });
export const SyncAttemptModel = mongoose.model('SyncAttempt', syncAttemptSchema);
