import type { Client, Contract, Invoice } from '../domain/types.js';
import logger from '../util/logger.js';
import { bodyText, PortalHttpClient, PortalResponse } from './client.js';
import { PortalBackendError } from './errors.js';
import { DIRECTORY_ESTIMATE_STATUSES, normalizeStatus, portalAmounts } from './payload.js';

export type UploadKind = 'invoice' | 'contract';

export interface PdfUploadRequest {
    kind: UploadKind;
    businessId: string;
    documentId: string;
    fileName: string;
    pdf: Uint8Array;
}

export interface PdfUploadResult {
    url: string;
    fileName: string;
}

/**
 * What the orchestrator needs from the portal backend. Uploads must be safe to
 * repeat with identical bytes; indexing must be safe to repeat on every
 * reconciliation.
 */
export interface PortalBackend {
    uploadPdf(req: PdfUploadRequest): Promise<PdfUploadResult>;
    indexInvoice(invoice: Invoice, client: Client, pdfUrl: string): Promise<void>;
    indexEstimate(estimate: Invoice, client: Client, pdfUrl: string): Promise<void>;
    indexContract(contract: Contract, client: Client, pdfUrl: string): Promise<void>;
}

const UPLOAD_PATHS: Record<UploadKind, string> = {
    invoice: '/api/portal/invoice/pdf-upload',
    contract: '/api/portal/contract/pdf-upload',
};
const SEED_PATH = '/api/portal-session/seed';

function field(data: object, key: string): unknown {
    return Object.prototype.hasOwnProperty.call(data, key) ? Reflect.get(data, key) : undefined;
}

function stringField(data: object, key: string): string | undefined {
    const v = field(data, key);
    return typeof v === 'string' && v.trim() ? v : undefined;
}

// Backend reports some failures in a 2xx body as { error }
function checkBody(resp: PortalResponse): object {
    if (!resp.data || typeof resp.data !== 'object') throw PortalBackendError.decode(bodyText(resp.data));
    const err = stringField(resp.data, 'error');
    if (err) throw PortalBackendError.http(resp.status, err);
    return resp.data;
}

export function parseUploadResponse(resp: PortalResponse, requestedName: string): PdfUploadResult {
    const data = checkBody(resp);
    const url = stringField(data, 'url');
    if (!url) throw PortalBackendError.decode(bodyText(resp.data));
    return { url, fileName: stringField(data, 'fileName') ?? requestedName };
}

export function createPortalBackend(http: PortalHttpClient, now: () => number = Date.now): PortalBackend {
    async function seed(payload: Record<string, unknown>) {
        checkBody(await http.post(SEED_PATH, payload));
    }

    return {
        async uploadPdf(req) {
            const idKey = req.kind === 'contract' ? 'contractId' : 'invoiceId';
            logger.info({ kind: req.kind, businessId: req.businessId, documentId: req.documentId, fileName: req.fileName, bytes: req.pdf.byteLength }, 'Uploading portal PDF');
            const resp = await http.post(UPLOAD_PATHS[req.kind], {
                businessId: req.businessId,
                [idKey]: req.documentId,
                fileName: req.fileName,
                pdfBase64: Buffer.from(req.pdf).toString('base64'),
            });
            const result = parseUploadResponse(resp, req.fileName);
            logger.info({ kind: req.kind, documentId: req.documentId, url: result.url }, 'Uploaded portal PDF');
            return result;
        },

        async indexInvoice(invoice, client, pdfUrl) {
            if (!client.portalEnabled) return;
            const amounts = portalAmounts(invoice);
            await seed({
                businessId: invoice.businessId,
                clientId: client.id,
                scope: 'invoice',
                mode: 'live',
                invoiceId: invoice.id,
                invoiceNumber: invoice.invoiceNumber,
                amountCents: amounts.amountCents,
                subtotalCents: amounts.subtotalCents,
                taxCents: amounts.taxCents,
                lineItems: amounts.lineItems,
                currency: 'usd',
                status: invoice.isPaid ? 'paid' : 'unpaid',
                title: `Invoice ${invoice.invoiceNumber}`,
                updatedAtMs: now(),
                clientPortalEnabled: client.portalEnabled,
                pdfUrl,
            });
        },

        async indexEstimate(estimate, client, pdfUrl) {
            if (estimate.documentType !== 'estimate' || !client.portalEnabled) return;
            const status = normalizeStatus(estimate.estimateStatus);
            if (!DIRECTORY_ESTIMATE_STATUSES.includes(status)) {
                logger.debug({ estimateId: estimate.id, status }, 'Estimate not yet sent; not indexing');
                return;
            }
            const amounts = portalAmounts(estimate);
            await seed({
                businessId: estimate.businessId,
                clientId: client.id,
                scope: 'directory',
                mode: 'live',
                documentType: 'estimate',
                estimateId: estimate.id,
                invoiceId: estimate.id,
                invoiceNumber: estimate.invoiceNumber,
                amountCents: amounts.amountCents,
                subtotalCents: amounts.subtotalCents,
                taxCents: amounts.taxCents,
                lineItems: amounts.lineItems,
                currency: 'usd',
                status,
                title: `Estimate ${estimate.invoiceNumber}`,
                updatedAtMs: now(),
                clientPortalEnabled: client.portalEnabled,
                pdfUrl,
            });
        },

        // scope=directory so the contract is listed in the client's directory
        async indexContract(contract, client, pdfUrl) {
            if (!client.portalEnabled) return;
            await seed({
                businessId: client.businessId,
                clientId: client.id,
                scope: 'directory',
                mode: 'live',
                contractId: contract.id,
                contractTitle: contract.title,
                status: contract.status,
                title: contract.title,
                updatedAtMs: now(),
                contractBody: contract.renderedBody,
                clientPortalEnabled: client.portalEnabled,
                pdfUrl,
            });
        },
    };
}
