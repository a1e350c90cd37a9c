import { describe, it, expect, beforeEach } from 'vitest';
import { createPortalBackend, parseUploadResponse } from '../backend.js';
import type { PortalHttpClient, PortalResponse } from '../client.js';
import { PortalBackendError } from '../errors.js';
import { makeClient, makeContract, makeInvoice } from '../../sync/__tests__/helpers/fakes.js';

const NOW = Date.parse('2024-03-02T10:00:00Z');

class FakeHttp implements PortalHttpClient {
    readonly posts: { path: string; body: Record<string, unknown> }[] = [];
    reply: PortalResponse = { status: 200, data: { ok: true } };

    async post(path: string, body: Record<string, unknown>) {
        this.posts.push({ path, body });
        return this.reply;
    }
}

let http: FakeHttp;

beforeEach(() => {
    http = new FakeHttp();
});

async function rejection(promise: Promise<unknown>): Promise<PortalBackendError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof PortalBackendError) return err;
        throw err;
    }
    throw new Error('expected a PortalBackendError');
}

describe('uploadPdf', () => {
    it('posts the PDF as base64 under the invoice id', async () => {
        http.reply = { status: 200, data: { url: 'https://blobs.test/inv.pdf', fileName: 'Stored.pdf' } };
        const result = await createPortalBackend(http).uploadPdf({
            kind: 'invoice',
            businessId: 'biz-1',
            documentId: 'inv-1',
            fileName: 'Invoice-INV-001.pdf',
            pdf: new TextEncoder().encode('%PDF'),
        });

        expect(result).toEqual({ url: 'https://blobs.test/inv.pdf', fileName: 'Stored.pdf' });
        expect(http.posts).toEqual([
            {
                path: '/api/portal/invoice/pdf-upload',
                body: { businessId: 'biz-1', invoiceId: 'inv-1', fileName: 'Invoice-INV-001.pdf', pdfBase64: 'JVBERg==' },
            },
        ]);
    });

    it('posts contracts to their own route under the contract id', async () => {
        http.reply = { status: 200, data: { url: 'https://blobs.test/con.pdf' } };
        const result = await createPortalBackend(http).uploadPdf({
            kind: 'contract',
            businessId: 'biz-1',
            documentId: 'con-1',
            fileName: 'Contract-Lease.pdf',
            pdf: new Uint8Array([1, 2, 3]),
        });

        expect(result).toEqual({ url: 'https://blobs.test/con.pdf', fileName: 'Contract-Lease.pdf' });
        expect(http.posts[0].path).toBe('/api/portal/contract/pdf-upload');
        expect(http.posts[0].body).toMatchObject({ contractId: 'con-1', pdfBase64: 'AQID' });
    });
});

describe('parseUploadResponse', () => {
    it('treats an error field in a 2xx body as an HTTP failure', async () => {
        const err = await rejection(Promise.resolve().then(() => parseUploadResponse({ status: 200, data: { error: 'quota exceeded' } }, 'a.pdf')));
        expect(err.detail).toEqual({ kind: 'http', status: 200, body: 'quota exceeded' });
    });

    it('rejects a body without a url', async () => {
        const err = await rejection(Promise.resolve().then(() => parseUploadResponse({ status: 200, data: { url: '  ' } }, 'a.pdf')));
        expect(err.detail).toEqual({ kind: 'decode', body: '{"url":"  "}' });
    });

    it('rejects a non-object body', async () => {
        const err = await rejection(Promise.resolve().then(() => parseUploadResponse({ status: 200, data: '<html>' }, 'a.pdf')));
        expect(err.detail).toEqual({ kind: 'decode', body: '<html>' });
    });
});

describe('indexing', () => {
    it('seeds an invoice with amounts and paid status', async () => {
        await createPortalBackend(http, () => NOW).indexInvoice(makeInvoice({ isPaid: true }), makeClient(), 'https://blobs.test/inv.pdf');

        expect(http.posts).toEqual([
            {
                path: '/api/portal-session/seed',
                body: {
                    businessId: 'biz-1',
                    clientId: 'client-1',
                    scope: 'invoice',
                    mode: 'live',
                    invoiceId: 'inv-0001-aaaa-bbbb',
                    invoiceNumber: 'INV-001',
                    amountCents: 10000,
                    subtotalCents: 10000,
                    taxCents: 0,
                    lineItems: [{ id: 'li-1', name: 'Labor', description: '', quantity: 2, unitAmountCents: 5000, amountCents: 10000 }],
                    currency: 'usd',
                    status: 'paid',
                    title: 'Invoice INV-001',
                    updatedAtMs: NOW,
                    clientPortalEnabled: true,
                    pdfUrl: 'https://blobs.test/inv.pdf',
                },
            },
        ]);
    });

    it('skips clients without portal access', async () => {
        const backend = createPortalBackend(http);
        const client = makeClient({ portalEnabled: false });
        await backend.indexInvoice(makeInvoice(), client, 'u');
        await backend.indexEstimate(makeInvoice({ documentType: 'estimate', estimateStatus: 'sent' }), client, 'u');
        await backend.indexContract(makeContract(), client, 'u');
        expect(http.posts).toEqual([]);
    });

    it('lists sent estimates in the directory with a normalized status', async () => {
        const estimate = makeInvoice({ id: 'est-1', documentType: 'estimate', invoiceNumber: 'E-7', estimateStatus: ' Accepted ' });
        await createPortalBackend(http, () => NOW).indexEstimate(estimate, makeClient(), 'https://blobs.test/est.pdf');

        expect(http.posts).toHaveLength(1);
        expect(http.posts[0].body).toMatchObject({
            scope: 'directory',
            documentType: 'estimate',
            estimateId: 'est-1',
            invoiceId: 'est-1',
            status: 'accepted',
            title: 'Estimate E-7',
        });
    });

    it('does not list draft estimates', async () => {
        await createPortalBackend(http).indexEstimate(makeInvoice({ documentType: 'estimate', estimateStatus: 'draft' }), makeClient(), 'u');
        expect(http.posts).toEqual([]);
    });

    it('seeds a contract under the client business', async () => {
        const contract = makeContract({ businessId: 'biz-old' });
        await createPortalBackend(http, () => NOW).indexContract(contract, makeClient({ businessId: 'biz-2' }), 'https://blobs.test/con.pdf');

        expect(http.posts[0].body).toEqual({
            businessId: 'biz-2',
            clientId: 'client-1',
            scope: 'directory',
            mode: 'live',
            contractId: 'con-1234-5678',
            contractTitle: 'Service Agreement',
            status: 'sent',
            title: 'Service Agreement',
            updatedAtMs: NOW,
            contractBody: 'The contractor agrees to do the work.',
            clientPortalEnabled: true,
            pdfUrl: 'https://blobs.test/con.pdf',
        });
    });

    it('fails when the seed endpoint reports an error', async () => {
        http.reply = { status: 200, data: { error: 'client not found' } };
        const err = await rejection(createPortalBackend(http).indexInvoice(makeInvoice(), makeClient(), 'u'));
        expect(err.message).toBe('Portal backend HTTP 200. client not found');
    });
});
