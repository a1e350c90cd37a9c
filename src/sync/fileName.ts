import type { Contract, Invoice } from '../domain/types.js';

const ID_FRAGMENT = 8;

export function sanitizeFilePart(input: string): string {
    return input
        .trim()
        .replace(/[\u0000-\u001f\u007f]/g, '-')
        .replace(/[\\/:*?"<>|]/g, '-');
}

/** `Invoice-<number>.pdf` / `Estimate-<number>.pdf`; a blank number falls back to the id's tail. */
export function invoicePdfFileName(invoice: Invoice): string {
    const prefix = invoice.documentType === 'estimate' ? 'Estimate' : 'Invoice';
    const number = sanitizeFilePart(invoice.invoiceNumber);
    const namePart = number || sanitizeFilePart(invoice.id.slice(-ID_FRAGMENT));
    return `${prefix}-${namePart}.pdf`;
}

/** `Contract-<title>.pdf`; a blank title falls back to the id's head. */
export function contractPdfFileName(contract: Contract): string {
    const title = sanitizeFilePart(contract.title);
    const namePart = title || sanitizeFilePart(contract.id.slice(0, ID_FRAGMENT));
    return `Contract-${namePart}.pdf`;
}
