import { createHash } from 'node:crypto';
import type { Business, Contract, Invoice } from '../domain/types.js';
import { resolveEffectiveTemplateKey, TemplateResolver } from '../domain/templates.js';
import { lineTotal, subtotal, taxAmount, total } from '../domain/totals.js';

/**
 * Field sets are versioned per kind. Bumping a version changes every
 * fingerprint of that kind, which re-uploads each document once.
 */
export const FINGERPRINT_VERSIONS = {
    invoice: 2,
    contract: 2,
} as const;

export interface InvoiceFingerprintContext {
    business: Business | null;
    resolveTemplate?: TemplateResolver;
}

export interface ContractFingerprintContext {
    /** Client the contract resolves to (its own, or the linked invoice/estimate's). */
    clientId: string | null;
}

export function sha256Hex(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex');
}

function num(n: number): string {
    return Number.isFinite(n) ? String(n) : '0';
}

function ms(date: Date | null): number {
    return date ? Math.round(date.getTime()) : 0;
}

export function invoiceFingerprintLines(invoice: Invoice, ctx: InvoiceFingerprintContext): string[] {
    const resolve = ctx.resolveTemplate ?? resolveEffectiveTemplateKey;
    const pieces = [
        `schema=invoice.v${FINGERPRINT_VERSIONS.invoice}`,
        `type=${invoice.documentType}`,
        `number=${invoice.invoiceNumber}`,
        `issueMs=${ms(invoice.issueDate)}`,
        `dueMs=${ms(invoice.dueDate)}`,
        `client=${invoice.clientId ?? ''}`,
        `subtotal=${num(subtotal(invoice))}`,
        `discount=${num(invoice.discountAmount)}`,
        `taxRate=${num(invoice.taxRate)}`,
        `taxAmount=${num(taxAmount(invoice))}`,
        `total=${num(total(invoice))}`,
        `paid=${invoice.isPaid}`,
        `status=${invoice.estimateStatus}`,
        `notes=${invoice.notes}`,
        `thankYou=${invoice.thankYou}`,
        `terms=${invoice.termsAndConditions}`,
        `paymentTerms=${invoice.paymentTerms}`,
        `templateOverride=${invoice.invoiceTemplateKeyOverride ?? ''}`,
        `effectiveTemplate=${resolve(invoice, ctx.business)}`,
        `pdfPath=${invoice.pdfRelativePath}`,
    ];
    // Row order is visible on the PDF, so it is part of the fingerprint
    invoice.items.forEach((item, index) => {
        pieces.push(`${index}|${item.itemDescription}|${num(item.quantity)}|${num(item.unitPrice)}|${num(lineTotal(item))}`);
    });
    return pieces;
}

export function contractFingerprintLines(contract: Contract, ctx: ContractFingerprintContext): string[] {
    return [
        `schema=contract.v${FINGERPRINT_VERSIONS.contract}`,
        `title=${contract.title}`,
        `body=${contract.renderedBody}`,
        `status=${contract.status}`,
        `client=${ctx.clientId ?? ''}`,
        `signedAtMs=${ms(contract.signedAt)}`,
        `signedBy=${contract.signedByName}`,
        `template=${contract.templateName}`,
        `templateCategory=${contract.templateCategory}`,
        `pdfPath=${contract.pdfRelativePath}`,
    ];
}

export function invoiceFingerprint(invoice: Invoice, ctx: InvoiceFingerprintContext): string {
    return sha256Hex(invoiceFingerprintLines(invoice, ctx).join('\n'));
}

export function contractFingerprint(contract: Contract, ctx: ContractFingerprintContext): string {
    return sha256Hex(contractFingerprintLines(contract, ctx).join('\n'));
}
