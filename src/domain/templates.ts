import type { Business, Invoice } from './types.js';

export const INVOICE_TEMPLATE_KEYS = [
    'classic_business',
    'modern_clean',
    'bold_header',
    'minimal_compact',
    'creative_studio',
    'contractor_trades',
] as const;

export type InvoiceTemplateKey = (typeof INVOICE_TEMPLATE_KEYS)[number];

export const DEFAULT_INVOICE_TEMPLATE: InvoiceTemplateKey = 'modern_clean';

export const INVOICE_TEMPLATE_NAMES: Record<InvoiceTemplateKey, string> = {
    classic_business: 'Classic Business',
    modern_clean: 'Modern Clean',
    bold_header: 'Bold Header',
    minimal_compact: 'Minimal Compact',
    creative_studio: 'Creative Studio',
    contractor_trades: 'Contractor Trades',
};

export function isTemplateKey(value: string): value is InvoiceTemplateKey {
    return INVOICE_TEMPLATE_KEYS.some((k) => k === value);
}

export function parseTemplateKey(raw: string | null | undefined): InvoiceTemplateKey | null {
    if (!raw) return null;
    const key = raw.trim();
    return isTemplateKey(key) ? key : null;
}

/**
 * Template the rendered PDF will use. A document override wins, then the
 * business default; unknown keys at either level are ignored.
 */
export type TemplateResolver = (invoice: Invoice, business: Business | null) => InvoiceTemplateKey;

export const resolveEffectiveTemplateKey: TemplateResolver = (invoice, business) => {
    const override = parseTemplateKey(invoice.invoiceTemplateKeyOverride);
    if (override) return override;
    const businessDefault = parseTemplateKey(business?.defaultInvoiceTemplateKey);
    if (businessDefault) return businessDefault;
    return DEFAULT_INVOICE_TEMPLATE;
};
