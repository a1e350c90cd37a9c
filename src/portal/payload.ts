import type { Invoice } from '../domain/types.js';
import { lineTotal, taxAmount, toCents, total } from '../domain/totals.js';

export interface PortalLineItem {
    id: string;
    name: string;
    description: string;
    quantity: number;
    unitAmountCents: number;
    amountCents: number;
}

/**
 * Line items as the portal stores them. A discount is sent as its own
 * negative row so the listed rows add up to the subtotal the client sees.
 */
export function buildPortalLineItems(invoice: Invoice): PortalLineItem[] {
    const out: PortalLineItem[] = invoice.items.map((li) => ({
        id: li.id,
        name: li.itemDescription.trim() ? li.itemDescription : 'Item',
        description: '',
        quantity: li.quantity,
        unitAmountCents: toCents(li.unitPrice),
        amountCents: toCents(lineTotal(li)),
    }));

    if (invoice.discountAmount > 0) {
        const discountCents = toCents(invoice.discountAmount);
        out.push({
            id: 'discount',
            name: 'Discount',
            description: '',
            quantity: 1,
            unitAmountCents: -discountCents,
            amountCents: -discountCents,
        });
    }
    return out;
}

export interface PortalAmounts {
    lineItems: PortalLineItem[];
    subtotalCents: number;
    taxCents: number;
    amountCents: number;
}

export function portalAmounts(invoice: Invoice): PortalAmounts {
    const lineItems = buildPortalLineItems(invoice);
    return {
        lineItems,
        subtotalCents: lineItems.reduce((sum, li) => sum + li.amountCents, 0),
        taxCents: toCents(taxAmount(invoice)),
        amountCents: toCents(total(invoice)),
    };
}

export function normalizeStatus(raw: string): string {
    return raw.trim().toLowerCase();
}

/** Estimates only appear in the client directory once they have been sent. */
export const DIRECTORY_ESTIMATE_STATUSES = ['sent', 'accepted', 'declined'];
