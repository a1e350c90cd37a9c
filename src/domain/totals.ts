import type { Invoice, LineItem } from './types.js';

export function lineTotal(item: LineItem): number {
    return item.quantity * item.unitPrice;
}

export function subtotal(invoice: Invoice): number {
    return invoice.items.reduce((sum, item) => sum + lineTotal(item), 0);
}

// Discount never takes the taxable base below zero
export function discountedSubtotal(invoice: Invoice): number {
    return Math.max(0, subtotal(invoice) - invoice.discountAmount);
}

export function taxAmount(invoice: Invoice): number {
    return discountedSubtotal(invoice) * invoice.taxRate;
}

export function total(invoice: Invoice): number {
    return discountedSubtotal(invoice) + taxAmount(invoice);
}

export function toCents(dollars: number): number {
    return Math.round(dollars * 100);
}
