import type { Client, Contract, Invoice } from '../domain/types.js';
import type { DocumentStore } from '../db/store.js';

/** A document can sync only through an owning client that has portal access. */
export function isEligible(client: Client | null): client is Client {
    return client !== null && client.portalEnabled;
}

export async function resolveInvoiceClient(store: DocumentStore, invoice: Invoice): Promise<Client | null> {
    return invoice.clientId ? store.fetchClient(invoice.clientId) : null;
}

/**
 * A contract belongs to its own client when it has one, otherwise to the
 * client of the invoice or estimate it was created from.
 */
export async function resolveContractClient(store: DocumentStore, contract: Contract): Promise<Client | null> {
    if (contract.clientId) {
        const own = await store.fetchClient(contract.clientId);
        if (own) return own;
    }
    for (const linkedId of [contract.invoiceId, contract.estimateId]) {
        if (!linkedId) continue;
        const linked = await store.fetchInvoice(linkedId);
        const client = linked ? await resolveInvoiceClient(store, linked) : null;
        if (client) return client;
    }
    return null;
}
