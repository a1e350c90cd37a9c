import { connectMongoose, disconnectMongoose } from '../db/mongoose.js';
import { config } from '../config.js';
import { isDocumentKind } from '../domain/types.js';
import { createServices } from '../services.js';
import { describeSyncStatus } from '../sync/state.js';
import logger from '../util/logger.js';

function parseArgs() {
    const args = process.argv.slice(2);
    const out: Record<string, string> = {};
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a.startsWith('--')) {
            const key = a.replace(/^--/, '');
            const val = args[i + 1] && !args[i + 1].startsWith('--') ? args[++i] : 'true';
            out[key] = val;
        }
    }
    return out;
}

// Usage: reconcile --kind invoice|estimate|contract --id <uuid> [--mark]
async function run() {
    const opts = parseArgs();
    const kind = opts.kind || 'invoice';
    const id = opts.id;
    if (!isDocumentKind(kind) || !id) {
        logger.error({ kind, id }, 'Usage: reconcile --kind invoice|estimate|contract --id <id> [--mark]');
        process.exitCode = 2;
        return;
    }

    await connectMongoose(config.mongo);
    try {
        const { reconciler, store } = createServices(config);
        if (opts.mark === 'true') {
            const marked = kind === 'contract'
                ? await reconciler.markContractNeedsUploadIfChanged(id)
                : await reconciler.markInvoiceNeedsUploadIfChanged(id);
            logger.info({ kind, id, marked }, 'Checked for content drift');
        }
        const outcome = await reconciler.reconcile(kind, id);
        const doc = kind === 'contract' ? await store.fetchContract(id) : await store.fetchInvoice(id);
        logger.info({ kind, id, outcome, status: doc ? describeSyncStatus(doc) : 'missing' }, 'Reconcile finished');
        if (outcome.status === 'failed') process.exitCode = 1;
    } finally {
        await disconnectMongoose();
    }
}

run().catch((err) => {
    logger.error({ err }, 'Reconcile script failed');
    process.exit(1);
});
