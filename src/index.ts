import cron from 'node-cron';
import logger from './util/logger.js';
import { connectMongoose, disconnectMongoose } from './db/mongoose.js';
import { config } from './config.js';
import { createServices } from './services.js';
import { startStatusServer } from './server/status.js';
import { isSweepRunning } from './sync/sweep.js';
import { APP_VERSION } from './version.js';

async function bootstrap() {
    try {
        logger.info({ version: APP_VERSION, portal: config.portal.baseUrl }, 'Portal sync starting');
        await connectMongoose(config.mongo);
        const services = createServices(config);

        if (config.flags.runOnce) {
            logger.info('RUN_ONCE is true; running a single sweep and exiting');
            const summary = await services.sweep();
            await disconnectMongoose();
            process.exit(summary.success ? 0 : 1);
        }

        if (config.status.enabled) {
            startStatusServer({
                status: config.status,
                reconciler: services.reconciler,
                history: services.history,
                sweep: services.sweep,
                isSweepRunning,
            });
        }

        if (config.flags.sweepEnabled) {
            // Skip ticks while a sweep is still running
            let running = false;
            cron.schedule(config.sweep, async () => {
                if (running) {
                    logger.warn('Previous sweep still in progress; skipping this tick');
                    return;
                }
                running = true;
                try {
                    await services.sweep();
                } catch (err) {
                    logger.error({ err }, 'Scheduled sweep failed');
                } finally {
                    running = false;
                }
            });
            logger.info({ schedule: config.sweep }, 'Sweep scheduled');
        } else {
            logger.info('SWEEP_ENABLED is false; sweeps run only on trigger');
        }
    } catch (err) {
        logger.error({ err }, 'Fatal during bootstrap');
        await disconnectMongoose();
        process.exit(1);
    }
}

void bootstrap();

process.on('SIGINT', async () => {
    logger.info('Shutting down');
    await disconnectMongoose();
    process.exit(0);
});
