import 'dotenv/config';

function required(name: string, value: string | undefined) {
    if (!value) throw new Error(`Missing required env var: ${name}`);
    return value;
}

export function bool(envVal: string | undefined, defaultVal: boolean) {
    if (envVal == null) return defaultVal;
    const v = envVal.trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(v)) return true;
    if (['false', '0', 'no', 'n', 'off', ''].includes(v)) return false;
    return defaultVal; // fallback if unexpected
}

function int(envVal: string | undefined, defaultVal: number) {
    const n = parseInt(envVal ?? '', 10);
    return Number.isFinite(n) ? n : defaultVal;
}

function optional(value: string | undefined) {
    const v = value?.trim();
    return v ? v : undefined;
}

export const config = {
    env: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',

    portal: {
        baseUrl: process.env.PORTAL_BASE_URL || 'https://portal-backend.example.com',
        // Checked per request so a missing key shows up on the affected documents
        adminKey: optional(process.env.PORTAL_ADMIN_KEY),
        timeoutMs: int(process.env.PORTAL_TIMEOUT_MS, 30000),
        retries: int(process.env.PORTAL_RETRIES, 3),
    },

    mongo: {
        dbName: required('MONGO_DB_NAME', process.env.MONGO_DB_NAME),
        user: process.env.MONGO_USER,
        pass: process.env.MONGO_PASSWORD,
        host: process.env.MONGO_HOST || '127.0.0.1',
        port: int(process.env.MONGO_PORT, 27017),
    },

    sweep: process.env.SWEEP_SCHEDULE || '*/5 * * * *',

    flags: {
        sweepEnabled: bool(process.env.SWEEP_ENABLED, true),
        runOnce: bool(process.env.RUN_ONCE, false),
        // In-flight flags older than this are treated as abandoned by a dead worker
        inFlightStaleMinutes: int(process.env.IN_FLIGHT_STALE_MINUTES, 15),
        attemptLogs: bool(process.env.ATTEMPT_LOGS, true),
    },

    status: {
        enabled: bool(process.env.STATUS_ENABLED, true),
        port: int(process.env.PORT || process.env.STATUS_PORT, 3000),
        authUser: process.env.STATUS_AUTH_USER,
        authPass: process.env.STATUS_AUTH_PASS,
        allowRemoteTrigger: bool(process.env.ALLOW_REMOTE_TRIGGER, false),
        trustProxy: bool(process.env.TRUST_PROXY, false),
    },
};

export type AppConfig = typeof config;

export default config;
