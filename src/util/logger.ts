import pino from 'pino';
import { EventEmitter } from 'node:events';

const level = process.env.LOG_LEVEL || 'info';

// Live log bus and ring buffer backing /logs and /logs/stream
export const logEvents = new EventEmitter();
export type LogRecord = { ts: number; level?: string; msg?: string; data?: unknown };
const LOG_BUFFER_MAX = 500;
const _logBuffer: LogRecord[] = [];
export function getLogBuffer(limit = 200): LogRecord[] {
    const n = Math.max(1, Math.min(limit, LOG_BUFFER_MAX));
    return _logBuffer.slice(-n);
}
function push(rec: LogRecord) {
    _logBuffer.push(rec);
    if (_logBuffer.length > LOG_BUFFER_MAX) _logBuffer.shift();
    logEvents.emit('log', rec);
}

const redactPaths = [
    'portal.adminKey',
    'mongo.pass',
    'config.portal.adminKey',
    'config.mongo.pass',
    'adminKey',
    '*.adminKey',
    'headers["x-portal-admin"]',
    'uri',
    '*.uri'
];

function splitArgs(args: unknown[]): { msg?: string; data?: unknown } {
    if (args.length === 1) {
        return typeof args[0] === 'string' ? { msg: args[0] } : { data: args[0] };
    }
    if (args.length >= 2) {
        if (typeof args[0] === 'object' && typeof args[1] === 'string') return { data: args[0], msg: args[1] };
        if (typeof args[0] === 'string') return { msg: args[0], data: args[1] };
    }
    return {};
}

export const logger = pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: undefined,
    redact: {
        paths: redactPaths,
        censor: '***'
    },
    hooks: {
        logMethod(args, method, lvl) {
            const { msg, data } = splitArgs(args);
            push({ ts: Date.now(), level: this.levels.labels[lvl], msg, data });
            return Reflect.apply(method, this, args);
        }
    }
});

export default logger;
