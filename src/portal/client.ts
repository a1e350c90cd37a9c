import axios, { AxiosAdapter, AxiosError } from 'axios';
import pRetry, { AbortError } from 'p-retry';
import { StatusCodes } from 'http-status-codes';
import logger from '../util/logger.js';
import { PortalBackendError, isPortalBackendError } from './errors.js';

export interface PortalClientOptions {
    baseUrl: string;
    adminKey?: string;
    timeoutMs: number;
    retries: number;
    /** First backoff delay; doubles per attempt. */
    minRetryDelayMs?: number;
    /** Swapped in by tests to keep requests in process. */
    adapter?: AxiosAdapter;
}

export interface PortalResponse {
    status: number;
    data: unknown;
}

export interface PortalHttpClient {
    post(path: string, body: Record<string, unknown>): Promise<PortalResponse>;
}

const TRANSIENT_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN'];
const DEFAULT_RATE_LIMIT_WAIT_MS = 2000;

function normalizeBaseUrl(raw: string): string | null {
    try {
        const u = new URL(raw);
        if (u.protocol !== 'https:' && u.protocol !== 'http:') return null;
        return u.toString().replace(/\/$/, '');
    } catch {
        return null;
    }
}

export function bodyText(data: unknown): string {
    if (data == null) return '';
    if (typeof data === 'string') return data;
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
}

// Retry-After is either delta-seconds or an HTTP date
export function retryAfterMs(header: unknown, nowMs: number): number {
    if (header == null || header === '') return DEFAULT_RATE_LIMIT_WAIT_MS;
    const secs = Number(header);
    if (!Number.isNaN(secs) && secs > 0) return secs * 1000;
    const when = new Date(String(header)).getTime();
    if (!Number.isNaN(when) && when - nowMs > 0) return Math.max(DEFAULT_RATE_LIMIT_WAIT_MS, when - nowMs);
    return DEFAULT_RATE_LIMIT_WAIT_MS;
}

export function createPortalHttpClient(opts: PortalClientOptions): PortalHttpClient {
    const baseURL = normalizeBaseUrl(opts.baseUrl);
    const api = axios.create({
        baseURL: baseURL ?? undefined,
        timeout: opts.timeoutMs,
        adapter: opts.adapter,
    });

    // Configuration problems surface per request, as a structured error on the document
    api.interceptors.request.use((req) => {
        if (!baseURL) throw new PortalBackendError({ kind: 'bad_url' });
        if (!opts.adminKey) throw new PortalBackendError({ kind: 'missing_admin_key' });
        req.headers.set('x-portal-admin', opts.adminKey);
        req.headers.set('Content-Type', 'application/json');
        return req;
    });

    async function post(path: string, body: Record<string, unknown>): Promise<PortalResponse> {
        let attempt = 0;
        return pRetry(
            async () => {
                attempt += 1;
                try {
                    const resp = await api.post<unknown>(path, body);
                    return { status: resp.status, data: resp.data };
                } catch (err) {
                    if (isPortalBackendError(err)) throw new AbortError(err);
                    if (!axios.isAxiosError(err)) throw new AbortError(err instanceof Error ? err : new Error(String(err)));
                    const ax: AxiosError = err;
                    const status = ax.response?.status;
                    const code = ax.code;
                    if (status && status >= StatusCodes.INTERNAL_SERVER_ERROR) {
                        logger.warn({ status, path, attempt }, 'Portal server error, retrying');
                        throw PortalBackendError.http(status, bodyText(ax.response?.data));
                    }
                    if (status === StatusCodes.TOO_MANY_REQUESTS) {
                        const waitMs = retryAfterMs(ax.response?.headers?.['retry-after'], Date.now());
                        logger.warn({ status, path, attempt, waitMs }, 'Portal rate limited, retrying');
                        if (attempt <= opts.retries) await new Promise((r) => setTimeout(r, waitMs));
                        throw PortalBackendError.http(status, bodyText(ax.response?.data));
                    }
                    if (status) {
                        throw new AbortError(PortalBackendError.http(status, bodyText(ax.response?.data)));
                    }
                    if (code && TRANSIENT_CODES.includes(code)) {
                        logger.warn({ code, path, attempt }, 'Portal network error, retrying');
                        throw new PortalBackendError({ kind: 'network', code });
                    }
                    throw new AbortError(new PortalBackendError({ kind: 'network', code: code ?? 'unknown' }));
                }
            },
            { retries: opts.retries, factor: 2, minTimeout: opts.minRetryDelayMs ?? 1000, randomize: true }
        );
    }

    return { post };
}
