export type PortalErrorDetail =
    | { kind: 'missing_admin_key' }
    | { kind: 'bad_url' }
    | { kind: 'http'; status: number; body: string }
    | { kind: 'decode'; body: string }
    | { kind: 'network'; code: string };

// Bodies echoed from the backend can be whole HTML error pages
const BODY_EXCERPT_MAX = 500;

/**
 * Failure raised at the portal backend boundary. Carries a structured detail
 * rather than a free-text description; see {@link describePortalError}.
 */
export class PortalBackendError extends Error {
    readonly detail: PortalErrorDetail;

    constructor(detail: PortalErrorDetail) {
        super(describePortalError(detail));
        this.name = 'PortalBackendError';
        this.detail = detail;
    }

    static http(status: number, body: string) {
        return new PortalBackendError({ kind: 'http', status, body: excerpt(body) });
    }

    static decode(body: string) {
        return new PortalBackendError({ kind: 'decode', body: excerpt(body) });
    }
}

function excerpt(body: string) {
    const trimmed = body.trim();
    return trimmed.length > BODY_EXCERPT_MAX ? trimmed.slice(0, BODY_EXCERPT_MAX) : trimmed;
}

export function describePortalError(detail: PortalErrorDetail): string {
    switch (detail.kind) {
        case 'missing_admin_key':
            return 'Missing portal admin key.';
        case 'bad_url':
            return 'Invalid portal backend URL.';
        case 'http':
            return `Portal backend HTTP ${detail.status}. ${detail.body}`.trim();
        case 'decode':
            return `Portal backend decode failed. ${detail.body}`.trim();
        case 'network':
            return `Portal backend unreachable (${detail.code}).`;
    }
}

export function isPortalBackendError(err: unknown): err is PortalBackendError {
    return err instanceof PortalBackendError;
}
