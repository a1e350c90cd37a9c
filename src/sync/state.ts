import type { PortalSyncState, SyncStatePatch } from '../domain/types.js';
import { describePortalError, isPortalBackendError } from '../portal/errors.js';

export const UPLOAD_ERROR_MAX = 240;
export const GENERIC_UPLOAD_ERROR = 'Portal upload failed.';

export type SyncStatus = 'not_synced' | 'pending' | 'uploading' | 'up_to_date' | 'failed';

/** Raises the dirty flag when content drifted from the last upload. Never lowers it. */
export function markNeedsUploadIfChanged(doc: PortalSyncState, fingerprint: string): boolean {
    if (doc.portalLastUploadedHash === fingerprint) return false;
    doc.portalNeedsUpload = true;
    return true;
}

// Nothing should show "uploading" or an error for a document that can no longer sync
export function resetForIneligible(doc: PortalSyncState) {
    doc.portalNeedsUpload = false;
    doc.portalUploadInFlight = false;
    doc.portalUploadStartedAtMs = null;
    doc.portalLastUploadError = null;
}

export function markSkippedUnchanged(doc: PortalSyncState) {
    doc.portalNeedsUpload = false;
    doc.portalUploadInFlight = false;
    doc.portalUploadStartedAtMs = null;
    doc.portalLastUploadError = null;
}

/** Takes the dirty flag for this attempt; an edit marked while it runs raises the flag again. */
export function markInFlight(doc: PortalSyncState, nowMs: number) {
    doc.portalNeedsUpload = false;
    doc.portalUploadInFlight = true;
    doc.portalUploadStartedAtMs = nowMs;
    doc.portalLastUploadError = null;
}

export function markUploaded(doc: PortalSyncState, result: { fingerprint: string; blobUrl: string; nowMs: number }) {
    doc.portalNeedsUpload = false;
    doc.portalUploadInFlight = false;
    doc.portalUploadStartedAtMs = null;
    doc.portalLastUploadedHash = result.fingerprint;
    doc.portalLastUploadedBlobUrl = result.blobUrl;
    doc.portalLastUploadedAtMs = result.nowMs;
    doc.portalLastUploadError = null;
}

/**
 * Every sync field except the dirty flag. Used for writes that close an attempt
 * without a failure, so a mark raised meanwhile by another worker stays set.
 */
export function withoutDirtyFlag(doc: PortalSyncState): SyncStatePatch {
    return {
        portalUploadInFlight: doc.portalUploadInFlight,
        portalUploadStartedAtMs: doc.portalUploadStartedAtMs,
        portalLastUploadedHash: doc.portalLastUploadedHash,
        portalLastUploadedBlobUrl: doc.portalLastUploadedBlobUrl,
        portalLastUploadedAtMs: doc.portalLastUploadedAtMs,
        portalLastUploadError: doc.portalLastUploadError,
    };
}

/** Leaves the document dirty so the next trigger retries. */
export function markFailed(doc: PortalSyncState, message: string) {
    doc.portalNeedsUpload = true;
    doc.portalUploadInFlight = false;
    doc.portalUploadStartedAtMs = null;
    doc.portalLastUploadError = message;
}

export function isInFlightStale(doc: PortalSyncState, nowMs: number, staleAfterMs: number): boolean {
    if (!doc.portalUploadInFlight) return false;
    if (doc.portalUploadStartedAtMs == null) return true;
    return nowMs - doc.portalUploadStartedAtMs >= staleAfterMs;
}

export function formatUploadError(err: unknown): string {
    let text: string;
    if (isPortalBackendError(err)) text = describePortalError(err.detail);
    else if (err instanceof Error) text = err.message;
    else text = err == null ? '' : String(err);
    text = text.trim();
    if (!text) return GENERIC_UPLOAD_ERROR;
    // Count code points so a cut never splits a surrogate pair
    const chars = Array.from(text);
    return chars.length > UPLOAD_ERROR_MAX ? chars.slice(0, UPLOAD_ERROR_MAX).join('').trimEnd() : text;
}

/** What a document detail screen shows for the portal copy. */
export function describeSyncStatus(doc: PortalSyncState): SyncStatus {
    if (doc.portalUploadInFlight) return 'uploading';
    if (doc.portalLastUploadError) return 'failed';
    if (doc.portalNeedsUpload) return 'pending';
    if (doc.portalLastUploadedHash) return 'up_to_date';
    return 'not_synced';
}
