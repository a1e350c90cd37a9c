import { describe, it, expect } from 'vitest';
import { emptySyncState } from '../../domain/types.js';
import { PortalBackendError } from '../../portal/errors.js';
import {
    describeSyncStatus,
    formatUploadError,
    isInFlightStale,
    markFailed,
    markInFlight,
    markNeedsUploadIfChanged,
    markUploaded,
    resetForIneligible,
    withoutDirtyFlag,
} from '../state.js';

describe('markNeedsUploadIfChanged', () => {
    it('raises the flag when the fingerprint drifted', () => {
        const doc = { ...emptySyncState(), portalLastUploadedHash: 'old' };
        expect(markNeedsUploadIfChanged(doc, 'new')).toBe(true);
        expect(doc.portalNeedsUpload).toBe(true);
    });

    it('never lowers an already raised flag', () => {
        const doc = { ...emptySyncState(), portalLastUploadedHash: 'same', portalNeedsUpload: true };
        expect(markNeedsUploadIfChanged(doc, 'same')).toBe(false);
        expect(doc.portalNeedsUpload).toBe(true);
    });
});

describe('transitions', () => {
    it('resets an ineligible document without touching upload history', () => {
        const doc = { ...emptySyncState(), portalNeedsUpload: true, portalUploadInFlight: true, portalLastUploadError: 'x', portalLastUploadedHash: 'h' };
        resetForIneligible(doc);
        expect(doc).toEqual({ ...emptySyncState(), portalLastUploadedHash: 'h' });
    });

    it('walks in-flight to uploaded', () => {
        const doc = { ...emptySyncState(), portalNeedsUpload: true, portalLastUploadError: 'old' };
        markInFlight(doc, 1000);
        expect(doc).toMatchObject({ portalUploadInFlight: true, portalUploadStartedAtMs: 1000, portalLastUploadError: null });
        markUploaded(doc, { fingerprint: 'fp', blobUrl: 'https://blobs.test/a.pdf', nowMs: 2000 });
        expect(doc).toEqual({
            portalNeedsUpload: false,
            portalUploadInFlight: false,
            portalUploadStartedAtMs: null,
            portalLastUploadedHash: 'fp',
            portalLastUploadedBlobUrl: 'https://blobs.test/a.pdf',
            portalLastUploadedAtMs: 2000,
            portalLastUploadError: null,
        });
    });

    it('clears the dirty flag when an attempt starts', () => {
        const doc = { ...emptySyncState(), portalNeedsUpload: true };
        markInFlight(doc, 1000);
        expect(doc.portalNeedsUpload).toBe(false);
    });

    it('leaves the dirty flag out of closing writes', () => {
        const doc = { ...emptySyncState(), portalNeedsUpload: true, portalLastUploadedHash: 'fp' };
        expect(withoutDirtyFlag(doc)).toEqual({
            portalUploadInFlight: false,
            portalUploadStartedAtMs: null,
            portalLastUploadedHash: 'fp',
            portalLastUploadedBlobUrl: null,
            portalLastUploadedAtMs: null,
            portalLastUploadError: null,
        });
    });

    it('keeps a failed document dirty', () => {
        const doc = emptySyncState();
        markInFlight(doc, 1000);
        markFailed(doc, 'boom');
        expect(doc).toMatchObject({ portalNeedsUpload: true, portalUploadInFlight: false, portalUploadStartedAtMs: null, portalLastUploadError: 'boom' });
    });
});

describe('isInFlightStale', () => {
    it('is false when nothing is in flight', () => {
        expect(isInFlightStale(emptySyncState(), 10_000, 1000)).toBe(false);
    });

    it('treats a missing start stamp as abandoned', () => {
        expect(isInFlightStale({ ...emptySyncState(), portalUploadInFlight: true }, 10_000, 1000)).toBe(true);
    });

    it('compares the start stamp against the threshold', () => {
        const doc = { ...emptySyncState(), portalUploadInFlight: true, portalUploadStartedAtMs: 9_500 };
        expect(isInFlightStale(doc, 10_000, 1000)).toBe(false);
        expect(isInFlightStale(doc, 10_500, 1000)).toBe(true);
    });
});

describe('formatUploadError', () => {
    it('describes portal errors', () => {
        expect(formatUploadError(new PortalBackendError({ kind: 'missing_admin_key' }))).toBe('Missing portal admin key.');
        expect(formatUploadError(PortalBackendError.decode(''))).toBe('Portal backend decode failed.');
    });

    it('uses plain messages and strings', () => {
        expect(formatUploadError(new Error('  disk full \n'))).toBe('disk full');
        expect(formatUploadError('raw failure')).toBe('raw failure');
    });

    it('falls back to a generic message', () => {
        expect(formatUploadError(undefined)).toBe('Portal upload failed.');
        expect(formatUploadError(new Error(''))).toBe('Portal upload failed.');
    });

    it('truncates to 240 characters', () => {
        expect(formatUploadError(new Error('x'.repeat(300)))).toHaveLength(240);
    });

    it('never splits a character made of a surrogate pair', () => {
        const message = 'a'.repeat(239) + '\u{1F600}\u{1F600}';
        expect(formatUploadError(new Error(message))).toBe('a'.repeat(239) + '\u{1F600}');
    });
});

describe('describeSyncStatus', () => {
    it('reads the document state the way the detail screen shows it', () => {
        expect(describeSyncStatus(emptySyncState())).toBe('not_synced');
        expect(describeSyncStatus({ ...emptySyncState(), portalNeedsUpload: true })).toBe('pending');
        expect(describeSyncStatus({ ...emptySyncState(), portalUploadInFlight: true })).toBe('uploading');
        expect(describeSyncStatus({ ...emptySyncState(), portalNeedsUpload: true, portalLastUploadError: 'x' })).toBe('failed');
        expect(describeSyncStatus({ ...emptySyncState(), portalLastUploadedHash: 'h' })).toBe('up_to_date');
    });
});
