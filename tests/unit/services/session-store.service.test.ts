import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionStore } from '../../../src/services/session-store.service';
import { ILogger } from '../../../src/config/logger';

describe('SessionStore', () => {
    let now: Date;
    let mockLogger: ILogger;
    let store: SessionStore;
    let counter: number;

    beforeEach(() => {
        now = new Date('2026-03-01T10:00:00Z');
        counter = 0;
        mockLogger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn()
        };
        store = new SessionStore(mockLogger, 60_000, () => now, () => `session-${++counter}`);
    });

    it('should store and return a session', () => {
        const record = testUtils.generateMockRecord();
        const session = store.create('single', 'Backend Engineer', [record], [{ filename: 'jane.pdf', candidateName: 'Jane Doe' }]);

        expect(session.id).toBe('session-1');
        expect(session.expiresAt.toISOString()).toBe('2026-03-01T10:01:00.000Z');
        expect(store.get('session-1')).toBe(session);
        expect(store.get('session-1')?.records).toEqual([record]);
    });

    it('should return null for unknown ids', () => {
        expect(store.get('missing')).toBeNull();
    });

    it('should expire sessions after the TTL', () => {
        store.create('batch', 'Backend Engineer', [], []);
        now = new Date('2026-03-01T10:01:00Z');

        expect(store.get('session-1')).toBeNull();
        expect(store.size).toBe(0);
    });

    it('should delete sessions', () => {
        store.create('single', 'Backend Engineer', [], []);

        expect(store.delete('session-1')).toBe(true);
        expect(store.delete('session-1')).toBe(false);
    });

    it('should not report an expired session as deleted', () => {
        store.create('single', 'Backend Engineer', [], []);
        now = new Date('2026-03-01T10:05:00Z');

        expect(store.delete('session-1')).toBe(false);
    });

    it('should copy the record list', () => {
        const records = [testUtils.generateMockRecord()];
        const session = store.create('batch', 'Backend Engineer', records, []);
        records.push(testUtils.generateMockRecord({ candidate_name: 'John Smith' }));

        expect(session.records).toHaveLength(1);
    });
});
