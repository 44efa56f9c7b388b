import { randomUUID } from 'crypto';
import { logger, ILogger } from '../config/logger';
import { getConfig } from '../config/env';
import { EvaluationRecord } from '../types/evaluation';

export type AnalysisKind = 'single' | 'batch';

export interface AnalysisSource {
    filename: string;
    candidateName: string;
}

export interface AnalysisSession {
    id: string;
    kind: AnalysisKind;
    jobDescription: string;
    records: readonly EvaluationRecord[];
    sources: readonly AnalysisSource[];
    createdAt: Date;
    expiresAt: Date;
}

export interface ISessionStore {
    create(kind: AnalysisKind, jobDescription: string, records: EvaluationRecord[], sources: AnalysisSource[]): AnalysisSession;
    get(id: string): AnalysisSession | null;
    delete(id: string): boolean;
}

/**
 * Session Store
 *
 * Holds analysis results in memory for report downloads. Nothing is written
 * to disk; entries expire after the configured TTL and are pruned on access.
 */
export class SessionStore implements ISessionStore {
    private sessions = new Map<string, AnalysisSession>();

    constructor(
        private logger: ILogger,
        private ttlMs: number = 60 * 60 * 1000,
        private now: () => Date = () => new Date(),
        private generateId: () => string = randomUUID
    ) { }

    static create(): SessionStore {
        return new SessionStore(logger, getConfig().sessionTtlMs);
    }

    create(kind: AnalysisKind, jobDescription: string, records: EvaluationRecord[], sources: AnalysisSource[]): AnalysisSession {
        this.prune();

        const createdAt = this.now();
        const session: AnalysisSession = {
            id: this.generateId(),
            kind,
            jobDescription,
            records: [...records],
            sources: [...sources],
            createdAt,
            expiresAt: new Date(createdAt.getTime() + this.ttlMs)
        };
        this.sessions.set(session.id, session);

        this.logger.info({
            sessionId: session.id,
            kind,
            candidates: records.length
        }, 'Analysis session stored');

        return session;
    }

    get(id: string): AnalysisSession | null {
        this.prune();
        return this.sessions.get(id) ?? null;
    }

    delete(id: string): boolean {
        this.prune();
        return this.sessions.delete(id);
    }

    get size(): number {
        return this.sessions.size;
    }

    private prune(): void {
        const now = this.now().getTime();
        for (const [id, session] of this.sessions) {
            if (session.expiresAt.getTime() <= now) {
                this.sessions.delete(id);
                this.logger.debug({ sessionId: id }, 'Analysis session expired');
            }
        }
    }
}

// Singleton instance
let sessionStore: SessionStore | null = null;

export function getSessionStore(): SessionStore {
    if (!sessionStore) {
        sessionStore = SessionStore.create();
    }
    return sessionStore;
}
