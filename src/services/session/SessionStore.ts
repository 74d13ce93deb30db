import { Service } from 'typedi';
import { CONFIG } from '../../config';
import { SessionNotFoundError } from '../../utils/errors';
import { HistoryStore } from '../history/HistoryStore';
import { SessionState } from './SessionState';

export interface CreateSessionOptions {
    persist?: boolean;
}

@Service()
export class SessionStore {
    private readonly sessions = new Map<string, SessionState>();

    constructor(private readonly historyStore: HistoryStore) { }

    create(options: CreateSessionOptions = {}): SessionState {
        const persist = options.persist ?? CONFIG.PERSIST_HISTORY;
        const session = new SessionState(undefined, persist);

        if (persist) {
            const restored = this.historyStore.load();
            session.replaceHistory(restored);
            console.log(`[SessionStore] Session ${session.id} restored ${restored.length} history entries`);
        }

        this.sessions.set(session.id, session);
        return session;
    }

    get(sessionId: string): SessionState {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    delete(sessionId: string): void {
        if (!this.sessions.delete(sessionId)) {
            throw new SessionNotFoundError(sessionId);
        }
    }

    get size(): number {
        return this.sessions.size;
    }
}
