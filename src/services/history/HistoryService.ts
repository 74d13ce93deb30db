import { Service } from 'typedi';
import { HistoryEntry, MutationResult, SessionSnapshot } from '../../types/session';
import { HistoryChange, SseService } from '../SseService';
import { LATEST_ENTRY_REF, SessionState } from '../session/SessionState';
import { SessionStore } from '../session/SessionStore';
import { HistoryStore } from './HistoryStore';

/**
 * History mutations that must be mirrored to the durable file while the
 * session is opted in. A failed write never undoes the in-memory change.
 */
@Service()
export class HistoryService {
    constructor(
        private readonly sessionStore: SessionStore,
        private readonly historyStore: HistoryStore,
        private readonly sseService: SseService,
    ) { }

    list(sessionId: string): HistoryEntry[] {
        return this.sessionStore.get(sessionId).history;
    }

    rate(sessionId: string, entryRef: string, value: number): MutationResult<HistoryEntry> {
        const session = this.sessionStore.get(sessionId);
        const entry = session.setRating(entryRef, value);
        return { result: entry, warning: this.persist(session, 'rated', entry.id) };
    }

    togglePin(sessionId: string, entryRef: string): MutationResult<HistoryEntry> {
        const session = this.sessionStore.get(sessionId);
        const entry = session.togglePin(entryRef);
        return { result: entry, warning: this.persist(session, 'pinned', entry.id) };
    }

    clear(sessionId: string): MutationResult<SessionSnapshot> {
        const session = this.sessionStore.get(sessionId);
        session.clearHistory();
        const warning = this.persist(session, 'cleared');
        return { result: session.snapshot(), warning };
    }

    setPersistence(sessionId: string, enabled: boolean): MutationResult<SessionSnapshot> {
        const session = this.sessionStore.get(sessionId);
        const wasEnabled = session.persistOptIn;
        session.persistOptIn = enabled;

        let warning: string | undefined;
        if (enabled && !wasEnabled) {
            if (session.size === 0) {
                const restored = this.historyStore.load();
                if (restored.length > 0) {
                    session.replaceHistory(restored);
                    this.notify(session, 'restored');
                }
            } else {
                warning = this.persist(session);
            }
        }

        console.log(`[HistoryService] Persistence ${enabled ? 'enabled' : 'disabled'} for session ${sessionId}`);
        return { result: session.snapshot(), warning };
    }

    /**
     * Writes the session history if it is opted in and returns a
     * user-facing warning when the write failed.
     */
    persist(session: SessionState, change?: HistoryChange, entryId?: string): string | undefined {
        const saved = this.historyStore.save(session.history, session.persistOptIn);
        if (change) {
            this.notify(session, change, entryId);
        }
        return saved.ok ? undefined : saved.error.message;
    }

    exportHistory(sessionId: string): Buffer {
        return this.historyStore.export(this.sessionStore.get(sessionId).history);
    }

    latestAnswer(sessionId: string): Buffer {
        const entry = this.sessionStore.get(sessionId).findEntry(LATEST_ENTRY_REF);
        return this.historyStore.exportText(entry.answer);
    }

    private notify(session: SessionState, change: HistoryChange, entryId?: string): void {
        this.sseService.emitHistoryUpdated({
            sessionId: session.id,
            change,
            size: session.size,
            entryId,
        });
    }
}
