import { Inject, Service } from 'typedi';
import { Achievements, HistoryEntry } from '../types/session';
import { ConfigurationError, MissingInputError, SendInProgressError, formatError } from '../utils/errors';
import { HistoryService } from './history/HistoryService';
import { InferenceClient, InferenceClientToken } from './llm/types';
import { SessionStore } from './session/SessionStore';
import { ChatStatus, SseService } from './SseService';

export const NO_TEXT_PLACEHOLDER = '(No text returned)';

export interface SendResult {
    entry: HistoryEntry;
    achievements: Achievements;
    warning?: string;
}

@Service()
export class ChatService {
    private readonly pending = new Set<string>();

    constructor(
        private readonly sessionStore: SessionStore,
        private readonly historyService: HistoryService,
        private readonly sseService: SseService,
        @Inject(InferenceClientToken) private readonly inferenceClient: InferenceClient,
    ) { }

    /**
     * Answers one question about the session's current image. Every call that
     * passes validation records exactly one entry, even when the model fails.
     */
    async send(sessionId: string, question: string): Promise<SendResult> {
        const session = this.sessionStore.get(sessionId);

        if (!this.inferenceClient.isConfigured()) {
            throw new ConfigurationError();
        }
        const image = session.currentImage;
        if (!image) {
            throw new MissingInputError('Please upload an image first.');
        }
        const trimmed = question.trim();
        if (!trimmed) {
            throw new MissingInputError('Please enter a question.');
        }
        if (this.pending.has(sessionId)) {
            throw new SendInProgressError();
        }

        this.pending.add(sessionId);
        this.notifyStatus(sessionId, 'started', 'Generating response...');

        let answer: string;
        let failed = false;
        try {
            const text = await this.inferenceClient.generate(trimmed, image);
            answer = text ? text : NO_TEXT_PLACEHOLDER;
        } catch (error) {
            console.error(`[ChatService] Inference failed for session ${sessionId}`, error);
            answer = `Error: ${formatError(error)}`;
            failed = true;
        } finally {
            this.pending.delete(sessionId);
        }

        const entry = session.appendEntry(trimmed, answer);
        session.incrementQuestionCounter();
        const warning = this.historyService.persist(session, 'appended', entry.id);

        this.notifyStatus(sessionId, failed ? 'error' : 'completed', failed ? answer : 'Answer ready.');

        return {
            entry,
            achievements: session.getAchievements(),
            warning,
        };
    }

    isBusy(sessionId: string): boolean {
        return this.pending.has(sessionId);
    }

    private notifyStatus(sessionId: string, status: ChatStatus, message: string): void {
        this.sseService.emitChatStatus({ sessionId, status, message });
    }
}
