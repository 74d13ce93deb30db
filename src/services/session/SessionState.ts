import { randomUUID } from 'node:crypto';
import { Achievements, DecodedImage, HistoryEntry, ImageSummary, SessionSnapshot } from '../../types/session';
import { EntryNotFoundError, ValidationError } from '../../utils/errors';
import { formatTimestamp } from '../../utils/time';

export const LATEST_ENTRY_REF = 'latest';

const MIN_RATING = 1;
const MAX_RATING = 5;

/**
 * Conversation state owned by one session. Entries are append-only: after
 * creation only `rating` and `pinned` change, and only through this class.
 */
export class SessionState {
    private entries: HistoryEntry[] = [];

    private image: DecodedImage | undefined;

    private readonly achievements: Achievements = {
        questionsToday: 0,
        firstUploadDone: false,
    };

    private lastUpdate = new Date();

    constructor(
        readonly id: string = randomUUID(),
        public persistOptIn = false,
    ) { }

    get history(): HistoryEntry[] {
        return this.entries.map(cloneEntry);
    }

    get size(): number {
        return this.entries.length;
    }

    get currentImage(): DecodedImage | undefined {
        return this.image;
    }

    get updatedAt(): Date {
        return new Date(this.lastUpdate);
    }

    appendEntry(question: string, answer: string): HistoryEntry {
        const entry: HistoryEntry = {
            id: randomUUID(),
            timestamp: formatTimestamp(),
            question,
            answer,
            rating: 0,
            pinned: false,
        };
        this.entries.push(entry);
        this.touch();
        return cloneEntry(entry);
    }

    setRating(entryRef: string, value: number): HistoryEntry {
        if (!Number.isInteger(value) || value < MIN_RATING || value > MAX_RATING) {
            throw new ValidationError(`Rating must be an integer between ${MIN_RATING} and ${MAX_RATING}, got ${value}`);
        }
        const entry = this.resolveEntry(entryRef);
        entry.rating = value;
        this.touch();
        return cloneEntry(entry);
    }

    togglePin(entryRef: string): HistoryEntry {
        const entry = this.resolveEntry(entryRef);
        entry.pinned = !entry.pinned;
        this.touch();
        return cloneEntry(entry);
    }

    findEntry(entryRef: string): HistoryEntry {
        return cloneEntry(this.resolveEntry(entryRef));
    }

    clearHistory(): void {
        this.entries = [];
        this.touch();
    }

    replaceHistory(entries: HistoryEntry[]): void {
        this.entries = entries.map(cloneEntry);
        this.touch();
    }

    setImage(image: DecodedImage | undefined): void {
        this.image = image;
        this.touch();
    }

    recordFirstUpload(): void {
        if (!this.achievements.firstUploadDone) {
            this.achievements.firstUploadDone = true;
        }
    }

    incrementQuestionCounter(): void {
        this.achievements.questionsToday += 1;
    }

    getAchievements(): Achievements {
        return { ...this.achievements };
    }

    snapshot(): SessionSnapshot {
        return {
            id: this.id,
            history: this.history,
            image: this.image ? summarizeImage(this.image) : undefined,
            persistOptIn: this.persistOptIn,
            achievements: this.getAchievements(),
            updatedAt: this.lastUpdate.toISOString(),
        };
    }

    private resolveEntry(entryRef: string): HistoryEntry {
        const entry = entryRef === LATEST_ENTRY_REF
            ? this.entries[this.entries.length - 1]
            : this.entries.find((candidate) => candidate.id === entryRef);
        if (!entry) {
            throw new EntryNotFoundError(
                entryRef === LATEST_ENTRY_REF ? 'No answers available yet.' : `History entry ${entryRef} not found`,
            );
        }
        return entry;
    }

    private touch(): void {
        this.lastUpdate = new Date();
    }
}

export function summarizeImage(image: DecodedImage): ImageSummary {
    return {
        format: image.format,
        mediaType: image.mediaType,
        width: image.width,
        height: image.height,
        byteLength: image.data.byteLength,
    };
}

function cloneEntry(entry: HistoryEntry): HistoryEntry {
    return { ...entry };
}
