import fs from 'node:fs';
import path from 'node:path';
import { Service } from 'typedi';
import { z } from 'zod';
import { CONFIG } from '../../config';
import { ExportedHistoryDocument, HistoryEntry, SavedHistoryDocument } from '../../types/session';
import { IoError, formatError } from '../../utils/errors';
import { formatTimestamp } from '../../utils/time';

export type SaveResult = { ok: true } | { ok: false; error: IoError };

const historyEntrySchema = z.object({
    id: z.string().min(1),
    timestamp: z.string(),
    question: z.string(),
    answer: z.string(),
    rating: z.number().int().min(0).max(5).default(0),
    pinned: z.boolean().default(false),
});

const historyDocumentSchema = z.object({
    items: z.unknown(),
});

/**
 * Mirrors conversation text to a single JSON file. Images never pass through here.
 */
@Service()
export class HistoryStore {
    constructor(private readonly filePath: string = CONFIG.HISTORY_FILE) { }

    get location(): string {
        return this.filePath;
    }

    save(history: HistoryEntry[], optIn: boolean): SaveResult {
        if (!optIn) {
            return { ok: true };
        }

        const payload: SavedHistoryDocument = {
            saved_at: formatTimestamp(),
            items: history,
        };

        try {
            ensureDirectory(path.dirname(this.filePath));
            fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), 'utf-8');
            return { ok: true };
        } catch (error) {
            console.error(`[HistoryStore] Failed to write ${this.filePath}`, error);
            return {
                ok: false,
                error: new IoError(`Could not save history to disk: ${formatError(error)}`, error),
            };
        }
    }

    load(): HistoryEntry[] {
        if (!fs.existsSync(this.filePath)) {
            return [];
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
        } catch (error) {
            console.warn(`[HistoryStore] Ignoring unreadable history file ${this.filePath}`, error);
            return [];
        }

        const document = historyDocumentSchema.safeParse(raw);
        if (!document.success || !Array.isArray(document.data.items)) {
            return [];
        }

        const entries: HistoryEntry[] = [];
        document.data.items.forEach((item: unknown, index: number) => {
            const parsed = historyEntrySchema.safeParse(item);
            if (parsed.success) {
                entries.push(parsed.data);
            } else {
                console.warn(`[HistoryStore] Skipping malformed history item #${index}`);
            }
        });
        return entries;
    }

    export(history: HistoryEntry[]): Buffer {
        const payload: ExportedHistoryDocument = {
            exported_at: formatTimestamp(),
            items: history,
        };
        return Buffer.from(JSON.stringify(payload, null, 2), 'utf-8');
    }

    exportText(text: string): Buffer {
        return Buffer.from(text, 'utf-8');
    }
}

function ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}
