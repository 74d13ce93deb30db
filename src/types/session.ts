export interface HistoryEntry {
    readonly id: string;
    readonly timestamp: string;
    readonly question: string;
    readonly answer: string;
    rating: number;
    pinned: boolean;
}

export interface Achievements {
    questionsToday: number;
    firstUploadDone: boolean;
}

export type ImageFormat = 'jpeg' | 'png';

export interface DecodedImage {
    format: ImageFormat;
    mediaType: 'image/jpeg' | 'image/png';
    width: number;
    height: number;
    data: Buffer;
}

export type ImageSummary = Omit<DecodedImage, 'data'> & { byteLength: number };

export interface SessionSnapshot {
    id: string;
    history: HistoryEntry[];
    image?: ImageSummary;
    persistOptIn: boolean;
    achievements: Achievements;
    updatedAt: string;
}

export interface SavedHistoryDocument {
    saved_at: string;
    items: HistoryEntry[];
}

export interface ExportedHistoryDocument {
    exported_at: string;
    items: HistoryEntry[];
}

export interface MutationResult<T> {
    result: T;
    // Set when the durable mirror could not be written
    warning?: string;
}
