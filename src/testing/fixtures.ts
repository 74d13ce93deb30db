import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { InferenceClient } from '../services/llm/types';
import { DecodedImage } from '../types/session';

// 1x1 transparent PNG
export const PNG_BASE64 =
    'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

export const PNG_DATA_URL = `data:image/png;base64,${PNG_BASE64}`;

// 3x2 grayscale baseline JPEG: one quantization table, one-symbol Huffman tables, a single flat block
export const JPEG_BASE64 =
    '/9j/2wBDAAEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQH/wAALCAACAAMBAREA/8QAFAABAAAAAAAAAAAAAAAAAAAAAP/EABQQAQAAAAAAAAAAAAAAAAAAAAD/2gAIAQEAAD8AP//Z';

export const JPEG_BYTES = Buffer.from(JPEG_BASE64, 'base64');

// JPEG_BYTES up to and including the SOF0 frame header
export const JPEG_FRAME_END = 84;

// Signature plus IHDR
export const PNG_HEADER_LENGTH = 33;

export const GIF_BYTES = Buffer.concat([
    Buffer.from('GIF89a', 'ascii'),
    Buffer.from([0x01, 0x00, 0x01, 0x00, 0x80, 0x00, 0x00]),
]);

export function pngImage(): DecodedImage {
    return {
        format: 'png',
        mediaType: 'image/png',
        width: 1,
        height: 1,
        data: Buffer.from(PNG_BASE64, 'base64'),
    };
}

export function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'vision-qa-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export type Responder = (question: string, image: DecodedImage) => Promise<string>;

export class StubInferenceClient implements InferenceClient {
    readonly modelId = 'stub-model';

    readonly calls: Array<{ question: string; image: DecodedImage }> = [];

    constructor(
        private readonly respond: Responder = async () => 'stub answer',
        public configured = true,
    ) { }

    isConfigured(): boolean {
        return this.configured;
    }

    generate(question: string, image: DecodedImage): Promise<string> {
        this.calls.push({ question, image });
        return this.respond(question, image);
    }
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return { promise, resolve };
}
