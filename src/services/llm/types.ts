import { Token } from 'typedi';
import { DecodedImage } from '../../types/session';

export interface InferenceClient {
    readonly modelId: string;
    /** False when no credential is available; callers must not call `generate` then. */
    isConfigured(): boolean;
    generate(question: string, image: DecodedImage): Promise<string>;
}

export const InferenceClientToken = new Token<InferenceClient>('InferenceClient');
