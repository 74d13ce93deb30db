import { generateText, ImagePart, LanguageModel, ModelMessage, TextPart } from 'ai';
import { DecodedImage } from '../../types/session';
import { formatError, InferenceError } from '../../utils/errors';
import { InferenceClient } from './types';

export class AiSdkClient implements InferenceClient {
    constructor(
        private readonly model: LanguageModel | undefined,
        readonly modelId: string,
    ) { }

    isConfigured(): boolean {
        return this.model !== undefined;
    }

    async generate(question: string, image: DecodedImage): Promise<string> {
        if (!this.model) {
            throw new InferenceError(`Model ${this.modelId} is not configured`);
        }

        try {
            const result = await generateText({
                model: this.model,
                messages: this.buildMessages(question, image),
            });
            return result.text;
        } catch (error) {
            console.error(`[AiSdkClient] ${this.modelId} request failed`, error);
            throw new InferenceError(formatError(error), error);
        }
    }

    private buildMessages(question: string, image: DecodedImage): ModelMessage[] {
        const content: (TextPart | ImagePart)[] = [
            { type: 'text', text: question },
            { type: 'image', image: image.data, mediaType: image.mediaType },
        ];

        return [{ role: 'user', content }];
    }
}
