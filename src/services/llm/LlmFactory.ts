import { Service } from 'typedi';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { LanguageModel } from 'ai';
import { CONFIG } from '../../config';
import { InferenceClient } from './types';
import { AiSdkClient } from './AiSdkClient';

export type LlmSettings = Pick<typeof CONFIG, 'MODEL' | 'GEMINI_API_KEY' | 'OPENAI_API_KEY'>;

@Service()
export class LlmFactory {

    getClient(settings: LlmSettings = CONFIG): InferenceClient {
        const modelId = settings.MODEL;
        const isGemini = modelId.startsWith('gemini');

        let model: LanguageModel | undefined;

        if (isGemini) {
            if (settings.GEMINI_API_KEY) {
                const google = createGoogleGenerativeAI({
                    apiKey: settings.GEMINI_API_KEY,
                });
                model = google(modelId);
            }
        } else if (settings.OPENAI_API_KEY) {
            const openai = createOpenAI({
                apiKey: settings.OPENAI_API_KEY,
            });
            model = openai(modelId);
        }

        if (!model) {
            console.warn(`[LlmFactory] No API key for ${modelId}; questions will be rejected until one is configured`);
        }

        return new AiSdkClient(model, modelId);
    }
}
