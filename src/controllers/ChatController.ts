import {
    Body,
    Get,
    JsonController,
    Param,
    Post,
    Req,
    Res,
} from 'routing-controllers';
import { Request, Response } from 'express';
import { IsOptional, IsString } from 'class-validator';
import { Inject, Service } from 'typedi';
import { DEFAULT_PRESET_LABEL, PRESETS, QUICK_ACTIONS } from '../constants/presets';
import { ChatService } from '../services/ChatService';
import { InferenceClient, InferenceClientToken } from '../services/llm/types';
import { LATEST_ENTRY_REF } from '../services/session/SessionState';
import { SessionStore } from '../services/session/SessionStore';
import { SpeechService } from '../services/speech/SpeechService';
import { SseService } from '../services/SseService';
import { formatError, SpeechUnavailableError } from '../utils/errors';

export class ChatRequest {
    // Missing or blank questions are rejected by ChatService after the configuration and image checks.
    @IsOptional()
    @IsString()
    question?: string;
}

@Service()
@JsonController('/api')
export class ChatController {
    constructor(
        private readonly chatService: ChatService,
        private readonly sessionStore: SessionStore,
        private readonly sseService: SseService,
        private readonly speechService: SpeechService,
        @Inject(InferenceClientToken) private readonly inferenceClient: InferenceClient,
    ) { }

    @Get('/sse')
    stream(@Req() request: Request, @Res() response: Response): Response {
        this.sseService.addClient(request, response);
        return response;
    }

    @Get('/presets')
    getPresets() {
        return {
            defaultLabel: DEFAULT_PRESET_LABEL,
            presets: PRESETS,
            quickActions: QUICK_ACTIONS,
        };
    }

    @Get('/capabilities')
    getCapabilities() {
        return {
            inference: this.inferenceClient.isConfigured(),
            model: this.inferenceClient.modelId,
            speech: this.speechService.available,
        };
    }

    @Post('/sessions/:sessionId/chat')
    sendMessage(
        @Param('sessionId') sessionId: string,
        @Body() body: ChatRequest,
    ) {
        return this.chatService.send(sessionId, body.question ?? '');
    }

    @Post('/sessions/:sessionId/speech')
    async speakLatest(@Param('sessionId') sessionId: string) {
        if (!this.speechService.available) {
            throw new SpeechUnavailableError();
        }

        const entry = this.sessionStore.get(sessionId).findEntry(LATEST_ENTRY_REF);
        try {
            await this.speechService.speak(entry.answer);
            return { played: true, entryId: entry.id };
        } catch (error) {
            console.warn(`[ChatController] TTS playback failed for session ${sessionId}`, error);
            return {
                played: false,
                entryId: entry.id,
                warning: `TTS playback failed: ${formatError(error)}`,
            };
        }
    }
}
