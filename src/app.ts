import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { useContainer, useExpressServer } from 'routing-controllers';
import { Container } from 'typedi';
import { CONFIG } from './config';
import { ChatController } from './controllers/ChatController';
import { HistoryController } from './controllers/HistoryController';
import { SessionController } from './controllers/SessionController';
import { LlmFactory } from './services/llm/LlmFactory';
import { InferenceClientToken } from './services/llm/types';

useContainer(Container);

export function createApp(): express.Express {
    const app = express();

    if (!Container.has(InferenceClientToken)) {
        Container.set(InferenceClientToken, Container.get(LlmFactory).getClient());
    }

    app.use(cors());
    // Uploads arrive as base64 data URLs, well above the default body limit
    app.use(express.json({ limit: CONFIG.JSON_BODY_LIMIT }));

    useExpressServer(app, {
        controllers: [SessionController, HistoryController, ChatController],
        validation: {
            whitelist: true,
            forbidNonWhitelisted: true,
            validationError: { target: false },
        },
        classTransformer: true,
    });

    return app;
}
