import { Request, Response } from 'express';
import { Service } from 'typedi';

export type ChatStatus = 'started' | 'completed' | 'error';

export interface ChatStatusPayload {
    sessionId: string;
    status: ChatStatus;
    message?: string;
    timestamp?: string;
}

export type HistoryChange = 'appended' | 'rated' | 'pinned' | 'cleared' | 'restored';

export interface HistoryUpdatedPayload {
    sessionId: string;
    change: HistoryChange;
    size: number;
    entryId?: string;
    timestamp?: string;
}

/** Minimal writable surface of an express response, so tests can pass a recorder. */
export type SseSink = Pick<Response, 'setHeader' | 'write' | 'end'> & { flushHeaders?: () => void };

interface SseClient {
    id: number;
    sink: SseSink;
    heartbeat: NodeJS.Timeout;
}

const HEARTBEAT_INTERVAL_MS = 25000;

@Service()
export class SseService {
    private readonly clients = new Map<number, SseClient>();

    private nextClientId = 1;

    get clientCount(): number {
        return this.clients.size;
    }

    addClient(request: Pick<Request, 'on' | 'removeListener'>, sink: SseSink): number {
        sink.setHeader('Content-Type', 'text/event-stream');
        sink.setHeader('Cache-Control', 'no-cache');
        sink.setHeader('Connection', 'keep-alive');
        sink.flushHeaders?.();
        sink.write('retry: 5000\n\n');

        const client: SseClient = {
            id: this.nextClientId++,
            sink,
            heartbeat: setInterval(() => {
                this.pushRaw(client.id, ': keep-alive\n\n');
            }, HEARTBEAT_INTERVAL_MS),
        };
        client.heartbeat.unref();

        this.clients.set(client.id, client);

        const closeHandler = () => {
            this.removeClient(client.id);
            request.removeListener('close', closeHandler);
        };
        request.on('close', closeHandler);

        return client.id;
    }

    emitChatStatus(payload: ChatStatusPayload): void {
        this.broadcast('chat-status', {
            ...payload,
            timestamp: payload.timestamp ?? new Date().toISOString(),
        });
    }

    emitHistoryUpdated(payload: HistoryUpdatedPayload): void {
        this.broadcast('history-updated', {
            ...payload,
            timestamp: payload.timestamp ?? new Date().toISOString(),
        });
    }

    removeClient(clientId: number): void {
        const client = this.clients.get(clientId);
        if (!client) {
            return;
        }

        clearInterval(client.heartbeat);
        this.clients.delete(clientId);
        try {
            client.sink.end();
        } catch (error) {
            console.error('[SseService] Failed to close SSE response', error);
        }
    }

    private broadcast(event: string, data: unknown): void {
        const chunk = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
        for (const clientId of [...this.clients.keys()]) {
            this.pushRaw(clientId, chunk);
        }
    }

    private pushRaw(clientId: number, chunk: string): void {
        const client = this.clients.get(clientId);
        if (!client) {
            return;
        }

        try {
            client.sink.write(chunk);
        } catch (error) {
            console.error('[SseService] Failed to push SSE chunk, removing client', error);
            this.removeClient(clientId);
        }
    }
}
