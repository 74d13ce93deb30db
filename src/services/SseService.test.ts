import { SseService } from './SseService';

const createClient = () => {
    const sink = {
        setHeader: jest.fn(),
        write: jest.fn(),
        end: jest.fn(),
    };
    const request = {
        on: jest.fn(),
        removeListener: jest.fn(),
    };
    return { sink, request };
};

const closeHandlerOf = (request: ReturnType<typeof createClient>['request']): (() => void) => {
    const [event, handler] = request.on.mock.calls[0];
    expect(event).toBe('close');
    return handler;
};

describe('SseService', () => {
    let service: SseService;

    beforeEach(() => {
        service = new SseService();
    });

    it('opens an event stream', () => {
        const { sink, request } = createClient();

        const id = service.addClient(request, sink);

        expect(sink.setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream');
        expect(sink.write).toHaveBeenCalledWith('retry: 5000\n\n');
        expect(service.clientCount).toBe(1);
        service.removeClient(id);
    });

    it('broadcasts chat status to every client', () => {
        const first = createClient();
        const second = createClient();
        const ids = [service.addClient(first.request, first.sink), service.addClient(second.request, second.sink)];

        service.emitChatStatus({ sessionId: 's1', status: 'started', message: 'Generating response...', timestamp: 'now' });

        const expected = 'event: chat-status\ndata: {"sessionId":"s1","status":"started","message":"Generating response...","timestamp":"now"}\n\n';
        expect(first.sink.write).toHaveBeenLastCalledWith(expected);
        expect(second.sink.write).toHaveBeenLastCalledWith(expected);
        ids.forEach((id) => service.removeClient(id));
    });

    it('stamps history updates', () => {
        const { sink, request } = createClient();
        const id = service.addClient(request, sink);

        service.emitHistoryUpdated({ sessionId: 's1', change: 'cleared', size: 0 });

        const chunk: string = sink.write.mock.calls[sink.write.mock.calls.length - 1][0];
        expect(chunk.startsWith('event: history-updated\n')).toBe(true);
        const data = JSON.parse(chunk.split('\n')[1].slice('data: '.length));
        expect(data).toMatchObject({ sessionId: 's1', change: 'cleared', size: 0 });
        expect(typeof data.timestamp).toBe('string');
        service.removeClient(id);
    });

    it('drops clients when the request closes', () => {
        const { sink, request } = createClient();
        service.addClient(request, sink);

        closeHandlerOf(request)();

        expect(service.clientCount).toBe(0);
        expect(sink.end).toHaveBeenCalledTimes(1);
        expect(request.removeListener).toHaveBeenCalledWith('close', expect.any(Function));
    });

    it('drops clients whose stream fails', () => {
        const { sink, request } = createClient();
        service.addClient(request, sink);
        sink.write.mockImplementation(() => {
            throw new Error('socket closed');
        });

        service.emitHistoryUpdated({ sessionId: 's1', change: 'appended', size: 1 });

        expect(service.clientCount).toBe(0);
    });
});
