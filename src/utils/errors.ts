import { BadRequestError, HttpError, NotFoundError } from 'routing-controllers';

export class ConfigurationError extends HttpError {
    constructor(message = 'Inference model not configured. Set GEMINI_API_KEY or OPENAI_API_KEY in the environment or .env file.') {
        super(503, message);
        this.name = 'ConfigurationError';
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export class MissingInputError extends BadRequestError {
    constructor(message: string) {
        super(message);
        this.name = 'MissingInputError';
        Object.setPrototypeOf(this, MissingInputError.prototype);
    }
}

export class ValidationError extends BadRequestError {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export class DecodeError extends HttpError {
    constructor(message = 'Could not decode image. Upload a valid JPG/PNG.') {
        super(415, message);
        this.name = 'DecodeError';
        Object.setPrototypeOf(this, DecodeError.prototype);
    }
}

export class SendInProgressError extends HttpError {
    constructor() {
        super(409, 'A question is already being answered for this session.');
        this.name = 'SendInProgressError';
        Object.setPrototypeOf(this, SendInProgressError.prototype);
    }
}

export class SessionNotFoundError extends NotFoundError {
    constructor(sessionId: string) {
        super(`Session ${sessionId} not found`);
        this.name = 'SessionNotFoundError';
        Object.setPrototypeOf(this, SessionNotFoundError.prototype);
    }
}

export class EntryNotFoundError extends NotFoundError {
    constructor(message: string) {
        super(message);
        this.name = 'EntryNotFoundError';
        Object.setPrototypeOf(this, EntryNotFoundError.prototype);
    }
}

export class SpeechUnavailableError extends HttpError {
    constructor() {
        super(503, 'TTS engine not available. Install espeak (or set TTS_COMMAND) to enable offline TTS.');
        this.name = 'SpeechUnavailableError';
        Object.setPrototypeOf(this, SpeechUnavailableError.prototype);
    }
}

// Never sent to clients directly: reported as a warning next to the result.
export class IoError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'IoError';
    }
}

// Captured into the entry's answer text.
export class InferenceError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'InferenceError';
    }
}

export function formatError(error: unknown): string {
    if (typeof error === 'string') {
        return error;
    }
    if (error && typeof error === 'object' && 'message' in error) {
        return String(error.message || 'unknown error');
    }
    return 'unknown error';
}
