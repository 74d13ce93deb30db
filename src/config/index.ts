import dotenv from 'dotenv';
import path from 'node:path';

const dotenvResult = dotenv.config();

if (dotenvResult.error && process.env.NODE_ENV !== 'test') {
    console.warn('[config] No .env file loaded, relying on process environment.');
}

const getEnvVar = (key: string, defaultValue = ''): string => {
    const value = process.env[key]?.trim();
    if (value === undefined || value === '') {
        return defaultValue;
    }
    return value;
};

const getBooleanEnvVar = (key: string, defaultValue: boolean): boolean => {
    const value = getEnvVar(key).toLowerCase();
    if (!value) {
        return defaultValue;
    }
    return ['1', 'true', 'yes', 'on'].includes(value);
};

const getNumberEnvVar = (key: string, defaultValue: number): number => {
    const parsed = Number.parseInt(getEnvVar(key), 10);
    return Number.isFinite(parsed) ? parsed : defaultValue;
};

export const CONFIG = {
    PORT: getNumberEnvVar('PORT', 3000),
    HOST: getEnvVar('HOST', '0.0.0.0'),
    MODEL: getEnvVar('MODEL', 'gemini-1.5-flash-latest'),
    // Checked in this order for Gemini models
    GEMINI_API_KEY:
        getEnvVar('GEMINI_API_KEY') ||
        getEnvVar('GOOGLE_GENERATIVE_AI_API_KEY') ||
        getEnvVar('GOOGLE_API_KEY'),
    OPENAI_API_KEY: getEnvVar('OPENAI_API_KEY'),
    HISTORY_FILE: path.resolve(process.cwd(), getEnvVar('HISTORY_FILE', 'history.json')),
    PERSIST_HISTORY: getBooleanEnvVar('PERSIST_HISTORY', false),
    TTS_ENABLED: getBooleanEnvVar('TTS_ENABLED', true),
    TTS_COMMAND: getEnvVar('TTS_COMMAND'),
    JSON_BODY_LIMIT: getEnvVar('JSON_BODY_LIMIT', '200mb'),
};

export type Config = typeof CONFIG;
