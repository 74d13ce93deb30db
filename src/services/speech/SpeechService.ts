import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { Service } from 'typedi';
import { CONFIG } from '../../config';
import { SpeechUnavailableError } from '../../utils/errors';

export interface SpeechOptions {
    enabled?: boolean;
    command?: string;
}

/**
 * Best-effort offline speech. Whether an engine exists is decided once, when
 * the service is constructed; callers check `available` instead of probing.
 */
@Service()
export class SpeechService {
    readonly available: boolean;

    private readonly executable?: string;

    constructor(options: SpeechOptions = {}) {
        const enabled = options.enabled ?? CONFIG.TTS_ENABLED;
        const command = options.command || CONFIG.TTS_COMMAND || defaultCommand();

        this.executable = enabled && command ? findExecutable(command) : undefined;
        this.available = this.executable !== undefined;

        if (!this.available) {
            console.warn(`[SpeechService] Speech playback unavailable (command: ${command || 'none'})`);
        }
    }

    speak(text: string): Promise<void> {
        const executable = this.executable;
        if (!executable) {
            return Promise.reject(new SpeechUnavailableError());
        }

        // Text goes over stdin: answers often start with "- ", which an engine would parse as an option.
        return new Promise((resolve, reject) => {
            const proc = spawn(executable, stdinArgs(executable), { stdio: ['pipe', 'ignore', 'ignore'] });

            proc.on('error', reject);
            proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
                // The engine may exit before reading everything; its exit code decides the outcome.
                if (error.code !== 'EPIPE') {
                    reject(error);
                }
            });
            proc.stdin.end(text);
            proc.on('close', (code) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(new Error(`${path.basename(executable)} exited with code ${code}`));
                }
            });
        });
    }
}

// espeak speaks its arguments unless told to read stdin; say and most others read stdin when given none.
function stdinArgs(executable: string): string[] {
    const name = path.basename(executable);
    return name === 'espeak' || name === 'espeak-ng' ? ['--stdin'] : [];
}

function defaultCommand(): string | undefined {
    switch (process.platform) {
        case 'darwin':
            return 'say';
        case 'win32':
            return undefined;
        default:
            return 'espeak';
    }
}

function findExecutable(command: string): string | undefined {
    if (command.includes(path.sep)) {
        return isExecutable(command) ? path.resolve(command) : undefined;
    }

    const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
        const candidate = path.join(dir, command);
        if (isExecutable(candidate)) {
            return candidate;
        }
    }
    return undefined;
}

function isExecutable(filePath: string): boolean {
    try {
        fs.accessSync(filePath, fs.constants.X_OK);
        return fs.statSync(filePath).isFile();
    } catch {
        return false;
    }
}
