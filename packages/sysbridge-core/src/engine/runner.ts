import { execa } from 'execa';
import { BinaryNotFoundError, TimeoutError } from '../errors.js';

export interface ProcessRequest {
    file: string;
    args: string[];
    cwd: string;
    timeoutMs: number;
}

/**
 * Everything a finished engine process produced. `exitCode` is null when the
 * process was terminated by a signal.
 */
export interface ProcessOutcome {
    stdout: Buffer;
    stderr: Buffer;
    exitCode: number | null;
    signal?: string;
}

/**
 * Runs one engine process to completion.
 *
 * Implementations throw TimeoutError when the deadline passes and
 * BinaryNotFoundError when the process cannot be started. Any exit code,
 * zero or not, is returned rather than thrown.
 */
export interface ProcessRunner {
    run(request: ProcessRequest): Promise<ProcessOutcome>;
}

const MAX_BUFFER = 256 * 1024 * 1024;

function toBuffer(value: unknown): Buffer {
    if (Buffer.isBuffer(value)) return value;
    if (typeof value === 'string') return Buffer.from(value, 'utf8');
    return Buffer.alloc(0);
}

export class ExecaProcessRunner implements ProcessRunner {
    async run(request: ProcessRequest): Promise<ProcessOutcome> {
        const result = await execa(request.file, request.args, {
            cwd: request.cwd,
            encoding: 'buffer',
            reject: false,
            timeout: request.timeoutMs,
            maxBuffer: MAX_BUFFER,
            stripFinalNewline: false,
            windowsHide: true,
        });

        if (result.timedOut) {
            throw new TimeoutError([request.file, ...request.args].join(' '), request.timeoutMs);
        }

        const stdout = toBuffer(result.stdout);
        const stderr = toBuffer(result.stderr);

        if (typeof result.exitCode === 'number') {
            return { stdout, stderr, exitCode: result.exitCode };
        }
        if (result.signal) {
            return { stdout, stderr, exitCode: null, signal: result.signal };
        }

        // No exit code and no signal: the process never started.
        const cause = result instanceof Error ? result : undefined;
        throw new BinaryNotFoundError(
            request.file,
            `Failed to execute ${request.file}: ${cause?.message ?? 'process could not be started'}`,
            { cause },
        );
    }
}
