/**
 * Error taxonomy for engine invocations.
 *
 * Every failure carries a `kind` discriminant so callers can branch with a
 * `switch` instead of matching on message text.
 */

export type SysbridgeErrorKind =
    | 'input-not-found'
    | 'binary-not-found'
    | 'dependency-fetch'
    | 'process-execution'
    | 'output-parse'
    | 'timeout';

export abstract class SysbridgeError extends Error {
    abstract readonly kind: SysbridgeErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The input file or directory handed to an operation does not exist. */
export class InputNotFoundError extends SysbridgeError {
    readonly kind = 'input-not-found' as const;

    constructor(readonly inputPath: string) {
        super(`Input path does not exist: ${inputPath}`);
    }
}

/** The engine binary is not on PATH, or could not be started. */
export class BinaryNotFoundError extends SysbridgeError {
    readonly kind = 'binary-not-found' as const;

    constructor(readonly binaryName: string, message?: string, options?: { cause?: unknown }) {
        super(message ?? `${binaryName} not found on PATH. Install with: cargo install syster-cli`, options);
    }
}

/** The standard library archive could not be downloaded or unpacked. */
export class DependencyFetchError extends SysbridgeError {
    readonly kind = 'dependency-fetch' as const;

    constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export interface ProcessFailureDetails {
    exitCode: number | null;
    signal?: string;
    stdout: string;
    stderr: string;
}

/** The engine ran and exited unsuccessfully. */
export class ProcessExecutionError extends SysbridgeError {
    readonly kind = 'process-execution' as const;
    readonly exitCode: number | null;
    readonly signal?: string;
    readonly stdout: string;
    readonly stderr: string;

    constructor(details: ProcessFailureDetails) {
        const diagnostic = details.stderr.trim() || details.stdout.trim();
        const status = details.exitCode !== null
            ? `exit code ${details.exitCode}`
            : `signal ${details.signal ?? 'unknown'}`;
        super(`Engine failed with ${status}: ${diagnostic}`);
        this.exitCode = details.exitCode;
        this.signal = details.signal;
        this.stdout = details.stdout;
        this.stderr = details.stderr;
    }
}

/** The engine succeeded but its output had no recognizable shape. */
export class OutputParseError extends SysbridgeError {
    readonly kind = 'output-parse' as const;

    constructor(message: string, readonly stdout: string, readonly stderr = '', options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** The engine did not finish within the allotted time and was killed. */
export class TimeoutError extends SysbridgeError {
    readonly kind = 'timeout' as const;

    constructor(readonly command: string, readonly timeoutMs: number) {
        super(`Engine timed out after ${timeoutMs / 1000}s: ${command}`);
    }
}

export function isSysbridgeError(value: unknown): value is SysbridgeError {
    return value instanceof SysbridgeError;
}
