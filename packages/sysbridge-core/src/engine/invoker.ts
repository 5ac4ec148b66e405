import path from 'path';
import fs from 'fs-extra';
import { InputNotFoundError, ProcessExecutionError } from '../errors.js';
import { resolveSupportLibrary } from '../library/resolver.js';
import type { LibraryFetcher } from '../library/download.js';
import type { EngineConfig } from '../settings.js';
import type { CapturedOutput, RunOptions } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { locateEngineBinary } from './locator.js';
import { ExecaProcessRunner, type ProcessOutcome, type ProcessRunner } from './runner.js';

export interface InvokerDependencies {
    runner?: ProcessRunner;
    fetcher?: LibraryFetcher;
    locate?: (config: EngineConfig) => string;
}

/** Replaces undecodable bytes; only used for text the caller will read. */
const textDecoder = new TextDecoder('utf-8');

export function decodeText(bytes: Buffer): string {
    return textDecoder.decode(bytes);
}

/**
 * Builds the engine command line for one operation and runs it.
 */
export class CommandInvoker {
    private readonly runner: ProcessRunner;
    private readonly locate: (config: EngineConfig) => string;

    constructor(
        private readonly config: EngineConfig,
        private readonly deps: InvokerDependencies = {},
    ) {
        this.runner = deps.runner ?? new ExecaProcessRunner();
        this.locate = deps.locate ?? locateEngineBinary;
    }

    /** Run an operation whose stdout is text (JSON, summaries, XML, source). */
    async invokeText(inputPath: string, operationFlags: string[], options: RunOptions = {}): Promise<CapturedOutput<string>> {
        const outcome = await this.execute(inputPath, operationFlags, options);
        return { stdout: decodeText(outcome.stdout), stderr: decodeText(outcome.stderr), exitCode: 0 };
    }

    /** Run an operation whose stdout is an archive; the bytes are passed through untouched. */
    async invokeBinary(inputPath: string, operationFlags: string[], options: RunOptions = {}): Promise<CapturedOutput<Buffer>> {
        const outcome = await this.execute(inputPath, operationFlags, options);
        return { stdout: outcome.stdout, stderr: decodeText(outcome.stderr), exitCode: 0 };
    }

    /**
     * Flags that precede every operation: verbosity, then either --no-stdlib
     * or --stdlib-path. A library path is resolved (and possibly downloaded)
     * only when the library is enabled and none was given.
     */
    async buildGlobalFlags(options: RunOptions): Promise<string[]> {
        const flags: string[] = [];

        if (options.verbose ?? this.config.settings.verbose) {
            flags.push('--verbose');
        }

        if (options.stdlib === false) {
            if (options.stdlibPath !== undefined) {
                Logger.debug(`Standard library disabled; ignoring stdlibPath ${options.stdlibPath}`);
            }
            flags.push('--no-stdlib');
            return flags;
        }

        const library = await resolveSupportLibrary(this.config, {
            overridePath: options.stdlibPath,
            fetcher: this.deps.fetcher,
        });
        flags.push('--stdlib-path', library.path);
        return flags;
    }

    private async execute(inputPath: string, operationFlags: string[], options: RunOptions): Promise<ProcessOutcome> {
        const resolvedInput = path.resolve(this.config.cwd, inputPath);
        if (!(await fs.pathExists(resolvedInput))) {
            throw new InputNotFoundError(inputPath);
        }

        const binary = this.locate(this.config);
        const args = [...(await this.buildGlobalFlags(options)), ...operationFlags, resolvedInput];
        Logger.debug(`Running ${binary} ${args.join(' ')}`);

        const outcome = await this.runner.run({
            file: binary,
            args,
            cwd: this.config.cwd,
            timeoutMs: options.timeoutMs ?? this.config.settings.processTimeoutMs,
        });

        if (outcome.exitCode !== 0) {
            throw new ProcessExecutionError({
                exitCode: outcome.exitCode,
                signal: outcome.signal,
                stdout: decodeText(outcome.stdout),
                stderr: decodeText(outcome.stderr),
            });
        }
        return outcome;
    }
}
