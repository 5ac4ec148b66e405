/**
 * EngineClient: typed operations over the syster command-line engine.
 * Each call runs exactly one engine process.
 */
import { OutputParseError } from '../errors.js';
import type { LibraryFetcher } from '../library/download.js';
import { parseAnalysisOutput } from '../parsing/output-parser.js';
import { parseSymbolOutput } from '../parsing/normalizer.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from '../settings.js';
import {
    JsonLdDocumentSchema,
    type AnalysisResult,
    type FileSymbols,
    type JsonLdDocument,
    type RoundtripFormat,
    type RunOptions,
} from '../types/index.js';
import { CommandInvoker } from './invoker.js';
import type { ProcessRunner } from './runner.js';

export interface EngineClientOptions extends EngineConfigOverrides {
    /** Replaces the execa-backed process runner. */
    runner?: ProcessRunner;
    /** Replaces the HTTPS archive download. */
    fetcher?: LibraryFetcher;
    locate?: (config: EngineConfig) => string;
}

export class EngineClient {
    readonly config: EngineConfig;
    private readonly invoker: CommandInvoker;

    constructor(options: EngineClientOptions = {}) {
        const { runner, fetcher, locate, ...overrides } = options;
        this.config = resolveEngineConfig(overrides);
        this.invoker = new CommandInvoker(this.config, { runner, fetcher, locate });
    }

    /**
     * Analyze a SysML v2 / KerML file or directory and report counts.
     */
    async analyze(inputPath: string, options?: RunOptions): Promise<AnalysisResult> {
        const { stdout, stderr } = await this.invoker.invokeText(inputPath, ['--json'], options);
        return parseAnalysisOutput(stdout, { stderr });
    }

    /**
     * Extract the symbols of every file, in engine order.
     */
    async getSymbols(inputPath: string, options?: RunOptions): Promise<FileSymbols[]> {
        const { stdout, stderr } = await this.invoker.invokeText(inputPath, ['--export-ast'], options);
        return parseSymbolOutput(stdout, stderr);
    }

    async exportXmi(inputPath: string, options?: RunOptions): Promise<string> {
        const { stdout } = await this.invoker.invokeText(inputPath, ['--export', 'xmi'], options);
        return stdout;
    }

    /**
     * Export to JSON-LD: either a list of elements or an object with `@graph`.
     */
    async exportJsonLd(inputPath: string, options?: RunOptions): Promise<JsonLdDocument> {
        const { stdout, stderr } = await this.invoker.invokeText(inputPath, ['--export', 'json-ld'], options);
        let decoded: unknown;
        try {
            decoded = JSON.parse(stdout);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new OutputParseError(`Failed to parse JSON-LD: ${reason}`, stdout, stderr, { cause: error });
        }
        const document = JsonLdDocumentSchema.safeParse(decoded);
        if (!document.success) {
            throw new OutputParseError('JSON-LD export is neither an array nor an object', stdout, stderr);
        }
        return document.data;
    }

    /**
     * Export to KPAR, a ZIP archive holding XMI and package metadata.
     * See `extractXmi` for reading it.
     */
    async exportKpar(inputPath: string, options?: RunOptions): Promise<Buffer> {
        const { stdout } = await this.invoker.invokeBinary(inputPath, ['--export', 'kpar'], options);
        return stdout;
    }

    /**
     * Import an interchange file (XMI, KPAR, JSON-LD) and validate it.
     */
    async importFile(inputPath: string, options?: RunOptions): Promise<AnalysisResult> {
        const { stdout, stderr } = await this.invoker.invokeText(inputPath, ['--import', '--json'], options);
        return parseAnalysisOutput(stdout, { stderr, allowImportSummary: true });
    }

    async importSymbols(inputPath: string, options?: RunOptions): Promise<FileSymbols[]> {
        const { stdout, stderr } = await this.invoker.invokeText(inputPath, ['--import', '--export-ast'], options);
        return parseSymbolOutput(stdout, stderr);
    }

    /**
     * Import an interchange file and re-export it in `format`, keeping element IDs.
     */
    async importExport(inputPath: string, format: RoundtripFormat, options?: RunOptions): Promise<Buffer> {
        const { stdout } = await this.invoker.invokeBinary(
            inputPath,
            ['--import-workspace', '--export', format],
            options,
        );
        return stdout;
    }

    /**
     * Turn an interchange file back into SysML text.
     */
    async decompile(inputPath: string, options?: RunOptions): Promise<string> {
        const { stdout } = await this.invoker.invokeText(inputPath, ['--decompile'], options);
        return stdout;
    }
}

export function createEngineClient(options?: EngineClientOptions): EngineClient {
    return new EngineClient(options);
}
