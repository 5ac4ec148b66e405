import { z } from 'zod';

/**
 * A single engine diagnostic. The engine's diagnostic records are passed
 * through as decoded JSON objects.
 */
export type Diagnostic = Readonly<Record<string, unknown>>;

export interface AnalysisResult {
    readonly fileCount: number;
    readonly symbolCount: number;
    readonly errorCount: number;
    readonly warningCount: number;
    readonly diagnostics: readonly Diagnostic[];
}

export interface ModelSymbol {
    /** Simple name, e.g. "Car". */
    readonly name: string;
    /** Fully qualified name, e.g. "Vehicles::Car". */
    readonly qualifiedName: string;
    /** Element kind as reported by the engine: "Package", "PartDef", "PartUsage", ... */
    readonly kind: string;
    readonly file?: string;
    /** 1-based positions. */
    readonly startLine?: number;
    readonly startCol?: number;
    readonly endLine?: number;
    readonly endCol?: number;
    readonly supertypes: readonly string[];
}

export interface FileSymbols {
    readonly path: string;
    /** In engine emission order. */
    readonly symbols: readonly ModelSymbol[];
}

export type JsonLdDocument = unknown[] | Record<string, unknown>;

export type ExportFormat = 'xmi' | 'json-ld' | 'kpar';

/** Roundtrip spells JSON-LD without the hyphen; that is the engine's flag value. */
export type RoundtripFormat = 'xmi' | 'kpar' | 'jsonld';

export type TransportMode = 'text' | 'binary';

/**
 * Per-call options shared by every operation.
 */
export interface RunOptions {
    /** Pass --verbose to the engine. Falls back to the `verbose` setting. */
    verbose?: boolean;
    /** Load the standard library (default: true). */
    stdlib?: boolean;
    /** Explicit standard library directory; skips resolution and download. */
    stdlibPath?: string;
    /** Kill the engine after this many milliseconds. */
    timeoutMs?: number;
}

export interface CapturedOutput<TStdout extends string | Buffer> {
    stdout: TStdout;
    stderr: string;
    exitCode: number;
}

// Wire schemas for the engine's JSON payloads (snake_case, as emitted).

const Count = z.number().int().nonnegative().safe();
const Position = z.number().int().nullish();

export const DiagnosticSchema = z.record(z.unknown());

export const AnalysisPayloadSchema = z.object({
    file_count: Count.optional(),
    symbol_count: Count.optional(),
    error_count: Count.optional(),
    warning_count: Count.optional(),
    diagnostics: z.array(DiagnosticSchema).optional(),
}).refine(
    payload => payload.file_count !== undefined || payload.symbol_count !== undefined,
    { message: 'payload carries neither file_count nor symbol_count' },
);

// The engine writes absent optional fields as null; both read as missing.
export const SymbolPayloadSchema = z.object({
    name: z.string().nullish(),
    qualified_name: z.string().nullish(),
    kind: z.string().nullish(),
    start_line: Position,
    start_col: Position,
    end_line: Position,
    end_col: Position,
    supertypes: z.array(z.string()).nullish(),
});

export const FilePayloadSchema = z.object({
    file: z.string().nullish(),
    path: z.string().nullish(),
    symbols: z.array(SymbolPayloadSchema).nullish(),
});

export const JsonLdDocumentSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;
export type SymbolPayload = z.infer<typeof SymbolPayloadSchema>;
export type FilePayload = z.infer<typeof FilePayloadSchema>;
