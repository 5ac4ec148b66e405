import { OutputParseError } from '../errors.js';
import {
    FilePayloadSchema,
    type FilePayload,
    type FileSymbols,
    type ModelSymbol,
    type SymbolPayload,
} from '../types/index.js';

export const UNKNOWN_FILE = 'unknown';
export const UNKNOWN_KIND = 'Unknown';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The engine output a payload was decoded from, carried on parse errors. */
export interface RawOutput {
    stdout: string;
    stderr: string;
}

function rawOutputOf(payload: unknown, raw?: RawOutput): RawOutput {
    return raw ?? { stdout: JSON.stringify(payload) ?? '', stderr: '' };
}

/**
 * The engine emits one of three top-level shapes for symbol output:
 * a list of files, `{ "files": [...] }`, or a single file object.
 * Collapse them into the list form.
 */
export function coerceFileList(payload: unknown, raw?: RawOutput): unknown[] {
    if (Array.isArray(payload)) return payload;
    const { stdout, stderr } = rawOutputOf(payload, raw);
    if (isRecord(payload)) {
        if ('files' in payload) {
            if (!Array.isArray(payload.files)) {
                throw new OutputParseError('Symbol payload "files" is not an array', stdout, stderr);
            }
            return payload.files;
        }
        return [payload];
    }
    throw new OutputParseError(`Unexpected symbol payload of type ${payload === null ? 'null' : typeof payload}`, stdout, stderr);
}

function toSymbol(entry: SymbolPayload, filePath: string): ModelSymbol {
    const name = entry.name ?? '';
    return Object.freeze({
        name,
        qualifiedName: entry.qualified_name ?? name,
        kind: entry.kind || UNKNOWN_KIND,
        file: filePath,
        startLine: entry.start_line ?? undefined,
        startCol: entry.start_col ?? undefined,
        endLine: entry.end_line ?? undefined,
        endCol: entry.end_col ?? undefined,
        supertypes: Object.freeze([...(entry.supertypes ?? [])]),
    });
}

function toFileSymbols(file: FilePayload): FileSymbols {
    const filePath = file.file ?? file.path ?? UNKNOWN_FILE;
    return Object.freeze({
        path: filePath,
        symbols: Object.freeze((file.symbols ?? []).map(entry => toSymbol(entry, filePath))),
    });
}

/**
 * Normalize decoded `--export-ast` JSON into per-file symbol records,
 * keeping the engine's file and symbol order. `raw` is the text the payload
 * was decoded from; errors carry it.
 */
export function normalizeSymbolPayload(payload: unknown, raw?: RawOutput): FileSymbols[] {
    return coerceFileList(payload, raw).map((entry, index) => {
        const parsed = FilePayloadSchema.safeParse(entry);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = [index, ...issue.path].join('.');
            const { stdout, stderr } = rawOutputOf(payload, raw);
            throw new OutputParseError(`Malformed symbol entry at ${where}: ${issue.message}`, stdout, stderr);
        }
        return toFileSymbols(parsed.data);
    });
}

/**
 * Decode the stdout of a symbol-extraction run and normalize it.
 */
export function parseSymbolOutput(stdout: string, stderr = ''): FileSymbols[] {
    let payload: unknown;
    try {
        payload = JSON.parse(stdout);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new OutputParseError(`Failed to parse AST JSON: ${reason}`, stdout, stderr, { cause: error });
    }
    return normalizeSymbolPayload(payload, { stdout, stderr });
}
