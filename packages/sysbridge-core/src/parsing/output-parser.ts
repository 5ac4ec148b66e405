import { OutputParseError } from '../errors.js';
import { AnalysisPayloadSchema, type AnalysisResult, type Diagnostic } from '../types/index.js';

/** "✓ Analyzed 3 files: 42 symbols, 0 warnings" */
export const ANALYSIS_SUMMARY_PATTERN = /Analyzed (\d+) files?: (\d+) symbols?/;

/** "Imported 12 elements, 7 relationships" */
export const IMPORT_SUMMARY_PATTERN = /Imported (\d+) elements?, (\d+) relationships?/;

export interface ParseOutputOptions {
    stderr?: string;
    /** Accept the import summary line (import operations only). */
    allowImportSummary?: boolean;
}

export function createAnalysisResult(fields: Partial<AnalysisResult> & Pick<AnalysisResult, 'fileCount' | 'symbolCount'>): AnalysisResult {
    return Object.freeze({
        fileCount: fields.fileCount,
        symbolCount: fields.symbolCount,
        errorCount: fields.errorCount ?? 0,
        warningCount: fields.warningCount ?? 0,
        diagnostics: Object.freeze([...(fields.diagnostics ?? [])]),
    });
}

type JsonDecode = { ok: true; value: unknown } | { ok: false };

function tryDecodeJson(text: string): JsonDecode {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

/**
 * Counts must survive as exact integers; anything past 2^53 - 1 would be rounded.
 */
function parseCount(digits: string, stdout: string, stderr: string): number {
    const count = parseInt(digits, 10);
    if (!Number.isSafeInteger(count)) {
        throw new OutputParseError(`Count ${digits} in engine output exceeds the exact integer range`, stdout, stderr);
    }
    return count;
}

/**
 * Turn the stdout of an analysis or import run into counts.
 *
 * JSON is tried first. The summary-line patterns are consulted only when the
 * text is not JSON at all; a JSON payload of the wrong shape is an error.
 */
export function parseAnalysisOutput(stdout: string, options: ParseOutputOptions = {}): AnalysisResult {
    const stderr = options.stderr ?? '';
    const decoded = tryDecodeJson(stdout.trim());

    if (decoded.ok) {
        const payload = AnalysisPayloadSchema.safeParse(decoded.value);
        if (!payload.success) {
            const reason = payload.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ` : '') + i.message).join('; ');
            throw new OutputParseError(`Unexpected JSON from engine (${reason}): ${stdout}`, stdout, stderr);
        }
        const diagnostics: Diagnostic[] = payload.data.diagnostics ?? [];
        return createAnalysisResult({
            fileCount: payload.data.file_count ?? 0,
            symbolCount: payload.data.symbol_count ?? 0,
            errorCount: payload.data.error_count,
            warningCount: payload.data.warning_count,
            diagnostics,
        });
    }

    const summary = ANALYSIS_SUMMARY_PATTERN.exec(stdout);
    if (summary) {
        return createAnalysisResult({
            fileCount: parseCount(summary[1], stdout, stderr),
            symbolCount: parseCount(summary[2], stdout, stderr),
        });
    }

    if (options.allowImportSummary) {
        const imported = IMPORT_SUMMARY_PATTERN.exec(stdout);
        if (imported) {
            return createAnalysisResult({
                fileCount: 1,
                symbolCount: parseCount(imported[1], stdout, stderr),
            });
        }
    }

    const detail = stderr.trim() ? `${stdout}\n${stderr}` : stdout;
    throw new OutputParseError(`Could not parse engine output: ${detail}`, stdout, stderr);
}
