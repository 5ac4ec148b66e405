import { describe, expect, it } from 'vitest';
import { OutputParseError } from '../errors.js';
import { ANALYSIS_SUMMARY_PATTERN, parseAnalysisOutput } from './output-parser.js';

describe('summary pattern', () => {
    it('matches a single file', () => {
        const match = ANALYSIS_SUMMARY_PATTERN.exec('✓ Analyzed 1 file: 42 symbols, 0 warnings');
        expect(match?.[1]).toBe('1');
        expect(match?.[2]).toBe('42');
    });

    it('matches multiple files', () => {
        const match = ANALYSIS_SUMMARY_PATTERN.exec('✓ Analyzed 10 files: 123 symbols, 0 warnings');
        expect(match?.[1]).toBe('10');
        expect(match?.[2]).toBe('123');
    });

    it('matches a singular symbol count', () => {
        const match = ANALYSIS_SUMMARY_PATTERN.exec('Analyzed 2 files: 1 symbol');
        expect(match?.[2]).toBe('1');
    });
});

describe('parseAnalysisOutput', () => {
    it('reads counts from JSON verbatim', () => {
        const diagnostics = [{ file: 'test.sysml', line: 1, message: 'unresolved reference' }];
        const stdout = JSON.stringify({
            file_count: 3,
            symbol_count: 17,
            error_count: 1,
            warning_count: 2,
            diagnostics,
        });

        expect(parseAnalysisOutput(stdout)).toEqual({
            fileCount: 3,
            symbolCount: 17,
            errorCount: 1,
            warningCount: 2,
            diagnostics,
        });
    });

    it('defaults absent JSON fields', () => {
        const result = parseAnalysisOutput('{"file_count": 1, "symbol_count": 5}\n');
        expect(result).toEqual({ fileCount: 1, symbolCount: 5, errorCount: 0, warningCount: 0, diagnostics: [] });
    });

    it('returns a frozen result', () => {
        const result = parseAnalysisOutput('{"file_count": 1, "symbol_count": 5}');
        expect(Object.isFrozen(result)).toBe(true);
        expect(Object.isFrozen(result.diagnostics)).toBe(true);
    });

    it('falls back to the summary line', () => {
        expect(parseAnalysisOutput('✓ Analyzed 1 file: 42 symbols, 0 warnings')).toEqual({
            fileCount: 1,
            symbolCount: 42,
            errorCount: 0,
            warningCount: 0,
            diagnostics: [],
        });
        const large = parseAnalysisOutput('✓ Analyzed 999 files: 12345 symbols, 5 warnings');
        expect(large.fileCount).toBe(999);
        expect(large.symbolCount).toBe(12345);
    });

    it('accepts the import summary only when asked', () => {
        const stdout = 'Imported 12 elements, 7 relationships';

        const result = parseAnalysisOutput(stdout, { allowImportSummary: true });
        expect(result.fileCount).toBe(1);
        expect(result.symbolCount).toBe(12);

        expect(() => parseAnalysisOutput(stdout)).toThrow(OutputParseError);
    });

    it('accepts the singular import summary', () => {
        const result = parseAnalysisOutput('Imported 1 element, 0 relationships', { allowImportSummary: true });
        expect(result.symbolCount).toBe(1);
    });

    it('raises a parse error carrying the raw output', () => {
        let caught: unknown;
        try {
            parseAnalysisOutput('Some unexpected output', { stderr: 'note: nothing to do' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(OutputParseError);
        expect(caught).toMatchObject({
            kind: 'output-parse',
            stdout: 'Some unexpected output',
            stderr: 'note: nothing to do',
            message: 'Could not parse engine output: Some unexpected output\nnote: nothing to do',
        });
    });

    it('does not fall back to the summary when JSON has the wrong shape', () => {
        const stdout = JSON.stringify({ message: 'Analyzed 1 file: 42 symbols' });
        expect(() => parseAnalysisOutput(stdout)).toThrow(OutputParseError);
    });

    it('rejects negative or fractional counts', () => {
        expect(() => parseAnalysisOutput('{"file_count": -1, "symbol_count": 0}')).toThrow(OutputParseError);
        expect(() => parseAnalysisOutput('{"file_count": 1.5, "symbol_count": 0}')).toThrow(OutputParseError);
    });

    it('rejects JSON that is not an object', () => {
        expect(() => parseAnalysisOutput('[1, 2, 3]')).toThrow(OutputParseError);
        expect(() => parseAnalysisOutput('42')).toThrow(OutputParseError);
    });

    it('rejects counts beyond the exact integer range', () => {
        const summary = '✓ Analyzed 1 file: 9007199254740993 symbols';

        expect(() => parseAnalysisOutput(summary, { stderr: 'note' })).toThrow(OutputParseError);
        expect(() => parseAnalysisOutput(summary, { stderr: 'note' })).toThrow(
            'Count 9007199254740993 in engine output exceeds the exact integer range',
        );
        expect(() => parseAnalysisOutput('Imported 9007199254740993 elements, 1 relationship', { allowImportSummary: true }))
            .toThrow(OutputParseError);
        expect(() => parseAnalysisOutput('{"file_count": 1, "symbol_count": 9007199254740993}')).toThrow(OutputParseError);
        expect(parseAnalysisOutput('Analyzed 1 file: 9007199254740991 symbols').symbolCount).toBe(9007199254740991);
    });

    it('does not accept locale-formatted numbers', () => {
        expect(() => parseAnalysisOutput('Analyzed 1,000 files: 5 symbols')).toThrow(OutputParseError);
    });
});
