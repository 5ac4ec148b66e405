export * from './types/index.js';
export * from './errors.js';
export * from './utils/logger.js';
// Engine operations
export { EngineClient, createEngineClient } from './engine/client.js';
export type { EngineClientOptions } from './engine/client.js';
export { CommandInvoker } from './engine/invoker.js';
export { locateEngineBinary } from './engine/locator.js';
export { ExecaProcessRunner } from './engine/runner.js';
export type { ProcessRunner, ProcessRequest, ProcessOutcome } from './engine/runner.js';
// Output handling
export { parseAnalysisOutput, ANALYSIS_SUMMARY_PATTERN, IMPORT_SUMMARY_PATTERN } from './parsing/output-parser.js';
export { normalizeSymbolPayload, parseSymbolOutput } from './parsing/normalizer.js';
export { readKparEntries, extractXmi } from './parsing/kpar.js';
export type { KparEntry, KparXmi } from './parsing/kpar.js';
// Standard library (sysml.library) resolution and cache
export { resolveSupportLibrary } from './library/resolver.js';
export type { ResolvedLibrary, LibrarySource, ResolveLibraryOptions } from './library/resolver.js';
export { ensureCachedLibrary, isLibraryCached, fetchArchive } from './library/download.js';
export type { LibraryFetcher } from './library/download.js';
// Settings (~/.sysbridge/settings.json)
export {
    resolveEngineConfig,
    loadSettings,
    getSettingsPath,
    EngineSettingsSchema,
    ENGINE_BINARY,
    STDLIB_ENV_VAR,
    STDLIB_DIRNAME,
} from './settings.js';
export type { EngineConfig, EngineConfigOverrides, EngineSettings } from './settings.js';
