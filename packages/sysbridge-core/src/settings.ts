import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import { z } from 'zod';
import { Logger, parseLogLevel } from './utils/logger.js';

export const ENGINE_BINARY = 'syster';
export const STDLIB_ENV_VAR = 'SYSTER_STDLIB_PATH';
export const STDLIB_DIRNAME = 'sysml.library';
export const DEFAULT_LIBRARY_VERSION = '2024-12';

/**
 * Schema for ~/.sysbridge/settings.json.
 */
export const EngineSettingsSchema = z.object({
    binaryName: z.string().min(1).default(ENGINE_BINARY),
    libraryVersion: z.string().min(1).default(DEFAULT_LIBRARY_VERSION),
    libraryArchiveUrl: z.string().url().optional(),
    libraryArchiveSha256: z.string().regex(/^[a-f0-9]{64}$/i).optional(),
    processTimeoutMs: z.number().int().positive().default(60_000),
    downloadTimeoutMs: z.number().int().positive().default(120_000),
    verbose: z.boolean().default(false),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;

/**
 * Everything the locator, resolver and invoker read from the outside world.
 * Built once and passed down explicitly so none of them touch process.env,
 * process.cwd() or the home directory on their own.
 */
export interface EngineConfig {
    settings: EngineSettings;
    env: Readonly<Record<string, string | undefined>>;
    cwd: string;
    homeDir: string;
    /** Versioned per-user cache for the downloaded standard library. */
    cacheDir: string;
    /** `sysml.library` beside the repository this package is installed from. */
    devLibraryPath: string;
}

export interface EngineConfigOverrides {
    settings?: EngineSettingsInput;
    env?: Readonly<Record<string, string | undefined>>;
    cwd?: string;
    homeDir?: string;
    cacheDir?: string;
    devLibraryPath?: string;
}

/**
 * Get the settings file path: ~/.sysbridge/settings.json
 */
export function getSettingsPath(homeDir = os.homedir()): string {
    return path.join(homeDir, '.sysbridge', 'settings.json');
}

/**
 * Load settings from ~/.sysbridge/settings.json.
 * Returns defaults if the file is missing or malformed.
 */
export function loadSettings(homeDir = os.homedir()): EngineSettingsInput {
    const settingsPath = getSettingsPath(homeDir);

    try {
        if (!fs.existsSync(settingsPath)) {
            Logger.debug(`Settings file not found at ${settingsPath}`);
            return {};
        }

        const raw: unknown = fs.readJsonSync(settingsPath);
        const parsed = EngineSettingsSchema.safeParse(raw);
        if (!parsed.success) {
            Logger.warn(`Invalid settings in ${settingsPath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
            return {};
        }
        Logger.debug(`Settings loaded from ${settingsPath}`);
        return parsed.data;
    } catch (error) {
        if (error instanceof SyntaxError) {
            Logger.warn(`Malformed JSON in ${settingsPath}: ${error.message}`);
        } else if (error instanceof Error) {
            Logger.warn(`Failed to read settings from ${settingsPath}: ${error.message}`);
        } else {
            Logger.warn(`Failed to read settings from ${settingsPath}`);
        }
        return {};
    }
}

function getCacheRoot(homeDir: string): string {
    return path.join(homeDir, '.sysbridge');
}

export function getLibraryCacheDir(homeDir: string, version: string): string {
    return path.join(getCacheRoot(homeDir), 'stdlib', version, STDLIB_DIRNAME);
}

export function getLibraryArchiveUrl(settings: EngineSettings): string {
    return settings.libraryArchiveUrl
        ?? `https://github.com/Systems-Modeling/SysML-v2-Release/archive/refs/tags/${settings.libraryVersion}.zip`;
}

function defaultDevLibraryPath(): string {
    // src/settings.ts -> packages/sysbridge-core -> packages -> repository root
    const here = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(here, '..', '..', '..', STDLIB_DIRNAME);
}

/**
 * Build the engine configuration from the process environment, merging the
 * settings file with explicit overrides (overrides win).
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
    const homeDir = overrides.homeDir ?? os.homedir();
    const settings = EngineSettingsSchema.parse({
        ...loadSettings(homeDir),
        ...overrides.settings,
    });

    if (settings.logLevel) {
        const level = parseLogLevel(settings.logLevel);
        if (level !== undefined) Logger.setLevel(level);
    }

    return {
        settings,
        env: overrides.env ?? process.env,
        cwd: overrides.cwd ?? process.cwd(),
        homeDir,
        cacheDir: overrides.cacheDir ?? getLibraryCacheDir(homeDir, settings.libraryVersion),
        devLibraryPath: overrides.devLibraryPath ?? defaultDevLibraryPath(),
    };
}
