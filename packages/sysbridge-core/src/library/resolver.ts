import path from 'path';
import fs from 'fs-extra';
import { Logger } from '../utils/logger.js';
import { STDLIB_DIRNAME, STDLIB_ENV_VAR, getLibraryArchiveUrl, type EngineConfig } from '../settings.js';
import { ensureCachedLibrary, isLibraryCached, type LibraryFetcher } from './download.js';

export type LibrarySource = 'override' | 'environment' | 'cache' | 'working-directory' | 'development' | 'download';

export interface ResolvedLibrary {
    path: string;
    source: LibrarySource;
}

export interface ResolveLibraryOptions {
    /** Caller-supplied library directory; wins over every other source. */
    overridePath?: string;
    fetcher?: LibraryFetcher;
    onProgress?: (message: string) => void;
}

async function isDirectory(candidate: string): Promise<boolean> {
    try {
        return (await fs.stat(candidate)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Find the standard library directory the engine should load.
 *
 * Search order: explicit override, SYSTER_STDLIB_PATH, the per-user cache,
 * ./sysml.library, the repository checkout this package lives in. When all
 * of them miss, the library is downloaded into the cache.
 */
export async function resolveSupportLibrary(
    config: EngineConfig,
    options: ResolveLibraryOptions = {},
): Promise<ResolvedLibrary> {
    if (options.overridePath !== undefined) {
        return found(path.resolve(config.cwd, options.overridePath), 'override');
    }

    const fromEnv = config.env[STDLIB_ENV_VAR];
    if (fromEnv) {
        const envPath = path.resolve(config.cwd, fromEnv);
        if (await isDirectory(envPath)) {
            return found(envPath, 'environment');
        }
        Logger.warn(`${STDLIB_ENV_VAR} points to ${envPath}, which is not a directory; ignoring it`);
    }

    if (await isLibraryCached(config.cacheDir)) {
        return found(config.cacheDir, 'cache');
    }

    const local = path.join(config.cwd, STDLIB_DIRNAME);
    if (await isDirectory(local)) {
        return found(local, 'working-directory');
    }

    if (await isDirectory(config.devLibraryPath)) {
        return found(config.devLibraryPath, 'development');
    }

    const downloaded = await ensureCachedLibrary({
        cacheDir: config.cacheDir,
        url: getLibraryArchiveUrl(config.settings),
        timeoutMs: config.settings.downloadTimeoutMs,
        sha256: config.settings.libraryArchiveSha256,
        fetcher: options.fetcher,
        onProgress: options.onProgress ?? (message => Logger.info(message)),
    });
    return found(downloaded, 'download');
}

function found(libraryPath: string, source: LibrarySource): ResolvedLibrary {
    Logger.debug(`Using ${STDLIB_DIRNAME} from ${source}: ${libraryPath}`);
    return { path: libraryPath, source };
}
