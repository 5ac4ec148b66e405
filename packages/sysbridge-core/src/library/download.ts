/**
 * Standard library cache: downloads the versioned SysML v2 release archive
 * once and unpacks its sysml.library subtree under ~/.sysbridge/stdlib/.
 */
import path from 'path';
import fs from 'fs-extra';
import { createHash } from 'crypto';
import { DependencyFetchError } from '../errors.js';
import { STDLIB_DIRNAME } from '../settings.js';
import { readZipEntries, readZipEntryData } from './archive.js';

/**
 * Fetch the archive at `url` and return its bytes. Must honour `signal`.
 */
export type LibraryFetcher = (url: string, init: { signal: AbortSignal }) => Promise<Buffer>;

export interface CachedLibraryOptions {
    cacheDir: string;
    url: string;
    timeoutMs: number;
    /** Expected hex digest of the archive; skipped when absent. */
    sha256?: string;
    fetcher?: LibraryFetcher;
    onProgress?: (message: string) => void;
}

export const fetchArchive: LibraryFetcher = async (url, { signal }) => {
    const response = await fetch(url, { signal });
    if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    return Buffer.from(await response.arrayBuffer());
};

/**
 * A cache directory counts as present only when it exists and has content.
 */
export async function isLibraryCached(cacheDir: string): Promise<boolean> {
    try {
        const stat = await fs.stat(cacheDir);
        if (!stat.isDirectory()) return false;
        const entries = await fs.readdir(cacheDir);
        return entries.length > 0;
    } catch {
        return false;
    }
}

export function hashSha256(data: Buffer): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Path of an archive entry relative to its sysml.library directory, or null
 * when the entry lies outside that subtree.
 */
export function libraryRelativePath(entryName: string): string | null {
    const segments = entryName.split('/');
    const rootIndex = segments.indexOf(STDLIB_DIRNAME);
    if (rootIndex === -1) return null;

    const relative = segments.slice(rootIndex + 1).filter(Boolean);
    if (relative.length === 0) return null;
    if (relative.some(segment => segment === '..' || segment === '.' || segment.includes('\\'))) {
        throw new Error(`Archive entry escapes the library directory: ${entryName}`);
    }
    return relative.join('/');
}

/**
 * Unpack the sysml.library subtree of `archive` into `destDir`.
 * Returns the number of files written.
 */
export async function extractLibraryTree(archive: Buffer, destDir: string): Promise<number> {
    let written = 0;
    for (const entry of readZipEntries(archive)) {
        const relative = libraryRelativePath(entry.name);
        if (relative === null) continue;

        const target = path.join(destDir, ...relative.split('/'));
        if (entry.name.endsWith('/')) {
            await fs.ensureDir(target);
            continue;
        }
        await fs.ensureDir(path.dirname(target));
        await fs.writeFile(target, readZipEntryData(archive, entry));
        written += 1;
    }
    return written;
}

/**
 * Ensure the standard library is in `cacheDir`, downloading it if needed.
 *
 * The archive is unpacked into a private staging directory and renamed into
 * place, so a reader either sees no cache or a complete one. If a concurrent
 * download wins the rename, this one discards its copy.
 */
export async function ensureCachedLibrary(options: CachedLibraryOptions): Promise<string> {
    const { cacheDir, url, timeoutMs } = options;
    const fetcher = options.fetcher ?? fetchArchive;

    if (await isLibraryCached(cacheDir)) {
        return cacheDir;
    }

    options.onProgress?.(`Downloading ${STDLIB_DIRNAME} from ${url}...`);

    let archive: Buffer;
    try {
        archive = await fetcher(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
        const reason = isAbortTimeout(error) ? `timed out after ${timeoutMs / 1000}s` : describeError(error);
        throw new DependencyFetchError(url, `Failed to download ${STDLIB_DIRNAME} from ${url}: ${reason}`, { cause: error });
    }

    if (options.sha256) {
        const actual = hashSha256(archive);
        if (actual !== options.sha256.toLowerCase()) {
            throw new DependencyFetchError(url, `Checksum mismatch for ${url}: expected ${options.sha256}, got ${actual}`);
        }
    }

    const parentDir = path.dirname(cacheDir);
    let stagingDir: string | undefined;

    try {
        await fs.ensureDir(parentDir);
        stagingDir = await fs.mkdtemp(path.join(parentDir, `.${path.basename(cacheDir)}-`));
        const files = await extractLibraryTree(archive, stagingDir);
        if (files === 0) {
            throw new DependencyFetchError(url, `Archive from ${url} contains no ${STDLIB_DIRNAME} directory`);
        }
        await promoteStagingDir(stagingDir, cacheDir);
    } catch (error) {
        if (stagingDir !== undefined) await fs.remove(stagingDir);
        if (error instanceof DependencyFetchError) throw error;
        throw new DependencyFetchError(url, `Failed to unpack ${STDLIB_DIRNAME}: ${describeError(error)}`, { cause: error });
    }

    options.onProgress?.(`${STDLIB_DIRNAME} ready at ${cacheDir}`);
    return cacheDir;
}

async function promoteStagingDir(stagingDir: string, cacheDir: string): Promise<void> {
    try {
        await fs.rename(stagingDir, cacheDir);
    } catch (error) {
        if (await isLibraryCached(cacheDir)) {
            // Lost the race to another download; its copy is complete.
            await fs.remove(stagingDir);
            return;
        }
        throw error;
    }
}

function isAbortTimeout(error: unknown): boolean {
    return error instanceof Error && error.name === 'TimeoutError';
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
