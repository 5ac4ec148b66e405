import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { DependencyFetchError } from '../errors.js';
import { createSandbox, sandboxConfig, type Sandbox } from '../testing/fixtures.js';
import { buildZip } from '../testing/zip-fixture.js';
import { resolveSupportLibrary } from './resolver.js';

function archive(): Buffer {
    return buildZip([{ name: 'release/sysml.library/Base.kerml', content: 'package Base;\n' }]);
}

describe('resolveSupportLibrary', () => {
    let sandbox: Sandbox;
    const fetcher = vi.fn(async (_url: string, _init: { signal: AbortSignal }) => archive());

    beforeEach(async () => {
        sandbox = await createSandbox();
        fetcher.mockClear();
    });

    afterEach(async () => {
        await sandbox.cleanup();
    });

    it('uses the explicit override first, without checking it', async () => {
        const envDir = path.join(sandbox.root, 'from-env');
        await fs.ensureDir(envDir);
        const config = sandboxConfig(sandbox, { env: { SYSTER_STDLIB_PATH: envDir } });

        const resolved = await resolveSupportLibrary(config, { overridePath: 'custom/stdlib', fetcher });

        expect(resolved).toEqual({ path: path.join(sandbox.cwd, 'custom', 'stdlib'), source: 'override' });
        expect(fetcher).not.toHaveBeenCalled();
    });

    it('uses SYSTER_STDLIB_PATH when it names a directory', async () => {
        const envDir = path.join(sandbox.root, 'from-env');
        await fs.ensureDir(envDir);
        await fs.outputFile(path.join(sandbox.cwd, 'sysml.library', 'Base.kerml'), '');
        const config = sandboxConfig(sandbox, { env: { SYSTER_STDLIB_PATH: envDir } });

        expect(await resolveSupportLibrary(config, { fetcher })).toEqual({ path: envDir, source: 'environment' });
    });

    it('skips an environment path that does not exist', async () => {
        await fs.ensureDir(path.join(sandbox.cwd, 'sysml.library'));
        const config = sandboxConfig(sandbox, { env: { SYSTER_STDLIB_PATH: path.join(sandbox.root, 'missing') } });

        const resolved = await resolveSupportLibrary(config, { fetcher });

        expect(resolved.source).toBe('working-directory');
    });

    it('prefers a populated cache over the working directory', async () => {
        const config = sandboxConfig(sandbox);
        await fs.outputFile(path.join(config.cacheDir, 'Base.kerml'), '');
        await fs.ensureDir(path.join(sandbox.cwd, 'sysml.library'));

        expect(await resolveSupportLibrary(config, { fetcher })).toEqual({ path: config.cacheDir, source: 'cache' });
    });

    it('ignores an empty cache directory', async () => {
        const config = sandboxConfig(sandbox);
        await fs.ensureDir(config.cacheDir);
        await fs.ensureDir(path.join(sandbox.cwd, 'sysml.library'));

        expect((await resolveSupportLibrary(config, { fetcher })).source).toBe('working-directory');
    });

    it('falls back to the development checkout', async () => {
        await fs.ensureDir(sandbox.devLibrary);
        const config = sandboxConfig(sandbox);

        expect(await resolveSupportLibrary(config, { fetcher })).toEqual({ path: sandbox.devLibrary, source: 'development' });
        expect(fetcher).not.toHaveBeenCalled();
    });

    it('downloads into the versioned cache when nothing else matches', async () => {
        const config = sandboxConfig(sandbox, {
            settings: { libraryVersion: '2025-02', libraryArchiveUrl: 'https://example.test/stdlib.zip' },
        });

        const resolved = await resolveSupportLibrary(config, { fetcher, onProgress: () => undefined });

        expect(resolved).toEqual({
            path: path.join(sandbox.home, '.sysbridge', 'stdlib', '2025-02', 'sysml.library'),
            source: 'download',
        });
        expect(fetcher).toHaveBeenCalledTimes(1);
        expect(fetcher.mock.calls[0][0]).toBe('https://example.test/stdlib.zip');
        expect(await fs.readFile(path.join(resolved.path, 'Base.kerml'), 'utf8')).toBe('package Base;\n');
    });

    it('makes exactly one request across two calls', async () => {
        const config = sandboxConfig(sandbox);

        await resolveSupportLibrary(config, { fetcher, onProgress: () => undefined });
        const second = await resolveSupportLibrary(config, { fetcher });

        expect(second.source).toBe('cache');
        expect(fetcher).toHaveBeenCalledTimes(1);
    });

    it('surfaces download failures as DependencyFetchError', async () => {
        const config = sandboxConfig(sandbox);
        const failing = vi.fn(async (_url: string, _init: { signal: AbortSignal }): Promise<Buffer> => {
            throw new Error('HTTP 404: Not Found');
        });

        await expect(resolveSupportLibrary(config, { fetcher: failing, onProgress: () => undefined }))
            .rejects.toBeInstanceOf(DependencyFetchError);
    });
});
