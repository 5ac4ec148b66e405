import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from '../settings.js';
import type { ProcessOutcome } from '../engine/runner.js';

export const SAMPLE_SYSML = `package TestPackage {
    part def Vehicle {
        part engine : Engine;
    }
    part def Engine;
}
`;

export interface Sandbox {
    root: string;
    home: string;
    cwd: string;
    devLibrary: string;
    /** A SysML source file inside `cwd`. */
    modelFile: string;
    cleanup(): Promise<void>;
}

/**
 * Temp directory tree standing in for the user's home, working directory and
 * repository checkout. Nothing under it exists until a test creates it,
 * except the model file.
 */
export async function createSandbox(): Promise<Sandbox> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'sysbridge-test-'));
    const home = path.join(root, 'home');
    const cwd = path.join(root, 'work');
    await fs.ensureDir(home);
    await fs.ensureDir(cwd);
    const modelFile = path.join(cwd, 'vehicle.sysml');
    await fs.writeFile(modelFile, SAMPLE_SYSML);
    return {
        root,
        home,
        cwd,
        devLibrary: path.join(root, 'checkout', 'sysml.library'),
        modelFile,
        cleanup: () => fs.remove(root),
    };
}

export function sandboxOverrides(sandbox: Sandbox, extra: EngineConfigOverrides = {}): EngineConfigOverrides {
    return {
        homeDir: sandbox.home,
        cwd: sandbox.cwd,
        env: { PATH: '' },
        devLibraryPath: sandbox.devLibrary,
        ...extra,
    };
}

export function sandboxConfig(sandbox: Sandbox, extra: EngineConfigOverrides = {}): EngineConfig {
    return resolveEngineConfig(sandboxOverrides(sandbox, extra));
}

export function outcome(stdout: string | Buffer, stderr = '', exitCode: number | null = 0): ProcessOutcome {
    return {
        stdout: typeof stdout === 'string' ? Buffer.from(stdout, 'utf8') : stdout,
        stderr: Buffer.from(stderr, 'utf8'),
        exitCode,
    };
}
