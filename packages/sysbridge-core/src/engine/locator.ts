import path from 'path';
import { BinaryNotFoundError } from '../errors.js';
import type { EngineConfig } from '../settings.js';
import { executableNames, isExecutableFile } from './executable.js';

/**
 * Search the configured PATH for the engine binary.
 *
 * Reads only `config.env` and the filesystem; never spawns anything.
 */
export function locateEngineBinary(config: EngineConfig, platform = process.platform): string {
    const binaryName = config.settings.binaryName;
    const pathValue = config.env.PATH ?? config.env.Path ?? '';
    const delimiter = platform === 'win32' ? ';' : ':';
    const names = executableNames(binaryName, platform, config.env.PATHEXT);

    for (const segment of pathValue.split(delimiter)) {
        if (!segment) continue;
        const dir = path.resolve(config.cwd, segment);
        for (const name of names) {
            const candidate = path.join(dir, name);
            if (isExecutableFile(candidate, platform)) {
                return candidate;
            }
        }
    }

    throw new BinaryNotFoundError(binaryName);
}
