import fs from 'fs';

/**
 * True when `candidate` is a regular file the current user may execute.
 * Windows has no execute bit, so existence as a file is enough there.
 */
export function isExecutableFile(candidate: string, platform = process.platform): boolean {
    let stats: fs.Stats;
    try {
        stats = fs.statSync(candidate);
    } catch {
        return false;
    }
    if (!stats.isFile()) return false;

    if (platform === 'win32') {
        return true;
    }

    try {
        fs.accessSync(candidate, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * File names to try for `binaryName` in one PATH directory.
 */
export function executableNames(
    binaryName: string,
    platform = process.platform,
    pathExt?: string,
): string[] {
    if (platform !== 'win32') {
        return [binaryName];
    }
    const extensions = (pathExt ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean);
    return [...extensions.map(ext => binaryName + ext.toLowerCase()), binaryName];
}
