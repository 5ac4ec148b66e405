import { OutputParseError } from '../errors.js';
import { isZipArchive, readZipEntries, readZipEntryData } from '../library/archive.js';

/** One file inside a KPAR (Kernel Package Archive). */
export interface KparEntry {
    name: string;
    data: Buffer;
}

export interface KparXmi {
    name: string;
    xml: string;
}

/**
 * List the files of a KPAR archive in archive order, skipping directories.
 */
export function readKparEntries(archive: Buffer): KparEntry[] {
    if (!isZipArchive(archive)) {
        throw new OutputParseError('KPAR payload is not a ZIP archive', archive.subarray(0, 64).toString('latin1'));
    }
    try {
        return readZipEntries(archive)
            .filter(entry => !entry.name.endsWith('/'))
            .map(entry => ({ name: entry.name, data: readZipEntryData(archive, entry) }));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new OutputParseError(`Invalid KPAR archive: ${reason}`, '', '', { cause: error });
    }
}

/**
 * Return the model XMI carried by a KPAR archive (the first `.xmi` entry).
 */
export function extractXmi(archive: Buffer): KparXmi {
    const entry = readKparEntries(archive).find(candidate => candidate.name.toLowerCase().endsWith('.xmi'));
    if (!entry) {
        throw new OutputParseError('KPAR archive contains no .xmi entry', '');
    }
    return { name: entry.name, xml: entry.data.toString('utf8') };
}
