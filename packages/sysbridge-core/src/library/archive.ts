import { inflateRawSync } from 'zlib';

/** ZIP local-file header signature. */
const ZIP_LOCAL_HEADER_SIGNATURE = 0x04034b50;
/** ZIP central-directory file-header signature. */
const ZIP_CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
/** ZIP end-of-central-directory signature. */
const ZIP_END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
/** Maximum ZIP comment size used by the EOCD backwards scan. */
const ZIP_MAX_COMMENT_LENGTH = 0xffff;
const EOCD_SIZE = 22;

/** Central-directory metadata needed to decode one entry. */
export interface ZipEntry {
    name: string;
    compressionMethod: number;
    compressedSize: number;
    uncompressedSize: number;
    localHeaderOffset: number;
}

export class ZipFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ZipFormatError';
    }
}

/**
 * Read every entry listed in the central directory, in archive order.
 * Directory entries (names ending in "/") are included.
 */
export function readZipEntries(data: Buffer): ZipEntry[] {
    const eocdOffset = findEndOfCentralDirectoryOffset(data);
    const totalEntries = data.readUInt16LE(eocdOffset + 10);
    const centralDirectorySize = data.readUInt32LE(eocdOffset + 12);
    const centralDirectoryOffset = data.readUInt32LE(eocdOffset + 16);

    if (centralDirectoryOffset + centralDirectorySize > data.length) {
        throw new ZipFormatError('Central directory exceeds archive bounds');
    }

    const entries: ZipEntry[] = [];
    let cursor = centralDirectoryOffset;

    for (let index = 0; index < totalEntries; index += 1) {
        ensureBounds(data, cursor, 46, 'central directory header');
        if (data.readUInt32LE(cursor) !== ZIP_CENTRAL_DIRECTORY_SIGNATURE) {
            throw new ZipFormatError('Central directory header signature is invalid');
        }

        const fileNameLength = data.readUInt16LE(cursor + 28);
        const extraLength = data.readUInt16LE(cursor + 30);
        const fileCommentLength = data.readUInt16LE(cursor + 32);
        const nameOffset = cursor + 46;
        ensureBounds(data, nameOffset, fileNameLength, 'central directory file name');

        entries.push({
            name: data.toString('utf8', nameOffset, nameOffset + fileNameLength),
            compressionMethod: data.readUInt16LE(cursor + 10),
            compressedSize: data.readUInt32LE(cursor + 20),
            uncompressedSize: data.readUInt32LE(cursor + 24),
            localHeaderOffset: data.readUInt32LE(cursor + 42),
        });

        cursor = nameOffset + fileNameLength + extraLength + fileCommentLength;
    }

    return entries;
}

/** Decode and inflate an entry payload from its local file header. */
export function readZipEntryData(data: Buffer, entry: ZipEntry): Buffer {
    ensureBounds(data, entry.localHeaderOffset, 30, 'local file header');
    if (data.readUInt32LE(entry.localHeaderOffset) !== ZIP_LOCAL_HEADER_SIGNATURE) {
        throw new ZipFormatError(`Local file header is invalid for entry '${entry.name}'`);
    }

    const fileNameLength = data.readUInt16LE(entry.localHeaderOffset + 26);
    const extraLength = data.readUInt16LE(entry.localHeaderOffset + 28);
    const payloadOffset = entry.localHeaderOffset + 30 + fileNameLength + extraLength;
    ensureBounds(data, payloadOffset, entry.compressedSize, `entry payload '${entry.name}'`);

    const compressed = data.subarray(payloadOffset, payloadOffset + entry.compressedSize);
    if (entry.compressionMethod === 0) {
        return Buffer.from(compressed);
    }
    if (entry.compressionMethod === 8) {
        return inflateRawSync(compressed);
    }

    throw new ZipFormatError(`Unsupported compression method ${entry.compressionMethod} for entry '${entry.name}'`);
}

export function isZipArchive(data: Buffer): boolean {
    return data.length >= 4 && data.readUInt32LE(0) === ZIP_LOCAL_HEADER_SIGNATURE;
}

/** Locate the EOCD signature by scanning backwards from the archive tail. */
function findEndOfCentralDirectoryOffset(data: Buffer): number {
    const minOffset = Math.max(0, data.length - (EOCD_SIZE + ZIP_MAX_COMMENT_LENGTH));
    for (let offset = data.length - EOCD_SIZE; offset >= minOffset; offset -= 1) {
        if (data.readUInt32LE(offset) === ZIP_END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
            return offset;
        }
    }

    throw new ZipFormatError('End-of-central-directory signature not found');
}

function ensureBounds(data: Buffer, offset: number, length: number, label: string): void {
    if (offset < 0 || offset + length > data.length) {
        throw new ZipFormatError(`Archive truncated while reading ${label}`);
    }
}
