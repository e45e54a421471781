import { BinaryReader } from '../file/binary-reader';
import { MalformedAssetError } from '../gfx/errors';
import { LogHandler } from '@/utilities/log-handler';
import { lumpNameToString, LUMP_NAME_LENGTH } from './lump-name';

/** Looks up the bytes of a lump by its name */
export interface ILumpSource {
    lumpByName(name: string): Uint8Array | undefined;
}

export interface WadEntry {
    name: string;
    offset: number;
    size: number;
}

export type WadKind = 'IWAD' | 'PWAD';

function isWadKind(magic: string): magic is WadKind {
    return magic === 'IWAD' || magic === 'PWAD';
}

const HEADER_SIZE = 12;
const DIRECTORY_ENTRY_SIZE = 16;

/**
 * Reads a WAD container: a 12 byte header ("IWAD"/"PWAD", lump count,
 * directory offset) and a directory of 16 byte entries
 * (file position, size, 8 byte name).
 */
export class WadFileReader implements ILumpSource {
    private static log = new LogHandler('WadFileReader');

    public readonly kind: WadKind;
    private readonly reader: BinaryReader;
    private readonly directory: WadEntry[] = [];

    constructor(data: Uint8Array, filename = '[WAD]') {
        this.reader = new BinaryReader(data, 0, null, filename);
        this.kind = this.readHeader();

        Object.seal(this);
    }

    private readHeader(): WadKind {
        const r = this.reader;

        if (r.length < HEADER_SIZE) {
            throw new MalformedAssetError(r.filename, `WAD header needs ${HEADER_SIZE} bytes, got ${r.length}`);
        }

        const magic = r.readString(4);
        if (!isWadKind(magic)) {
            throw new MalformedAssetError(r.filename, `not a WAD file (magic ${JSON.stringify(magic)})`);
        }

        const count = r.readSignedIntLE();
        const directoryOffset = r.readSignedIntLE();

        if (count < 0 || directoryOffset < 0) {
            throw new MalformedAssetError(r.filename, `invalid directory ${count} @ ${directoryOffset}`);
        }

        const directory = new BinaryReader(r, directoryOffset, count * DIRECTORY_ENTRY_SIZE);

        for (let i = 0; i < count; i++) {
            const offset = directory.readSignedIntLE();
            const size = directory.readSignedIntLE();
            const name = lumpNameToString(directory.readBytes(LUMP_NAME_LENGTH));

            if (offset < 0 || size < 0 || offset + size > r.length) {
                throw new MalformedAssetError(r.filename,
                    `lump ${i} (${name}) at ${offset}+${size} lies outside of ${r.length} bytes`);
            }

            this.directory.push({ name, offset, size });
        }

        WadFileReader.log.debug(`${r.filename}: ${magic} with ${count} lumps`);

        return magic;
    }

    public get filename(): string {
        return this.reader.filename;
    }

    public get lumpCount(): number {
        return this.directory.length;
    }

    public entries(): readonly WadEntry[] {
        return this.directory;
    }

    /** The first lump named [name]; names compare case-insensitively */
    public lumpByName(name: string): Uint8Array | undefined {
        const wanted = name.toUpperCase();
        const entry = this.directory.find((e) => e.name === wanted);
        if (!entry) {
            return undefined;
        }

        return this.reader.getBuffer(entry.offset, entry.size);
    }

    public toString(): string {
        return `${this.kind} ${this.filename} - ${this.directory.length} lumps`;
    }
}
