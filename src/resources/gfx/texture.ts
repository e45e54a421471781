import { BinaryReader } from '../file/binary-reader';
import { lumpNameToString, LUMP_NAME_LENGTH } from '../wad/lump-name';
import { MalformedAssetError, UnsupportedFieldError } from './errors';

const TEXTURE_HEADER_SIZE = 22;
const PATCH_RECORD_SIZE = 10;

/** One patch placement inside a texture */
export interface PatchRecord {
    /** may be negative or beyond the texture; drawing clips */
    originX: number;
    originY: number;
    /** index into PNAMES */
    patchId: number;
    /** always 1 in this asset family */
    stepDir: number;
    /** always 0 in this asset family */
    colormap: number;
}

/**
 * A composite texture record: 8 byte name, masked flag, width, height,
 * an unused column directory pointer and the list of patches.
 */
export class Texture {
    public readonly name: Uint8Array;
    public readonly masked: number;
    public readonly width: number;
    public readonly height: number;
    public readonly columnDirectory: number;
    public readonly patchCount: number;

    private readonly reader: BinaryReader;

    constructor(reader: BinaryReader) {
        this.reader = reader;

        if (reader.length < TEXTURE_HEADER_SIZE) {
            throw new MalformedAssetError(reader.filename,
                `texture header needs ${TEXTURE_HEADER_SIZE} bytes, got ${reader.length}`);
        }

        reader.setOffset(0);
        this.name = reader.readBytes(LUMP_NAME_LENGTH);
        this.masked = reader.readIntLE();
        this.width = reader.readWordLE();
        this.height = reader.readWordLE();
        this.columnDirectory = reader.readIntLE();
        this.patchCount = reader.readWordLE();

        const needed = TEXTURE_HEADER_SIZE + this.patchCount * PATCH_RECORD_SIZE;
        if (reader.length < needed) {
            throw new MalformedAssetError(reader.filename,
                `texture ${this.displayName} with ${this.patchCount} patches needs ${needed} bytes, got ${reader.length}`);
        }

        Object.seal(this);
    }

    /** name without padding, uppercased */
    public get displayName(): string {
        return lumpNameToString(this.name);
    }

    public patch(index: number): PatchRecord {
        if (!Number.isInteger(index) || index < 0 || index >= this.patchCount) {
            throw new RangeError(`${this.displayName}: patch ${index} out of range 0..${this.patchCount - 1}`);
        }

        const r = this.reader;
        r.setOffset(TEXTURE_HEADER_SIZE + index * PATCH_RECORD_SIZE);

        const record: PatchRecord = {
            originX: r.readSignedWordLE(),
            originY: r.readSignedWordLE(),
            patchId: r.readWordLE(),
            stepDir: r.readWordLE(),
            colormap: r.readWordLE(),
        };

        const source = `${this.displayName} patch ${index}`;
        if (record.stepDir !== 1) {
            throw new UnsupportedFieldError(source, 'step direction', record.stepDir, 1);
        }
        if (record.colormap !== 0) {
            throw new UnsupportedFieldError(source, 'colormap', record.colormap, 0);
        }

        return record;
    }

    public *patches(): IterableIterator<PatchRecord> {
        for (let i = 0; i < this.patchCount; i++) {
            yield this.patch(i);
        }
    }

    public toString(): string {
        return `${this.displayName} ${this.width}x${this.height} - ${this.patchCount} patches`;
    }
}

/**
 * A TEXTURE1/TEXTURE2 lump: texture count, one offset per texture
 * (from the start of the lump) and the texture records.
 */
export class TextureDirectory {
    public readonly length: number;
    private readonly reader: BinaryReader;

    constructor(data: Uint8Array, name = 'TEXTURE') {
        this.reader = new BinaryReader(data, 0, null, name);

        const count = this.reader.readIntLE();
        if (count & 0x80000000) {
            throw new MalformedAssetError(name, `texture count ${count} has the sign bit set`);
        }

        if (this.reader.remaining() < count * 4) {
            throw new MalformedAssetError(name,
                `offset table of ${count} textures needs ${4 + count * 4} bytes, got ${data.length}`);
        }

        this.length = count;

        Object.seal(this);
    }

    public texture(index: number): Texture {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) {
            throw new RangeError(`${this.reader.filename}: texture ${index} out of range 0..${this.length - 1}`);
        }

        this.reader.setOffset(4 + index * 4);
        const offset = this.reader.readIntLE();

        if (offset >= this.reader.length) {
            throw new MalformedAssetError(this.reader.filename,
                `texture ${index} offset ${offset} outside of ${this.reader.length} bytes`);
        }

        return new Texture(new BinaryReader(this.reader, offset, null, `${this.reader.filename}[${index}]`));
    }

    public *textures(): IterableIterator<Texture> {
        for (let i = 0; i < this.length; i++) {
            yield this.texture(i);
        }
    }

    /** The first texture called [name], compared case-insensitively */
    public find(name: string): Texture | undefined {
        const wanted = name.toUpperCase();
        for (const texture of this.textures()) {
            if (texture.displayName === wanted) {
                return texture;
            }
        }
        return undefined;
    }
}
