import { BinaryReader } from '../file/binary-reader';
import { MalformedAssetError } from './errors';

/** Byte size of width, height, left, top */
export const SPRITE_HEADER_SIZE = 8;

/** A post whose top byte is this ends the column */
export const POST_TERMINATOR = 255;

/** A vertical run of opaque pixels in one column */
export interface Span {
    top: number;
    pixels: Uint8Array;
}

/**
 * The posts of one column. Every iteration starts again at the first post,
 * so the same column can be walked any number of times.
 */
export class Column implements Iterable<Span> {
    constructor(
        private readonly reader: BinaryReader,
        private readonly start: number
    ) {
        Object.seal(this);
    }

    public *[Symbol.iterator](): Iterator<Span> {
        const r = new BinaryReader(this.reader);
        r.setOffset(this.start);

        for (;;) {
            const top = r.readByte();
            if (top === POST_TERMINATOR) {
                return;
            }

            const count = r.readByte();
            r.readByte(); // unused
            const pixels = r.readBytes(count);
            r.readByte(); // unused

            yield { top, pixels };
        }
    }

    public toArray(): Span[] {
        return Array.from(this);
    }
}

/**
 * A masked picture (sprite, patch or composed texture): a header with the
 * size and the hotspot, a directory with one offset per column, and the
 * column posts. Column offsets count from the start of the lump.
 */
export class Sprite {
    public readonly name: string;
    public readonly width: number;
    public readonly height: number;
    /** horizontal distance from the left edge to the hotspot */
    public readonly left: number;
    /** vertical distance from the top edge to the hotspot */
    public readonly top: number;

    private readonly reader: BinaryReader;
    private readonly dataOffset: number;

    constructor(data: Uint8Array, name = 'sprite') {
        this.reader = new BinaryReader(data, 0, null, name);
        this.name = name;

        if (data.length < SPRITE_HEADER_SIZE) {
            throw new MalformedAssetError(name,
                `sprite header needs ${SPRITE_HEADER_SIZE} bytes, got ${data.length}`);
        }

        this.width = this.reader.readWordLE();
        this.height = this.reader.readWordLE();
        this.left = this.reader.readSignedWordLE();
        this.top = this.reader.readSignedWordLE();

        this.dataOffset = SPRITE_HEADER_SIZE + this.width * 4;
        if (data.length < this.dataOffset) {
            throw new MalformedAssetError(name,
                `column directory of ${this.width} columns needs ${this.dataOffset} bytes, got ${data.length}`);
        }

        Object.seal(this);
    }

    public dimensions(): { width: number; height: number } {
        return { width: this.width, height: this.height };
    }

    public origin(): { left: number; top: number } {
        return { left: this.left, top: this.top };
    }

    /** Size of the whole lump in bytes */
    public get byteLength(): number {
        return this.reader.length;
    }

    public column(index: number): Column {
        if (!Number.isInteger(index) || index < 0 || index >= this.width) {
            throw new RangeError(`${this.name}: column ${index} out of range 0..${this.width - 1}`);
        }

        this.reader.setOffset(SPRITE_HEADER_SIZE + index * 4);
        const offset = this.reader.readIntLE();

        if (offset < this.dataOffset || offset >= this.reader.length) {
            throw new MalformedAssetError(this.name,
                `column ${index} offset ${offset} outside of post data ${this.dataOffset}..${this.reader.length - 1}`);
        }

        return new Column(this.reader, offset);
    }

    /** Number of posts over all columns */
    public postCount(): number {
        let count = 0;
        for (let x = 0; x < this.width; x++) {
            count += this.column(x).toArray().length;
        }
        return count;
    }

    public toString(): string {
        return `${this.name} - size: (${this.width} x ${this.height}) origin (${this.left}, ${this.top})`;
    }
}

export function decodeSprite(bytes: Uint8Array, name?: string): Sprite {
    return new Sprite(bytes, name);
}
