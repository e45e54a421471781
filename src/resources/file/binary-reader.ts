import { MalformedAssetError } from '../gfx/errors';

/**
 * Read pointer and little-endian read functions over a byte view.
 * Every read is bounds checked against the view; nothing is copied.
 */
export class BinaryReader {
    public filename: string;
    protected readonly data: Uint8Array;
    protected readonly hiddenOffset: number;
    public readonly length: number;
    public pos: number;

    constructor(
        dataArray: BinaryReader | Uint8Array,
        offset = 0, length: number | null = null, filename: string | null = null
    ) {
        let srcHiddenOffset = 0;
        let dataLength: number;

        if (dataArray instanceof BinaryReader) {
            this.data = dataArray.data;
            dataLength = dataArray.length;
            srcHiddenOffset = dataArray.hiddenOffset;

            if (!filename) {
                filename = dataArray.filename;
            }
        } else {
            this.data = dataArray;
            dataLength = dataArray.byteLength;
        }

        this.filename = filename || '[Unknown]';

        if (length == null) {
            length = dataLength - offset;
        }

        if (offset < 0 || length < 0 || offset + length > dataLength) {
            throw new MalformedAssetError(this.filename,
                `range ${offset}+${length} outside of ${dataLength} bytes`);
        }

        this.hiddenOffset = offset + srcHiddenOffset;
        this.length = length;
        this.pos = this.hiddenOffset;

        Object.seal(this);
    }

    /** Throw unless [count] bytes can be read at the current position */
    private require(count: number): number {
        const start = this.pos - this.hiddenOffset;
        if (start < 0 || start + count > this.length) {
            throw new MalformedAssetError(this.filename,
                `read of ${count} bytes @ ${start} out of data (size ${this.length})`);
        }

        const pos = this.pos;
        this.pos += count;
        return pos;
    }

    /** A view of [length] bytes at [offset]; the rest of the data if [length] is negative */
    public getBuffer(offset = 0, length = -1): Uint8Array {
        const l = (length >= 0) ? length : this.length - offset;
        if (offset < 0 || l < 0 || offset + l > this.length) {
            throw new MalformedAssetError(this.filename,
                `buffer ${offset}+${l} out of data (size ${this.length})`);
        }

        const o = this.hiddenOffset + offset;
        return this.data.subarray(o, o + l);
    }

    public readByte(): number {
        return this.data[this.require(1)];
    }

    /** unsigned 16 bit */
    public readWordLE(): number {
        const p = this.require(2);
        return this.data[p] | (this.data[p + 1] << 8);
    }

    /** signed 16 bit */
    public readSignedWordLE(): number {
        const v = this.readWordLE();
        return (v & 0x8000) ? v - 0x10000 : v;
    }

    /** unsigned 32 bit */
    public readIntLE(): number {
        return this.readSignedIntLE() >>> 0;
    }

    /** signed 32 bit */
    public readSignedIntLE(): number {
        const p = this.require(4);
        return this.data[p] |
            (this.data[p + 1] << 8) |
            (this.data[p + 2] << 16) |
            (this.data[p + 3] << 24);
    }

    /** A view of the next [length] bytes */
    public readBytes(length: number): Uint8Array {
        const p = this.require(length);
        return this.data.subarray(p, p + length);
    }

    /** [length] bytes as latin1 characters, padding included */
    public readString(length: number): string {
        const p = this.require(length);
        let result = '';

        for (let i = 0; i < length; i++) {
            result += String.fromCharCode(this.data[p + i]);
        }
        return result;
    }

    public getOffset(): number {
        return this.pos - this.hiddenOffset;
    }

    public setOffset(newPos: number): void {
        this.pos = newPos + this.hiddenOffset;
    }

    public remaining(): number {
        return this.length - this.getOffset();
    }

    public eof(): boolean {
        const pos = this.pos - this.hiddenOffset;
        return ((pos >= this.length) || (pos < 0));
    }
}
