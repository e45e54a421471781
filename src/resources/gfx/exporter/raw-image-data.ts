/**
 * Image buffers handed to the PNG encoder. Works without Canvas or ImageData.
 */

/** 8 bit RGBA pixels, row by row */
export class RawImageData {
    public readonly kind = 'rgba';
    public readonly width: number;
    public readonly height: number;
    public readonly data: Uint8ClampedArray;

    constructor(width: number, height: number, data?: Uint8ClampedArray) {
        this.width = width;
        this.height = height;
        this.data = data ?? new Uint8ClampedArray(width * height * 4);

        Object.seal(this);
    }

    /** Get pixel color at position (RGBA) */
    public getPixel(x: number, y: number): [number, number, number, number] {
        const offset = (y * this.width + x) * 4;
        return [
            this.data[offset],
            this.data[offset + 1],
            this.data[offset + 2],
            this.data[offset + 3]
        ];
    }

    /** Set pixel color at position (RGBA) */
    public setPixel(x: number, y: number, r: number, g: number, b: number, a: number): void {
        const offset = (y * this.width + x) * 4;
        this.data[offset] = r;
        this.data[offset + 1] = g;
        this.data[offset + 2] = b;
        this.data[offset + 3] = a;
    }

    /** Set pixel from a packed color, red in the low byte */
    public setPacked(x: number, y: number, color: number): void {
        this.setPixel(x, y, color & 0xff, (color >>> 8) & 0xff, (color >>> 16) & 0xff, (color >>> 24) & 0xff);
    }
}

/** 8 bit palette indices, row by row, with their palette */
export class IndexedImageData {
    public readonly kind = 'indexed';
    public readonly width: number;
    public readonly height: number;
    public readonly data: Uint8Array;
    /** RGB triplets, as written to PLTE */
    public readonly palette: Uint8Array;

    constructor(width: number, height: number, palette: Uint8Array, data?: Uint8Array) {
        if (palette.length === 0 || palette.length % 3 !== 0 || palette.length > 768) {
            throw new RangeError(`palette of ${palette.length} bytes is not 1..256 RGB entries`);
        }

        this.width = width;
        this.height = height;
        this.palette = palette;
        this.data = data ?? new Uint8Array(width * height);

        Object.seal(this);
    }

    public getIndex(x: number, y: number): number {
        return this.data[y * this.width + x];
    }
}

export type ExportImage = RawImageData | IndexedImageData;
