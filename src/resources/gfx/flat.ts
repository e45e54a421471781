import { MalformedAssetError } from './errors';
import { Grid } from './render/grid';

export const FLAT_SIZE = 64;
export const FLAT_BYTES = FLAT_SIZE * FLAT_SIZE;

/**
 * A 64x64 floor/ceiling tile. The lump stores the pixels column by column,
 * so pixel (row, col) lives at byte col * 64 + row.
 */
export class Flat {
    public readonly width = FLAT_SIZE;
    public readonly height = FLAT_SIZE;
    private readonly pixels: Uint8Array;

    constructor(pixels: Uint8Array, name = 'flat') {
        if (pixels.length !== FLAT_BYTES) {
            throw new MalformedAssetError(name,
                `flat must be ${FLAT_BYTES} bytes (${FLAT_SIZE}x${FLAT_SIZE}), got ${pixels.length}`);
        }

        this.pixels = pixels;

        Object.seal(this);
    }

    public pixel(row: number, col: number): number {
        return this.pixels[col * FLAT_SIZE + row];
    }

    /** the 64 pixels of column [col], top to bottom */
    public column(col: number): Uint8Array {
        if (!Number.isInteger(col) || col < 0 || col >= FLAT_SIZE) {
            throw new RangeError(`flat column ${col} out of range`);
        }
        return this.pixels.subarray(col * FLAT_SIZE, (col + 1) * FLAT_SIZE);
    }

    /** Row-major copy, as consumed by the scaler */
    public toGrid(): Grid<number> {
        return new Grid<number>(FLAT_SIZE, FLAT_SIZE, (x, y) => this.pixel(y, x));
    }
}

export function decodeFlat(bytes: Uint8Array, name?: string): Flat {
    return new Flat(bytes, name);
}
