import { MalformedAssetError } from './errors';

/** Bytes of one 256 colour RGB palette */
export const PALETTE_SIZE = 256 * 3;

/** a image color palette */
export class Palette {
    private palette: Uint32Array;

    constructor(count = 256) {
        this.palette = new Uint32Array(count);

        Object.seal(this);
    }

    public setRGB(index: number, r: number, g: number, b: number): void {
        this.palette[index] = r | (g << 8) | (b << 16) | (255 << 24);
    }

    /** packed RGBA, red in the low byte */
    public getColor(index: number): number {
        return this.palette[index];
    }

    public read3BytePalette(buffer: Uint8Array, pos: number): number {
        for (let i = 0; i < this.palette.length; i++) {
            const r = buffer[pos++];
            const g = buffer[pos++];
            const b = buffer[pos++];

            this.setRGB(i, r, g, b);
        }

        return pos;
    }
}

export interface PaletteBank {
    palette: Palette;
    /** the 768 source bytes, as written to a PNG PLTE chunk */
    raw: Uint8Array;
}

/** Pick bank [bank] out of a PLAYPAL lump (several palettes stored back to back) */
export function selectPalette(playpal: Uint8Array, bank: number): PaletteBank {
    const start = bank * PALETTE_SIZE;
    if (!Number.isInteger(bank) || bank < 0 || start + PALETTE_SIZE > playpal.length) {
        throw new MalformedAssetError('PLAYPAL',
            `palette ${bank} not available (${Math.floor(playpal.length / PALETTE_SIZE)} banks)`);
    }

    const palette = new Palette();
    palette.read3BytePalette(playpal, start);

    return {
        palette,
        raw: playpal.subarray(start, start + PALETTE_SIZE),
    };
}
