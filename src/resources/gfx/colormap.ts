import { MalformedAssetError } from './errors';
import { Grid } from './render/grid';

/** Bytes of one light level remap table */
export const COLORMAP_SIZE = 256;

/**
 * A light level remap: palette index -> palette index.
 * COLORMAP stores one table per light level back to back.
 */
export type Colormap = Uint8Array;

export function selectColormap(colormaps: Uint8Array, bank: number): Colormap {
    const start = bank * COLORMAP_SIZE;
    if (!Number.isInteger(bank) || bank < 0 || start + COLORMAP_SIZE > colormaps.length) {
        throw new MalformedAssetError('COLORMAP',
            `colormap ${bank} not available (${Math.floor(colormaps.length / COLORMAP_SIZE)} banks)`);
    }

    return colormaps.subarray(start, start + COLORMAP_SIZE);
}

/** Remap every palette index of [grid] through [colormap] */
export function applyColormap(grid: Grid<number>, colormap: Colormap): Grid<number> {
    return grid.map((index) => colormap[index]);
}
