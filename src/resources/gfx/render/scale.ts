import { Rational, truncDiv } from '@/utilities/rational';
import { Grid } from './grid';

/** The resolution the artwork was drawn for */
export const DESIGN_RESOLUTION = { width: 320, height: 200 } as const;

/** The shape of the screen it was shown on */
export const DISPLAY_ASPECT = { width: 4, height: 3 } as const;

/**
 * How much taller than wide one source pixel is on the intended display:
 * (320 / 200) / (4 / 3) = 6/5.
 */
export function pixelAspectRatio(
    design: { width: number; height: number } = DESIGN_RESOLUTION,
    display: { width: number; height: number } = DISPLAY_ASPECT
): Rational {
    return Rational.of(design.width, design.height).div(Rational.of(display.width, display.height));
}

/**
 * Nearest neighbour resize by an integer horizontal factor and a fractional
 * vertical one. Output size is height * sy (truncated) by width * sx; every
 * output cell copies the source cell at (trunc(x / sx), trunc(y / sy)).
 */
export function scaleGrid<T>(input: Grid<T>, sx: number, sy: Rational): Grid<T> {
    if (!Number.isInteger(sx) || sx < 1) {
        throw new RangeError(`horizontal scale ${sx} must be a positive integer`);
    }
    if (sy.compare(0) <= 0) {
        throw new RangeError(`vertical scale ${sy.toString()} must be positive`);
    }

    const height = sy.mul(input.height).toInteger();
    const width = input.width * sx;

    const sourceRows: number[] = [];
    for (let y = 0; y < height; y++) {
        sourceRows.push(Rational.of(y).div(sy).toInteger());
    }

    return new Grid<T>(width, height, (x, y) => input.get(truncDiv(x, sx), sourceRows[y]));
}
