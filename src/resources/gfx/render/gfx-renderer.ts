import { Rational } from '@/utilities/rational';
import { Flat } from '../flat';
import { Sprite } from '../sprite';
import { Grid } from './grid';
import { pixelAspectRatio } from './scale';

/** One output column being painted */
export interface ColumnTarget {
    readonly length: number;
    set(y: number, value: number): void;
}

/** Column x of a pixel grid, marking the painted cells in a mask grid */
export class MaskedGridColumn implements ColumnTarget {
    constructor(
        private readonly pixels: Grid<number>,
        private readonly mask: Grid<boolean>,
        private readonly x: number
    ) {
        Object.seal(this);
    }

    public get length(): number {
        return this.pixels.height;
    }

    public set(y: number, value: number): void {
        this.pixels.set(this.x, y, value);
        this.mask.set(this.x, y, true);
    }
}

/** Something the rasterizer can paint column by column */
export interface IGfx {
    readonly kind: 'flat' | 'sprite';
    dimensions(): { width: number; height: number };
    /** vertical stretch of a source pixel */
    pixelAspectRatio(): Rational;
    /** Paint source column [index] into [target], stretched by [verticalScale] */
    drawColumn(index: number, target: ColumnTarget, verticalScale: Rational): void;
}

export class FlatGfx implements IGfx {
    public readonly kind = 'flat';

    constructor(private readonly flat: Flat) {
        Object.seal(this);
    }

    public dimensions(): { width: number; height: number } {
        return { width: this.flat.width, height: this.flat.height };
    }

    public pixelAspectRatio(): Rational {
        return Rational.ONE;
    }

    public drawColumn(index: number, target: ColumnTarget, verticalScale: Rational): void {
        const column = this.flat.column(index);

        for (let y = 0; y < target.length; y++) {
            const sourceY = Rational.of(y).div(verticalScale).toInteger();
            if (sourceY >= column.length) {
                break;
            }
            target.set(y, column[sourceY]);
        }
    }
}

export class SpriteGfx implements IGfx {
    public readonly kind = 'sprite';

    constructor(
        private readonly sprite: Sprite,
        private readonly aspect: Rational = pixelAspectRatio()
    ) {
        Object.seal(this);
    }

    public dimensions(): { width: number; height: number } {
        return this.sprite.dimensions();
    }

    public pixelAspectRatio(): Rational {
        return this.aspect;
    }

    /**
     * Only the rows covered by posts are painted: a post [top, top + n)
     * covers output rows ceil(top * s) up to, not including, ceil((top + n) * s).
     */
    public drawColumn(index: number, target: ColumnTarget, verticalScale: Rational): void {
        for (const span of this.sprite.column(index)) {
            const first = verticalScale.mul(span.top).ceil();
            const end = Math.min(verticalScale.mul(span.top + span.pixels.length).ceil(), target.length);

            for (let y = Math.max(first, 0); y < end; y++) {
                const sourceY = Rational.of(y).div(verticalScale).toInteger();
                target.set(y, span.pixels[sourceY - span.top]);
            }
        }
    }
}

export interface PaintedGfx {
    pixels: Grid<number>;
    /** true where something was painted */
    mask: Grid<boolean>;
}

/**
 * Rasterize [gfx] at an integer [scale], correcting its pixel aspect ratio.
 * The aspect correction and the scale are multiplied into one exact vertical
 * factor, so the result is rounded once.
 */
export function paintGfx(gfx: IGfx, scale: number): PaintedGfx {
    if (!Number.isInteger(scale) || scale < 1) {
        throw new RangeError(`scale ${scale} must be a positive integer`);
    }

    const { width, height } = gfx.dimensions();
    const verticalScale = gfx.pixelAspectRatio().mul(scale);

    const targetWidth = width * scale;
    const targetHeight = verticalScale.mul(height).toInteger();

    const pixels = new Grid<number>(targetWidth, targetHeight, 0);
    const mask = new Grid<boolean>(targetWidth, targetHeight, false);

    for (let x = 0; x < targetWidth; x++) {
        gfx.drawColumn(Rational.of(x, scale).toInteger(), new MaskedGridColumn(pixels, mask, x), verticalScale);
    }

    return { pixels, mask };
}
