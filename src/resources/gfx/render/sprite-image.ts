import { LogHandler } from '@/utilities/log-handler';
import { Rational } from '@/utilities/rational';
import { applyColormap, Colormap } from '../colormap';
import { ExportImage, IndexedImageData, RawImageData } from '../exporter/raw-image-data';
import { Flat } from '../flat';
import { PaletteBank } from '../palette';
import { Sprite } from '../sprite';
import { forEachPlacedPixel } from '../sprite-canvas';
import { FlatGfx, paintGfx } from './gfx-renderer';
import { Grid } from './grid';
import { pixelAspectRatio, scaleGrid } from './scale';

const log = new LogHandler('SpriteImage');

export type ExportFormat = 'full' | 'indexed' | 'mask';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['full', 'indexed', 'mask'];

/** Black and white, for mask output */
const MASK_PALETTE = new Uint8Array([0, 0, 0, 255, 255, 255]);

export interface Point {
    x: number;
    y: number;
}

export interface SpriteImageOptions {
    palette: PaletteBank;
    colormap: Colormap;
    scale: number;
    format: ExportFormat;
    /** palette index of the background; required for the indexed format */
    background?: number;
    /** defaults to the sprite's size */
    canvasSize?: { width: number; height: number };
    /** where the hotspot goes; defaults to the sprite's own hotspot */
    pos?: Point;
    /** keep the source's non-square pixels instead of correcting them */
    anamorphic?: boolean;
    /** vertical stretch of a source pixel, see pixelAspectRatio() */
    aspect?: Rational;
}

export interface RenderedImage {
    image: ExportImage;
    /** width : height of one output pixel, for the PNG pHYs chunk */
    storedAspect: Rational;
}

/**
 * Draw [sprite] with its hotspot at [pos] onto [target], clipped, mapping
 * each palette index through [mapper].
 */
export function drawSprite<T>(target: Grid<T>, sprite: Sprite, pos: Point, mapper: (index: number) => T): void {
    forEachPlacedPixel(sprite, pos.x, pos.y, target.width, target.height, (x, y, index) => {
        target.set(x, y, mapper(index));
    });
}

function toIndexedImage(grid: Grid<number>, palette: Uint8Array): IndexedImageData {
    return new IndexedImageData(grid.width, grid.height, palette, Uint8Array.from(grid.data));
}

function toRawImage(grid: Grid<number>): RawImageData {
    const image = new RawImageData(grid.width, grid.height);
    for (let y = 0; y < grid.height; y++) {
        for (let x = 0; x < grid.width; x++) {
            image.setPacked(x, y, grid.get(x, y));
        }
    }
    return image;
}

/**
 * Place, colour and scale a sprite for export.
 *
 * Without [anamorphic] the vertical factor is scale * aspect, so the output
 * has square pixels. With it the vertical factor is just the scale and the
 * non-square pixel shape is returned as [storedAspect] instead.
 */
export function renderSpriteImage(sprite: Sprite, options: SpriteImageOptions): RenderedImage {
    const { palette, colormap, scale, format } = options;
    if (!Number.isInteger(scale) || scale < 1) {
        throw new RangeError(`scale ${scale} must be a positive integer`);
    }

    const aspect = options.aspect ?? pixelAspectRatio();
    const verticalScale = options.anamorphic ? Rational.of(scale) : aspect.mul(scale);
    const storedAspect = options.anamorphic ? Rational.ONE.div(aspect) : Rational.ONE;

    const size = options.canvasSize ?? sprite.dimensions();
    const pos = options.pos ?? { x: sprite.left, y: sprite.top };

    switch (format) {
    case 'indexed': {
        if (options.background === undefined) {
            throw new Error('a background colour index must be given for the indexed format');
        }

        const target = new Grid<number>(size.width, size.height, colormap[options.background]);
        drawSprite(target, sprite, pos, (index) => colormap[index]);

        const scaled = scaleGrid(target, scale, verticalScale);
        return { image: toIndexedImage(scaled, palette.raw), storedAspect };
    }
    case 'mask': {
        if (options.background !== undefined) {
            log.warn('the background has no effect on the mask format');
        }

        const target = new Grid<number>(size.width, size.height, 0);
        drawSprite(target, sprite, pos, () => 1);

        const scaled = scaleGrid(target, scale, verticalScale);
        return { image: toIndexedImage(scaled, MASK_PALETTE), storedAspect };
    }
    case 'full': {
        const toColor = (index: number): number => palette.palette.getColor(colormap[index]);
        const background = options.background === undefined ? 0 : toColor(options.background);

        const target = new Grid<number>(size.width, size.height, background);
        drawSprite(target, sprite, pos, toColor);

        const scaled = scaleGrid(target, scale, verticalScale);
        return { image: toRawImage(scaled), storedAspect };
    }
    }
}

/** A flat, light-mapped and scaled, as an indexed image. Flats have square pixels. */
export function renderFlatImage(flat: Flat, palette: PaletteBank, colormap: Colormap, scale: number): IndexedImageData {
    const painted = paintGfx(new FlatGfx(flat), scale);
    return toIndexedImage(applyColormap(painted.pixels, colormap), palette.raw);
}
