import { add, intersect, range, Range } from '@/utilities/range-tools';
import { UnencodableRunError } from './errors';
import { POST_TERMINATOR, Sprite, SPRITE_HEADER_SIZE } from './sprite';

/** Longest run a post can hold: its length is a single byte */
export const MAX_POST_LENGTH = 255;

/** Lowest row a post can start at; a top byte of 255 would end the column */
export const MAX_POST_TOP = POST_TERMINATOR - 1;

/** Pixel and mask planes of a canvas */
export interface CanvasPlanes {
    width: number;
    height: number;
    pixels: Uint8Array;
    /** 1 where a pixel was drawn */
    mask: Uint8Array;
}

/** Maximal runs of set entries in [mask], in order */
export function findSpans(mask: ArrayLike<boolean | number>): Range[] {
    const spans: Range[] = [];

    let i = 0;
    while (i < mask.length) {
        while (i < mask.length && !mask[i]) {
            i++;
        }
        if (i === mask.length) {
            break;
        }
        const start = i;
        while (i < mask.length && mask[i]) {
            i++;
        }
        spans.push(range(start, i));
    }

    return spans;
}

/**
 * Visit every opaque pixel of [sprite] placed with its hotspot at
 * (posX, posY) that falls inside a width x height area.
 */
export function forEachPlacedPixel(
    sprite: Sprite, posX: number, posY: number, width: number, height: number,
    visit: (x: number, y: number, index: number) => void
): void {
    const offsetX = posX - sprite.left;
    const offsetY = posY - sprite.top;

    const xRange = intersect(add(range(0, sprite.width), offsetX), range(0, width));

    for (let x = xRange.start; x < xRange.end; x++) {
        for (const span of sprite.column(x - offsetX)) {
            const yOffset = offsetY + span.top;
            const yRange = intersect(add(range(0, span.pixels.length), yOffset), range(0, height));

            for (let y = yRange.start; y < yRange.end; y++) {
                visit(x, y, span.pixels[y - yOffset]);
            }
        }
    }
}

function checkDimension(value: number, what: string): number {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
        throw new RangeError(`canvas ${what} ${value} must be an integer in 0..65535`);
    }
    return value;
}

/**
 * An owned pixel + mask buffer that sprites are stamped onto, and that can
 * be written back out as a sprite. Planes are stored column by column,
 * like the posts.
 */
export class SpriteCanvas {
    public readonly width: number;
    public readonly height: number;
    private readonly pixels: Uint8Array;
    private readonly mask: Uint8Array;

    constructor(width: number, height: number) {
        this.width = checkDimension(width, 'width');
        this.height = checkDimension(height, 'height');
        this.pixels = new Uint8Array(width * height);
        this.mask = new Uint8Array(width * height);

        Object.seal(this);
    }

    /**
     * Stamp [sprite] so that its hotspot lands on (posX, posY). Whatever
     * falls outside the canvas is clipped.
     */
    public drawPatch(posX: number, posY: number, sprite: Sprite): void {
        forEachPlacedPixel(sprite, posX, posY, this.width, this.height, (x, y, index) => {
            this.pixels[x * this.height + y] = index;
            this.mask[x * this.height + y] = 1;
        });
    }

    /**
     * Encode the canvas as a sprite: one post per masked run. The hotspot
     * of the result is always (0, 0); a canvas holds an already placed
     * composite and does not remember where it was anchored.
     */
    public makeSprite(): Uint8Array {
        const columnOffsets: number[] = [];
        const data: number[] = [];

        for (let x = 0; x < this.width; x++) {
            columnOffsets.push(data.length);

            const columnStart = x * this.height;
            const mask = this.mask.subarray(columnStart, columnStart + this.height);

            for (const span of findSpans(mask)) {
                const length = span.end - span.start;
                if (length > MAX_POST_LENGTH) {
                    throw new UnencodableRunError(x, span.start, length,
                        `is longer than ${MAX_POST_LENGTH}`);
                }
                if (span.start > MAX_POST_TOP) {
                    throw new UnencodableRunError(x, span.start, length,
                        `starts below row ${MAX_POST_TOP}`);
                }

                data.push(span.start, length, length);
                for (let y = span.start; y < span.end; y++) {
                    data.push(this.pixels[columnStart + y]);
                }
                data.push(0);
            }

            data.push(POST_TERMINATOR);
        }

        const dataStart = SPRITE_HEADER_SIZE + 4 * this.width;
        const out = new Uint8Array(dataStart + data.length);
        const view = new DataView(out.buffer);

        view.setUint16(0, this.width, true);
        view.setUint16(2, this.height, true);
        view.setInt16(4, 0, true); // left
        view.setInt16(6, 0, true); // top

        columnOffsets.forEach((offset, i) => {
            view.setUint32(SPRITE_HEADER_SIZE + i * 4, dataStart + offset, true);
        });

        out.set(data, dataStart);

        return out;
    }

    /** Planes as stored: index x * height + y */
    public planesColumnMajor(): CanvasPlanes {
        return {
            width: this.width,
            height: this.height,
            pixels: this.pixels.slice(),
            mask: this.mask.slice(),
        };
    }

    /** Transposed planes: index y * width + x */
    public planesRowMajor(): CanvasPlanes {
        const pixels = new Uint8Array(this.width * this.height);
        const mask = new Uint8Array(this.width * this.height);

        for (let x = 0; x < this.width; x++) {
            for (let y = 0; y < this.height; y++) {
                pixels[y * this.width + x] = this.pixels[x * this.height + y];
                mask[y * this.width + x] = this.mask[x * this.height + y];
            }
        }

        return { width: this.width, height: this.height, pixels, mask };
    }
}
