import { describe, it, expect } from 'vitest';
import { UnencodableRunError } from '@/resources/gfx/errors';
import { decodeSprite } from '@/resources/gfx/sprite';
import { findSpans, SpriteCanvas } from '@/resources/gfx/sprite-canvas';
import { buildPostFixture, buildSprite } from '../helpers/wad-builder';

function spansOf(bytes: Uint8Array, x: number): { top: number; pixels: number[] }[] {
    return decodeSprite(bytes).column(x).toArray().map(s => ({ top: s.top, pixels: Array.from(s.pixels) }));
}

describe('findSpans', () => {
    it('finds maximal runs', () => {
        expect(findSpans([false, true, true, false, true])).toEqual([{ start: 1, end: 3 }, { start: 4, end: 5 }]);
    });

    it('handles all clear and all set', () => {
        expect(findSpans([0, 0, 0])).toEqual([]);
        expect(findSpans([1, 1, 1])).toEqual([{ start: 0, end: 3 }]);
        expect(findSpans([])).toEqual([]);
    });
});

describe('SpriteCanvas', () => {
    it('round-trips a sprite drawn at its hotspot', () => {
        const source = buildPostFixture();
        const sprite = decodeSprite(source);

        const canvas = new SpriteCanvas(sprite.width, sprite.height);
        canvas.drawPatch(sprite.left, sprite.top, sprite);
        const encoded = decodeSprite(canvas.makeSprite());

        expect(encoded.dimensions()).toEqual({ width: 41, height: 57 });
        expect(encoded.origin()).toEqual({ left: 0, top: 0 });
        for (let x = 0; x < sprite.width; x++) {
            expect(spansOf(canvas.makeSprite(), x)).toEqual(spansOf(source, x));
        }
        expect(encoded.postCount()).toBe(81);
    });

    it('encodes the exact wire format', () => {
        const patch = decodeSprite(buildSprite({ width: 2, height: 3, columns: [[{ top: 1, pixels: [7, 8] }], []] }));
        const canvas = new SpriteCanvas(2, 3);
        canvas.drawPatch(0, 0, patch);

        expect(Array.from(canvas.makeSprite())).toEqual([
            2, 0, 3, 0, 0, 0, 0, 0,
            16, 0, 0, 0,
            23, 0, 0, 0,
            1, 2, 2, 7, 8, 0, 255,
            255,
        ]);
    });

    it('merges touching posts into one', () => {
        const patch = decodeSprite(buildSprite({
            width: 1,
            height: 4,
            columns: [[{ top: 0, pixels: [1, 2] }, { top: 2, pixels: [3, 4] }]],
        }));
        const canvas = new SpriteCanvas(1, 4);
        canvas.drawPatch(0, 0, patch);

        expect(spansOf(canvas.makeSprite(), 0)).toEqual([{ top: 0, pixels: [1, 2, 3, 4] }]);
    });

    it('lets later patches overwrite earlier ones', () => {
        const a = decodeSprite(buildSprite({ width: 1, height: 3, columns: [[{ top: 0, pixels: [1, 1, 1] }]] }));
        const b = decodeSprite(buildSprite({ width: 1, height: 1, columns: [[{ top: 0, pixels: [9] }]] }));
        const canvas = new SpriteCanvas(1, 3);
        canvas.drawPatch(0, 0, a);
        canvas.drawPatch(0, 1, b);

        expect(spansOf(canvas.makeSprite(), 0)).toEqual([{ top: 0, pixels: [1, 9, 1] }]);
    });

    it('exposes both plane orders', () => {
        const patch = decodeSprite(buildSprite({ width: 2, height: 2, columns: [[{ top: 1, pixels: [5] }], [{ top: 0, pixels: [6] }]] }));
        const canvas = new SpriteCanvas(2, 2);
        canvas.drawPatch(0, 0, patch);

        const columns = canvas.planesColumnMajor();
        expect(Array.from(columns.pixels)).toEqual([0, 5, 6, 0]);
        expect(Array.from(columns.mask)).toEqual([0, 1, 1, 0]);

        const rows = canvas.planesRowMajor();
        expect(Array.from(rows.pixels)).toEqual([0, 6, 5, 0]);
        expect(Array.from(rows.mask)).toEqual([0, 1, 1, 0]);
    });

    it('clips placements partly or fully off the canvas', () => {
        const sprite = decodeSprite(buildPostFixture());
        const positions = [
            [-100, -100], [-30, 10], [0, 0], [10, -40], [50, 60], [1000, 5], [5, 1000], [-5, 70],
        ];

        for (const [x, y] of positions) {
            const canvas = new SpriteCanvas(32, 24);
            canvas.drawPatch(x, y, sprite);
            const encoded = decodeSprite(canvas.makeSprite());
            expect(encoded.dimensions()).toEqual({ width: 32, height: 24 });
        }

        const untouched = new SpriteCanvas(32, 24);
        untouched.drawPatch(-100, -100, sprite);
        expect(untouched.planesColumnMajor().mask.every(m => m === 0)).toBe(true);
    });

    it('rejects runs that do not fit into a post', () => {
        const tall = decodeSprite(buildSprite({
            width: 1,
            height: 256,
            columns: [[{ top: 0, pixels: new Array<number>(200).fill(1) }, { top: 200, pixels: new Array<number>(56).fill(2) }]],
        }));
        const canvas = new SpriteCanvas(1, 256);
        canvas.drawPatch(0, 0, tall);

        expect(() => canvas.makeSprite()).toThrow(UnencodableRunError);
    });

    it('rejects runs starting below row 254', () => {
        const dot = decodeSprite(buildSprite({ width: 1, height: 1, columns: [[{ top: 0, pixels: [3] }]] }));
        const canvas = new SpriteCanvas(1, 300);
        canvas.drawPatch(0, 255, dot);

        expect(() => canvas.makeSprite()).toThrow('column 0: run at row 255 of 1 pixels starts below row 254');

        const ok = new SpriteCanvas(1, 300);
        ok.drawPatch(0, 254, dot);
        expect(spansOf(ok.makeSprite(), 0)).toEqual([{ top: 254, pixels: [3] }]);
    });

    it('rejects sizes outside u16', () => {
        expect(() => new SpriteCanvas(65536, 1)).toThrow(RangeError);
        expect(() => new SpriteCanvas(-1, 1)).toThrow(RangeError);
    });
});
