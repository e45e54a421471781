import { inflateSync } from 'zlib';
import { describe, it, expect } from 'vitest';
import { crc32, encodePNG, encodePNGSync } from '@/resources/gfx/exporter/png-encoder';
import { IndexedImageData, RawImageData } from '@/resources/gfx/exporter/raw-image-data';
import { Rational } from '@/utilities/rational';

interface Chunk {
    type: string;
    data: Uint8Array;
    crc: number;
}

function readU32(bytes: Uint8Array, offset: number): number {
    return ((bytes[offset] << 24) | (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3]) >>> 0;
}

function readChunks(png: Uint8Array): Chunk[] {
    const chunks: Chunk[] = [];
    let offset = 8;
    while (offset < png.length) {
        const length = readU32(png, offset);
        const type = String.fromCharCode(...png.subarray(offset + 4, offset + 8));
        const data = png.subarray(offset + 8, offset + 8 + length);
        chunks.push({ type, data, crc: readU32(png, offset + 8 + length) });
        offset += 12 + length;
    }
    return chunks;
}

function chunk(chunks: Chunk[], type: string): Chunk {
    const found = chunks.find(c => c.type === type);
    if (!found) {
        throw new Error(`no ${type} chunk`);
    }
    return found;
}

const indexed = new IndexedImageData(2, 2, Uint8Array.from([0, 0, 0, 255, 0, 0]), Uint8Array.from([0, 1, 1, 0]));

describe('crc32', () => {
    it('matches the standard check values', () => {
        expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xcbf43926);
        expect(crc32(new TextEncoder().encode('IEND'))).toBe(0xae426082);
    });
});

describe('encodePNGSync', () => {
    it('starts with the PNG signature', () => {
        const png = encodePNGSync(indexed);
        expect(Array.from(png.subarray(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
    });

    it('writes an indexed image with its palette', () => {
        const chunks = readChunks(encodePNGSync(indexed));

        expect(chunks.map(c => c.type)).toEqual(['IHDR', 'PLTE', 'IDAT', 'IEND']);
        expect(Array.from(chunk(chunks, 'IHDR').data)).toEqual([0, 0, 0, 2, 0, 0, 0, 2, 8, 3, 0, 0, 0]);
        expect(Array.from(chunk(chunks, 'PLTE').data)).toEqual([0, 0, 0, 255, 0, 0]);
        expect(Array.from(inflateSync(chunk(chunks, 'IDAT').data))).toEqual([0, 0, 1, 0, 1, 0]);
    });

    it('checksums every chunk over its type and data', () => {
        const png = encodePNGSync(indexed);
        let offset = 8;
        for (const c of readChunks(png)) {
            expect(crc32(png, offset + 4, 4 + c.data.length)).toBe(c.crc);
            offset += 12 + c.data.length;
        }
    });

    it('writes RGBA images without a palette', () => {
        const rgba = new RawImageData(1, 2);
        rgba.setPixel(0, 0, 1, 2, 3, 4);
        rgba.setPacked(0, 1, 0x80ff0010);
        const chunks = readChunks(encodePNGSync(rgba));

        expect(chunks.map(c => c.type)).toEqual(['IHDR', 'IDAT', 'IEND']);
        expect(chunk(chunks, 'IHDR').data[9]).toBe(6);
        expect(Array.from(inflateSync(chunk(chunks, 'IDAT').data))).toEqual([0, 1, 2, 3, 4, 0, 0x10, 0x00, 0xff, 0x80]);
    });

    it('records non-square pixels in pHYs', () => {
        const chunks = readChunks(encodePNGSync(indexed, { pixelAspect: Rational.of(5, 6) }));

        expect(chunks.map(c => c.type)).toEqual(['IHDR', 'pHYs', 'PLTE', 'IDAT', 'IEND']);
        expect(Array.from(chunk(chunks, 'pHYs').data)).toEqual([0, 0, 0, 6, 0, 0, 0, 5, 0]);
    });

    it('leaves out pHYs for square pixels', () => {
        const chunks = readChunks(encodePNGSync(indexed, { pixelAspect: Rational.ONE }));
        expect(chunks.some(c => c.type === 'pHYs')).toBe(false);
    });
});

describe('encodePNG', () => {
    it('produces the same file as the synchronous encoder', async () => {
        const png = await encodePNG(indexed, { pixelAspect: Rational.of(5, 6) });
        expect(Array.from(png)).toEqual(Array.from(encodePNGSync(indexed, { pixelAspect: Rational.of(5, 6) })));
    });
});

describe('IndexedImageData', () => {
    it('rejects a palette that is not whole RGB entries', () => {
        expect(() => new IndexedImageData(1, 1, new Uint8Array(4))).toThrow(RangeError);
        expect(() => new IndexedImageData(1, 1, new Uint8Array(0))).toThrow(RangeError);
    });
});
