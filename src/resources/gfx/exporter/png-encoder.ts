import { deflate, deflateSync } from 'zlib';
import { Rational } from '@/utilities/rational';
import { ExportImage } from './raw-image-data';

/**
 * PNG writer for exported graphics: 8 bit indexed (with PLTE) or 8 bit RGBA,
 * optionally with a pHYs chunk describing non-square pixels.
 */

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

const COLOR_TYPE_INDEXED = 3;
const COLOR_TYPE_RGBA = 6;

// CRC32 lookup table for PNG chunks
const CRC32_TABLE = new Uint32Array(256);
(function initCRC32Table() {
    for (let n = 0; n < 256; n++) {
        let c = n;
        for (let k = 0; k < 8; k++) {
            if (c & 1) {
                c = 0xedb88320 ^ (c >>> 1);
            } else {
                c = c >>> 1;
            }
        }
        CRC32_TABLE[n] = c;
    }
})();

export function crc32(data: Uint8Array, start = 0, length?: number): number {
    const len = length ?? data.length - start;
    let crc = 0xffffffff;
    for (let i = start; i < start + len; i++) {
        crc = CRC32_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
    }
    return (crc ^ 0xffffffff) >>> 0;
}

export interface PngOptions {
    /** width : height of one pixel; a pHYs chunk is written unless it is 1 */
    pixelAspect?: Rational;
}

function writeUint32BE(arr: Uint8Array, value: number, offset: number): void {
    arr[offset] = (value >>> 24) & 0xff;
    arr[offset + 1] = (value >>> 16) & 0xff;
    arr[offset + 2] = (value >>> 8) & 0xff;
    arr[offset + 3] = value & 0xff;
}

function createChunk(type: string, data: Uint8Array): Uint8Array {
    const chunk = new Uint8Array(4 + 4 + data.length + 4);

    // Length (big-endian)
    writeUint32BE(chunk, data.length, 0);

    // Type (4 ASCII characters)
    for (let i = 0; i < 4; i++) {
        chunk[4 + i] = type.charCodeAt(i);
    }

    chunk.set(data, 8);

    // CRC32 over type + data
    writeUint32BE(chunk, crc32(chunk, 4, 4 + data.length), 8 + data.length);

    return chunk;
}

function createIHDR(image: ExportImage): Uint8Array {
    const data = new Uint8Array(13);
    writeUint32BE(data, image.width, 0);
    writeUint32BE(data, image.height, 4);
    data[8] = 8;   // bit depth
    data[9] = image.kind === 'indexed' ? COLOR_TYPE_INDEXED : COLOR_TYPE_RGBA;
    data[10] = 0;  // compression method
    data[11] = 0;  // filter method
    data[12] = 0;  // interlace method
    return createChunk('IHDR', data);
}

/**
 * Pixels per unit along x and y, unit unknown. A pixel [numer] wide and
 * [denom] tall fits [denom] times along x for every [numer] times along y.
 */
function createPHYs(pixelAspect: Rational): Uint8Array {
    const data = new Uint8Array(9);
    writeUint32BE(data, pixelAspect.denom, 0);
    writeUint32BE(data, pixelAspect.numer, 4);
    data[8] = 0;
    return createChunk('pHYs', data);
}

/** Scanlines with a leading filter byte (None) each */
function filterScanlines(image: ExportImage): Uint8Array {
    const bytesPerPixel = image.kind === 'indexed' ? 1 : 4;
    const stride = image.width * bytesPerPixel;
    const rowSize = 1 + stride;
    const filtered = new Uint8Array(image.height * rowSize);

    for (let y = 0; y < image.height; y++) {
        filtered[y * rowSize] = 0;
        filtered.set(image.data.subarray(y * stride, (y + 1) * stride), y * rowSize + 1);
    }

    return filtered;
}

function assemble(image: ExportImage, compressed: Uint8Array, options: PngOptions): Uint8Array {
    if (options.pixelAspect && options.pixelAspect.compare(0) <= 0) {
        throw new RangeError(`pixel aspect ${options.pixelAspect.toString()} must be positive`);
    }

    const chunks: Uint8Array[] = [PNG_SIGNATURE, createIHDR(image)];

    if (options.pixelAspect && !options.pixelAspect.equals(1)) {
        chunks.push(createPHYs(options.pixelAspect));
    }
    if (image.kind === 'indexed') {
        chunks.push(createChunk('PLTE', image.palette));
    }

    chunks.push(createChunk('IDAT', compressed));
    chunks.push(createChunk('IEND', new Uint8Array(0)));

    const png = new Uint8Array(chunks.reduce((sum, chunk) => sum + chunk.length, 0));
    let offset = 0;
    for (const chunk of chunks) {
        png.set(chunk, offset);
        offset += chunk.length;
    }

    return png;
}

export function encodePNGSync(image: ExportImage, options: PngOptions = {}): Uint8Array {
    const compressed = deflateSync(filterScanlines(image), { level: 9 });
    return assemble(image, new Uint8Array(compressed), options);
}

export async function encodePNG(image: ExportImage, options: PngOptions = {}): Promise<Uint8Array> {
    const filtered = filterScanlines(image);
    const compressed = await new Promise<Buffer>((resolve, reject) => {
        deflate(filtered, { level: 9 }, (err, result) => {
            if (err) reject(err);
            else resolve(result);
        });
    });
    return assemble(image, new Uint8Array(compressed), options);
}
