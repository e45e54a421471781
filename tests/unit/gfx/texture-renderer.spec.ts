import { describe, it, expect } from 'vitest';
import { MalformedAssetError, UnresolvedPatchError } from '@/resources/gfx/errors';
import { EagerPatchProvider, LazyPatchProvider } from '@/resources/gfx/patch-provider';
import type { IPatchProvider } from '@/resources/gfx/patch-provider';
import { parsePnames } from '@/resources/gfx/pnames';
import { decodeSprite } from '@/resources/gfx/sprite';
import { TextureDirectory } from '@/resources/gfx/texture';
import type { Texture } from '@/resources/gfx/texture';
import { describeTexture, renderTexture } from '@/resources/gfx/texture-renderer';
import { WadFileReader } from '@/resources/wad/wad-file-reader';
import { buildPnames, buildSprite, buildTextureLump, buildWad } from '../helpers/wad-builder';
import type { TestPatchRecord } from '../helpers/wad-builder';

function patchBytes(left = 0, top = 0): Uint8Array {
    return buildSprite({
        width: 2,
        height: 3,
        left,
        top,
        columns: [[{ top: 0, pixels: [10, 11] }], [{ top: 1, pixels: [20, 21] }]],
    });
}

function makeTexture(patches: TestPatchRecord[], width = 16, height = 16): Texture {
    return new TextureDirectory(buildTextureLump([{ name: 'WALL', width, height, patches }])).texture(0);
}

function makeWad(patch: Uint8Array): WadFileReader {
    return new WadFileReader(buildWad([
        { name: 'PNAMES', data: buildPnames(['PATCHA', 'MISSING']) },
        { name: 'PATCHA', data: patch },
    ]));
}

function lazyProvider(patch = patchBytes()): IPatchProvider {
    const wad = makeWad(patch);
    return new LazyPatchProvider(wad, parsePnames(wad.lumpByName('PNAMES') ?? new Uint8Array(0)));
}

/** 16x16 sprite with the two patch columns at the left and 14 empty columns */
const EXPECTED_ONE_PATCH = [
    16, 0, 16, 0, 0, 0, 0, 0,
    72, 0, 0, 0, 79, 0, 0, 0,
    ...Array.from({ length: 14 }, (_, i) => [86 + i, 0, 0, 0]).flat(),
    0, 2, 2, 10, 11, 0, 255,
    1, 2, 2, 20, 21, 0, 255,
    ...new Array<number>(14).fill(255),
];

describe('renderTexture', () => {
    it('renders a one-patch texture byte for byte', () => {
        const result = renderTexture(makeTexture([{ originX: 0, originY: 0, patchId: 0 }]), lazyProvider());

        expect(result).toHaveLength(100);
        expect(Array.from(result)).toEqual(EXPECTED_ONE_PATCH);
    });

    it('places patches by their top-left corner, whatever their hotspot', () => {
        const result = renderTexture(makeTexture([{ originX: 0, originY: 0, patchId: 0 }]), lazyProvider(patchBytes(3, 5)));

        expect(Array.from(result)).toEqual(EXPECTED_ONE_PATCH);
    });

    it('resets the hotspot of the composite', () => {
        const sprite = decodeSprite(renderTexture(makeTexture([{ originX: 4, originY: 2, patchId: 0 }]), lazyProvider()));

        expect(sprite.origin()).toEqual({ left: 0, top: 0 });
        expect(sprite.column(4).toArray().map(s => s.top)).toEqual([2]);
        expect(Array.from(sprite.column(5).toArray()[0].pixels)).toEqual([20, 21]);
        expect(sprite.column(5).toArray()[0].top).toBe(3);
    });

    it('clips patches hanging over the edges', () => {
        const sprite = decodeSprite(renderTexture(makeTexture([{ originX: -1, originY: -1, patchId: 0 }], 4, 4), lazyProvider()));

        // column 1 of the patch lands on column 0, one row up
        const spans = sprite.column(0).toArray();
        expect(spans.map(s => ({ top: s.top, pixels: Array.from(s.pixels) }))).toEqual([{ top: 0, pixels: [20, 21] }]);
        expect(sprite.column(1).toArray()).toEqual([]);
    });

    it('fails the texture on an unresolved patch', () => {
        const texture = makeTexture([{ originX: 0, originY: 0, patchId: 0 }, { originX: 2, originY: 0, patchId: 1 }]);

        expect(() => renderTexture(texture, lazyProvider())).toThrow(UnresolvedPatchError);
        expect(() => renderTexture(texture, lazyProvider())).toThrow('WALL: cannot resolve patch MISSING (#1)');
    });

    it('fails on a patch id outside PNAMES', () => {
        const texture = makeTexture([{ originX: 0, originY: 0, patchId: 7 }]);
        expect(() => renderTexture(texture, lazyProvider())).toThrow('WALL: cannot resolve patch #7');
    });

    it('gives the same result with the eager provider', () => {
        const wad = makeWad(patchBytes());
        const pnames = parsePnames(wad.lumpByName('PNAMES') ?? new Uint8Array(0));
        const texture = makeTexture([{ originX: 0, originY: 0, patchId: 0 }]);

        const eager = renderTexture(texture, new EagerPatchProvider(wad, pnames));
        expect(Array.from(eager)).toEqual(EXPECTED_ONE_PATCH);
    });
});

describe('patch providers', () => {
    const wad = makeWad(patchBytes());
    const pnames = parsePnames(wad.lumpByName('PNAMES') ?? new Uint8Array(0));

    it('resolve names and patches', () => {
        for (const provider of [new LazyPatchProvider(wad, pnames), new EagerPatchProvider(wad, pnames)]) {
            expect(provider.patchName(0)).toBe('PATCHA');
            expect(provider.patch(0)?.dimensions()).toEqual({ width: 2, height: 3 });
            expect(provider.patchName(1)).toBe('MISSING');
            expect(provider.patch(1)).toBeUndefined();
            expect(provider.patch(2)).toBeUndefined();
        }
    });

    it('decode on every call when lazy, once when eager', () => {
        const lazy = new LazyPatchProvider(wad, pnames);
        expect(lazy.patch(0)).not.toBe(lazy.patch(0));

        const eager = new EagerPatchProvider(wad, pnames);
        expect(eager.patch(0)).toBe(eager.patch(0));
    });

    it('fail eager construction on a malformed patch', () => {
        const broken = makeWad(Uint8Array.from([1, 2, 3]));
        expect(() => new EagerPatchProvider(broken, pnames)).toThrow(MalformedAssetError);
        expect(() => new LazyPatchProvider(broken, pnames)).not.toThrow();
    });
});

describe('describeTexture', () => {
    it('lists the texture in DeuTex form', () => {
        const texture = makeTexture([{ originX: 0, originY: 0, patchId: 0 }, { originX: -4, originY: 8, patchId: 1 }]);

        expect(describeTexture(texture, parsePnames(buildPnames(['PATCHA', 'MISSING'])))).toBe(
            '; TextureName Width Height\n' +
            'WALL 16 16\n' +
            '; PatchName Xoffset Yoffset\n' +
            '* PATCHA 0 0\n' +
            '* MISSING -4 8\n');
    });
});
