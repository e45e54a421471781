import type { RenderConfig } from '@/config/render-config';
import { selectColormap } from '@/resources/gfx/colormap';
import type { Colormap } from '@/resources/gfx/colormap';
import { decodeFlat } from '@/resources/gfx/flat';
import { selectPalette } from '@/resources/gfx/palette';
import type { PaletteBank } from '@/resources/gfx/palette';
import { LazyPatchProvider } from '@/resources/gfx/patch-provider';
import { parsePnames } from '@/resources/gfx/pnames';
import { renderFlatImage, renderSpriteImage } from '@/resources/gfx/render/sprite-image';
import type { Point, RenderedImage } from '@/resources/gfx/render/sprite-image';
import { pixelAspectRatio } from '@/resources/gfx/render/scale';
import { decodeSprite } from '@/resources/gfx/sprite';
import { TextureDirectory } from '@/resources/gfx/texture';
import { describeTexture, renderTexture } from '@/resources/gfx/texture-renderer';
import { parseLumpName } from '@/resources/wad/lump-name';
import type { ILumpSource } from '@/resources/wad/wad-file-reader';
import { LogHandler } from '@/utilities/log-handler';
import { Rational } from '@/utilities/rational';
import type { Command, RenderFlags } from './options';

const log = new LogHandler('wad-gfx');

/** What a command produced: text for stdout or an image to write */
export type CommandOutput =
    | { kind: 'text'; text: string }
    | { kind: 'image'; rendered: RenderedImage; filename: string };

/** Everything a command needs besides the WAD */
export interface CommandRequest {
    name: string;
    command: Command;
    /** config with the command line overrides applied */
    config: RenderConfig;
    output?: string;
}

function requireLump(wad: ILumpSource, name: string): Uint8Array {
    const lumpName = parseLumpName(name);
    if (lumpName === null) {
        throw new Error(`Invalid lump name: ${JSON.stringify(name)}`);
    }

    const lump = wad.lumpByName(lumpName);
    if (!lump) {
        throw new Error(`Cannot find ${lumpName}`);
    }
    return lump;
}

function loadColours(wad: ILumpSource, config: RenderConfig): { palette: PaletteBank; colormap: Colormap } {
    return {
        palette: selectPalette(requireLump(wad, 'PLAYPAL'), config.palette),
        colormap: selectColormap(requireLump(wad, 'COLORMAP'), config.colormap),
    };
}

function defaultFilename(name: string, output: string | undefined): string {
    return output ?? `${name.toLowerCase()}.png`;
}

function spriteInfo(bytes: Uint8Array, name: string): string {
    const sprite = decodeSprite(bytes, name);
    return `Dimensions: ${sprite.width}x${sprite.height}\n` +
        `Origin: ${sprite.left},${sprite.top}\n` +
        `Size (b): ${bytes.length}\n`;
}

function renderSprite(
    wad: ILumpSource, bytes: Uint8Array, name: string, config: RenderConfig, render: RenderFlags,
    canvasSize?: { width: number; height: number }, pos?: Point
): RenderedImage {
    const { palette, colormap } = loadColours(wad, config);

    return renderSpriteImage(decodeSprite(bytes, name), {
        palette,
        colormap,
        scale: config.scale,
        format: render.format ?? config.format,
        background: render.background,
        anamorphic: render.anamorphic ?? config.anamorphic,
        aspect: pixelAspectRatio(config.designResolution, config.displayAspect),
        canvasSize,
        pos,
    });
}

function textureCommand(wad: ILumpSource, request: CommandRequest): CommandOutput {
    const { name, command, config } = request;
    const directory = new TextureDirectory(requireLump(wad, name), name.toUpperCase());

    if (command.kind === 'texture-list') {
        const names = [...directory.textures()].map(t => t.displayName);
        return { kind: 'text', text: names.map(n => n + '\n').join('') };
    }
    if (command.kind !== 'texture-extract') {
        throw new Error(`not a texture command: ${command.kind}`);
    }

    const texture = directory.find(command.texture);
    if (!texture) {
        throw new Error(`Unable to find texture ${command.texture}`);
    }

    const pnames = parsePnames(requireLump(wad, 'PNAMES'));

    if (command.info) {
        return { kind: 'text', text: describeTexture(texture, pnames) };
    }

    const composite = renderTexture(texture, new LazyPatchProvider(wad, pnames));
    log.debug(`${texture.displayName}: ${composite.length} bytes composited`);

    return {
        kind: 'image',
        rendered: renderSprite(wad, composite, texture.displayName, config, command.render),
        filename: defaultFilename(texture.displayName, request.output),
    };
}

/** Run one wad-gfx command against an opened WAD */
export function runCommand(wad: ILumpSource, request: CommandRequest): CommandOutput {
    const { name, command, config } = request;

    switch (command.kind) {
    case 'flat': {
        const { palette, colormap } = loadColours(wad, config);
        const flat = decodeFlat(requireLump(wad, name), name.toUpperCase());
        const image = renderFlatImage(flat, palette, colormap, config.scale);

        return {
            kind: 'image',
            rendered: { image, storedAspect: Rational.ONE },
            filename: defaultFilename(name, request.output),
        };
    }
    case 'sprite': {
        const bytes = requireLump(wad, name);
        if (command.info) {
            return { kind: 'text', text: spriteInfo(bytes, name.toUpperCase()) };
        }

        return {
            kind: 'image',
            rendered: renderSprite(wad, bytes, name.toUpperCase(), config, command.render, command.canvasSize, command.pos),
            filename: defaultFilename(name, request.output),
        };
    }
    case 'texture-list':
    case 'texture-extract':
        return textureCommand(wad, request);
    }
}
