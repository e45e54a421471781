import type { Size } from '@/config/render-config';
import { EXPORT_FORMATS } from '@/resources/gfx/render/sprite-image';
import type { ExportFormat, Point } from '@/resources/gfx/render/sprite-image';

/** How a sprite or texture is turned into an image; unset fields come from the config */
export interface RenderFlags {
    format?: ExportFormat;
    background?: number;
    anamorphic?: boolean;
}

export interface SpriteCommand {
    kind: 'sprite';
    canvasSize?: Size;
    pos?: Point;
    info: boolean;
    render: RenderFlags;
}

export interface TextureExtractCommand {
    kind: 'texture-extract';
    texture: string;
    info: boolean;
    render: RenderFlags;
}

export type Command =
    | { kind: 'flat' }
    | SpriteCommand
    | { kind: 'texture-list' }
    | TextureExtractCommand;

export interface CliOptions {
    input: string;
    /** lump to read: a flat, a sprite or a texture directory */
    name: string;
    command: Command | null;
    palette?: number;
    colormap?: number;
    scale?: number;
    output?: string;
    config?: string;
    verbose: boolean;
    help: boolean;
}

const PAIR_FORMAT_ERROR = 'format must be two integers separated by `x` or `,`, eg 320x200 or 100,200';

/**
 * Parse "320x200" or "100,200" into its two numbers, in written order.
 * Only the first separator splits, so "1x2x3" is rejected.
 */
export function parsePair(src: string, allowNegative = false): [number, number] {
    const match = /^([^x,]*)[x,](.*)$/.exec(src);
    if (!match) {
        throw new Error(PAIR_FORMAT_ERROR);
    }

    const pattern = allowNegative ? /^-?\d+$/ : /^\d+$/;
    const [, first, second] = match;
    if (!pattern.test(first) || !pattern.test(second)) {
        throw new Error(PAIR_FORMAT_ERROR);
    }

    return [Number(first), Number(second)];
}

export function parseFormat(src: string): ExportFormat {
    const format = EXPORT_FORMATS.find(f => f === src || f[0] === src);
    if (!format) {
        throw new Error('format must be \'indexed\'/\'i\', \'mask\'/\'m\' or \'full\'/\'f\'');
    }
    return format;
}

function parseNumber(flag: string, src: string | undefined, min: number, max: number): number {
    if (src === undefined || !/^\d+$/.test(src)) {
        throw new Error(`${flag} needs an integer, got ${JSON.stringify(src ?? '')}`);
    }

    const value = Number(src);
    if (value < min || value > max) {
        throw new Error(`${flag} must be in ${min}..${max}, got ${value}`);
    }
    return value;
}

function requireValue(flag: string, src: string | undefined): string {
    if (src === undefined) {
        throw new Error(`${flag} needs a value`);
    }
    return src;
}

function parseCommand(words: string[], flags: Map<string, string | true>): Command {
    const [command, ...rest] = words;
    const render: RenderFlags = {};

    const format = flags.get('format');
    if (typeof format === 'string') {
        render.format = parseFormat(format);
    }
    const background = flags.get('background');
    if (typeof background === 'string') {
        render.background = parseNumber('--background', background, 0, 255);
    }
    if (flags.has('anamorphic')) {
        render.anamorphic = true;
    }
    const info = flags.has('info');

    switch (command) {
    case 'flat':
        return { kind: 'flat' };
    case 'sprite': {
        const result: SpriteCommand = { kind: 'sprite', info, render };

        const canvas = flags.get('canvas');
        if (typeof canvas === 'string') {
            const [width, height] = parsePair(canvas);
            result.canvasSize = { width, height };
        }
        const pos = flags.get('pos');
        if (typeof pos === 'string') {
            const [x, y] = parsePair(pos, true);
            result.pos = { x, y };
        }
        return result;
    }
    case 'texture':
        if (rest[0] === 'list') {
            return { kind: 'texture-list' };
        }
        if (rest[0] === 'extract') {
            if (rest[1] === undefined) {
                throw new Error('texture extract needs the name of a texture');
            }
            return { kind: 'texture-extract', texture: rest[1], info, render };
        }
        throw new Error(`unknown texture command ${JSON.stringify(rest[0] ?? '')}; use list or extract`);
    default:
        throw new Error(`unknown command ${JSON.stringify(command ?? '')}; use flat, sprite or texture`);
    }
}

/** Flags that take a value, by every spelling */
const VALUE_FLAGS = new Map<string, string>([
    ['-p', 'palette'], ['--palette', 'palette'],
    ['-c', 'colormap'], ['--colormap', 'colormap'],
    ['-s', 'scale'], ['--scale', 'scale'],
    ['-o', 'output'], ['--output', 'output'],
    ['--config', 'config'],
    ['--canvas', 'canvas'],
    ['--pos', 'pos'],
    ['-f', 'format'], ['--format', 'format'],
    ['-b', 'background'], ['--background', 'background'],
]);

const SWITCHES = new Map<string, string>([
    ['-I', 'info'], ['--info', 'info'],
    ['-a', 'anamorphic'], ['--anamorphic', 'anamorphic'],
    ['-v', 'verbose'], ['--verbose', 'verbose'],
    ['-h', 'help'], ['--help', 'help'],
]);

export function parseArgs(args: string[]): CliOptions {
    const flags = new Map<string, string | true>();
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        const valueFlag = VALUE_FLAGS.get(arg);
        const switchFlag = SWITCHES.get(arg);

        if (valueFlag) {
            flags.set(valueFlag, requireValue(arg, args[++i]));
        } else if (switchFlag) {
            flags.set(switchFlag, true);
        } else if (arg.startsWith('-') && !/^-\d/.test(arg)) {
            throw new Error(`unknown option ${arg}`);
        } else {
            positional.push(arg);
        }
    }

    const help = flags.has('help');
    const options: CliOptions = {
        input: positional[0] ?? '',
        name: positional[1] ?? '',
        command: null,
        verbose: flags.has('verbose'),
        help,
    };

    if (help || positional.length < 3) {
        return options;
    }

    options.command = parseCommand(positional.slice(2), flags);

    const palette = flags.get('palette');
    if (typeof palette === 'string') {
        options.palette = parseNumber('--palette', palette, 0, 255);
    }
    const colormap = flags.get('colormap');
    if (typeof colormap === 'string') {
        options.colormap = parseNumber('--colormap', colormap, 0, 255);
    }
    const scale = flags.get('scale');
    if (typeof scale === 'string') {
        options.scale = parseNumber('--scale', scale, 1, 64);
    }
    const output = flags.get('output');
    if (typeof output === 'string') {
        options.output = output;
    }
    const config = flags.get('config');
    if (typeof config === 'string') {
        options.config = config;
    }

    return options;
}

export const HELP_TEXT = `
wad-gfx - Extract graphics from Doom WAD files

Usage:
  wad-gfx <input.wad> <name> <command> [options]

Commands:
  flat                     Extract the flat <name>
  sprite                   Extract the sprite <name>
  texture list             List the textures in the texture directory <name>
  texture extract <tex>    Extract texture <tex> from the texture directory <name>

Options:
  -p, --palette <n>        PLAYPAL bank (default from config: 0)
  -c, --colormap <n>       COLORMAP bank (default from config: 0)
  -s, --scale <n>          Integer scale, nearest neighbour (default from config: 2)
  -o, --output <file>      Output file (default: <name>.png, lowercased)
      --config <file>      Config file (default: config/wad-gfx.yaml)
  -v, --verbose            Debug logging
  -h, --help               Show this help message

Sprite and texture options:
      --canvas WxH         Canvas size; defaults to the size of the sprite
      --pos X,Y            Place the hotspot here; defaults to the hotspot
  -I, --info               Print information instead of writing an image
  -f, --format <fmt>       full/f, indexed/i or mask/m
  -b, --background <n>     Background colour index; required for indexed
  -a, --anamorphic         Keep the 5:6 source pixels and record them in the PNG

Examples:
  wad-gfx doom.wad FLOOR0_1 flat -s 4
  wad-gfx doom.wad TROOA1 sprite --canvas 64x64 --pos 32,60
  wad-gfx doom.wad TEXTURE1 texture extract STARTAN3 -f indexed -b 0
`;
