#!/usr/bin/env npx tsx

/**
 * wad-gfx: extract flats, sprites and textures from Doom WAD files as PNG.
 *
 * Usage:
 *   npx tsx scripts/wad-gfx/cli.ts <input.wad> <name> <command> [options]
 *
 * Examples:
 *   # A flat at 4x
 *   npx tsx scripts/wad-gfx/cli.ts doom.wad FLOOR0_1 flat -s 4
 *
 *   # Sprite size and hotspot
 *   npx tsx scripts/wad-gfx/cli.ts doom.wad TROOA1 sprite --info
 *
 *   # A wall texture, composed from its patches
 *   npx tsx scripts/wad-gfx/cli.ts doom.wad TEXTURE1 texture extract STARTAN3
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { readRenderConfigFile } from '@/config/render-config';
import type { RenderConfig } from '@/config/render-config';
import { encodePNG } from '@/resources/gfx/exporter/png-encoder';
import { WadFileReader } from '@/resources/wad/wad-file-reader';
import { LogHandler } from '@/utilities/log-handler';
import { LogType } from '@/utilities/log-manager';
import { runCommand } from './commands';
import { HELP_TEXT, parseArgs } from './options';
import type { CliOptions } from './options';

const log = new LogHandler('wad-gfx');

function printHelp(): void {
    console.log(HELP_TEXT);
}

/** Apply the command line overrides on top of the config file */
function withOverrides(config: RenderConfig, options: CliOptions): RenderConfig {
    return {
        ...config,
        palette: options.palette ?? config.palette,
        colormap: options.colormap ?? config.colormap,
        scale: options.scale ?? config.scale,
    };
}

async function readWad(filePath: string): Promise<WadFileReader> {
    const data = await fs.readFile(filePath);
    return new WadFileReader(new Uint8Array(data), path.basename(filePath));
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));

    if (options.help) {
        printHelp();
        return;
    }
    if (!options.command) {
        printHelp();
        process.exitCode = 1;
        return;
    }

    const config = withOverrides(await readRenderConfigFile(options.config), options);
    LogHandler.getLogManager().setConsoleLevel(options.verbose ? LogType.Debug : config.logLevel);

    const wad = await readWad(options.input);
    log.debug(wad.toString());

    const result = runCommand(wad, {
        name: options.name,
        command: options.command,
        config,
        output: options.output,
    });

    if (result.kind === 'text') {
        process.stdout.write(result.text);
        return;
    }

    const { image, storedAspect } = result.rendered;
    const png = await encodePNG(image, { pixelAspect: storedAspect });
    await fs.writeFile(result.filename, png);

    log.info(`Wrote ${result.filename} (${image.width}x${image.height})`);
}

main().catch((err: unknown) => {
    if (err instanceof Error) {
        log.error(err.message);
        log.debug('stack trace', err);
    } else {
        log.error(String(err));
    }
    process.exitCode = 1;
});
