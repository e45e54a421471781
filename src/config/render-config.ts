/**
 * Export defaults, loaded from a YAML file and validated into a RenderConfig.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { EXPORT_FORMATS } from '@/resources/gfx/render/sprite-image';
import type { ExportFormat } from '@/resources/gfx/render/sprite-image';
import { LogType } from '@/utilities/log-manager';

export interface Size {
    width: number;
    height: number;
}

export interface RenderConfig {
    /** PLAYPAL bank */
    palette: number;
    /** COLORMAP bank */
    colormap: number;
    scale: number;
    format: ExportFormat;
    anamorphic: boolean;
    designResolution: Size;
    displayAspect: Size;
    logLevel: LogType;
}

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze<RenderConfig>({
    palette: 0,
    colormap: 0,
    scale: 2,
    format: 'full',
    anamorphic: false,
    designResolution: { width: 320, height: 200 },
    displayAspect: { width: 4, height: 3 },
    logLevel: LogType.Info,
});

/** The config file shipped with the tool */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/wad-gfx.yaml', import.meta.url));

const LOG_LEVELS = new Map<string, LogType>([
    ['error', LogType.Error],
    ['warn', LogType.Warn],
    ['info', LogType.Info],
    ['debug', LogType.Debug],
]);

const CONFIG_KEYS = [
    'palette', 'colormap', 'scale', 'format', 'anamorphic',
    'designResolution', 'displayAspect', 'logLevel',
] as const;

type ConfigKey = typeof CONFIG_KEYS[number];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigKey(key: string): key is ConfigKey {
    return CONFIG_KEYS.some(k => k === key);
}

function isExportFormat(value: unknown): value is ExportFormat {
    return EXPORT_FORMATS.some(f => f === value);
}

function parseInteger(key: string, value: unknown, min: number): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
        throw new Error(`Invalid "${key}" in config: ${JSON.stringify(value)}. Valid values: integers >= ${min}`);
    }
    return value;
}

function parseSize(key: string, value: unknown): Size {
    if (!Array.isArray(value) || value.length !== 2) {
        throw new Error(`Invalid "${key}" in config: ${JSON.stringify(value)}. Valid values: [width, height]`);
    }
    return {
        width: parseInteger(key, value[0], 1),
        height: parseInteger(key, value[1], 1),
    };
}

function parseLogLevel(value: unknown): LogType {
    const level = typeof value === 'string' ? LOG_LEVELS.get(value) : undefined;
    if (level === undefined) {
        throw new Error(`Invalid "logLevel" in config: ${JSON.stringify(value)}. Valid values: ${[...LOG_LEVELS.keys()].join(', ')}`);
    }
    return level;
}

/**
 * Parse a YAML config document and merge it over the defaults. Keys that
 * are absent keep their default; unknown keys are rejected.
 */
export function loadRenderConfig(yamlText: string): RenderConfig {
    const doc: unknown = parseYaml(yamlText);
    const config: RenderConfig = {
        ...DEFAULT_RENDER_CONFIG,
        designResolution: { ...DEFAULT_RENDER_CONFIG.designResolution },
        displayAspect: { ...DEFAULT_RENDER_CONFIG.displayAspect },
    };

    // an empty document is all defaults
    if (doc === null || doc === undefined) {
        return config;
    }
    if (!isRecord(doc)) {
        throw new Error('Config must be a mapping of keys to values');
    }

    for (const [key, value] of Object.entries(doc)) {
        if (!isConfigKey(key)) {
            throw new Error(`Unknown key in config: "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
        }

        switch (key) {
        case 'palette':
        case 'colormap':
            config[key] = parseInteger(key, value, 0);
            break;
        case 'scale':
            config.scale = parseInteger(key, value, 1);
            break;
        case 'format':
            if (!isExportFormat(value)) {
                throw new Error(`Invalid "format" in config: ${JSON.stringify(value)}. Valid values: ${EXPORT_FORMATS.join(', ')}`);
            }
            config.format = value;
            break;
        case 'anamorphic':
            if (typeof value !== 'boolean') {
                throw new Error(`Invalid "anamorphic" in config: ${JSON.stringify(value)}. Valid values: true, false`);
            }
            config.anamorphic = value;
            break;
        case 'designResolution':
        case 'displayAspect':
            config[key] = parseSize(key, value);
            break;
        case 'logLevel':
            config.logLevel = parseLogLevel(value);
            break;
        }
    }

    return config;
}

export async function readRenderConfigFile(path: string = DEFAULT_CONFIG_PATH): Promise<RenderConfig> {
    const text = await readFile(path, 'utf8');
    return loadRenderConfig(text);
}
