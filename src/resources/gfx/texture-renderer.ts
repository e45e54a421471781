import { LogHandler } from '@/utilities/log-handler';
import { lumpNameToString } from '../wad/lump-name';
import { UnresolvedPatchError } from './errors';
import { IPatchProvider } from './patch-provider';
import { SpriteCanvas } from './sprite-canvas';
import { Texture } from './texture';

const log = new LogHandler('TextureRenderer');

/**
 * Compose [texture] from its patches, in list order, and encode the result
 * as a sprite with its hotspot at (0, 0). The whole texture fails on the
 * first patch that cannot be resolved.
 */
export function renderTexture(texture: Texture, patches: IPatchProvider): Uint8Array {
    const canvas = new SpriteCanvas(texture.width, texture.height);

    for (const record of texture.patches()) {
        const sprite = patches.patch(record.patchId);
        if (!sprite) {
            throw new UnresolvedPatchError(texture.displayName, record.patchId, patches.patchName(record.patchId));
        }

        // the record places the patch's top-left corner; drawPatch places its hotspot
        canvas.drawPatch(record.originX + sprite.left, record.originY + sprite.top, sprite);
    }

    log.debug(`rendered ${texture.toString()}`);

    return canvas.makeSprite();
}

/** Texture definition in DeuTex text form */
export function describeTexture(texture: Texture, pnames: Uint8Array[]): string {
    const lines = [
        '; TextureName Width Height',
        `${texture.displayName} ${texture.width} ${texture.height}`,
        '; PatchName Xoffset Yoffset',
    ];

    for (const record of texture.patches()) {
        const raw = pnames[record.patchId];
        const name = raw ? lumpNameToString(raw) : `#${record.patchId}`;
        lines.push(`* ${name} ${record.originX} ${record.originY}`);
    }

    return lines.join('\n') + '\n';
}
