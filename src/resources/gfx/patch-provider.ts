import { LogHandler } from '@/utilities/log-handler';
import { lumpNameToString } from '../wad/lump-name';
import { ILumpSource } from '../wad/wad-file-reader';
import { Sprite } from './sprite';

/** Resolves the patch ids used by texture records to decoded patches */
export interface IPatchProvider {
    /** undefined when the id is not in PNAMES or no lump carries that name */
    patch(patchId: number): Sprite | undefined;

    patchName(patchId: number): string | undefined;
}

/** Looks the patch up in the container every time it is asked for */
export class LazyPatchProvider implements IPatchProvider {
    private static log = new LogHandler('LazyPatchProvider');
    private readonly names: string[];

    constructor(private readonly lumps: ILumpSource, pnames: Uint8Array[]) {
        this.names = pnames.map(lumpNameToString);

        Object.seal(this);
    }

    public patchName(patchId: number): string | undefined {
        return this.names[patchId];
    }

    public patch(patchId: number): Sprite | undefined {
        const name = this.names[patchId];
        if (name === undefined) {
            return undefined;
        }

        const bytes = this.lumps.lumpByName(name);
        if (!bytes) {
            LazyPatchProvider.log.debug(`patch ${name} (#${patchId}) not found`);
            return undefined;
        }

        return new Sprite(bytes, name);
    }
}

/**
 * Resolves and decodes every PNAMES entry once, up front. A patch lump that
 * fails to decode fails the construction.
 */
export class EagerPatchProvider implements IPatchProvider {
    private static log = new LogHandler('EagerPatchProvider');
    private readonly names: string[];
    private readonly patches: (Sprite | undefined)[];

    constructor(lumps: ILumpSource, pnames: Uint8Array[]) {
        this.names = pnames.map(lumpNameToString);
        this.patches = this.names.map((name) => {
            const bytes = lumps.lumpByName(name);
            return bytes ? new Sprite(bytes, name) : undefined;
        });

        const missing = this.patches.filter((p) => p === undefined).length;
        if (missing > 0) {
            EagerPatchProvider.log.warn(`${missing} of ${this.names.length} patches have no lump`);
        }

        Object.seal(this);
    }

    public patchName(patchId: number): string | undefined {
        return this.names[patchId];
    }

    public patch(patchId: number): Sprite | undefined {
        return this.patches[patchId];
    }
}
