import { BinaryReader } from '../file/binary-reader';
import { LUMP_NAME_LENGTH } from '../wad/lump-name';
import { MalformedAssetError } from './errors';

/**
 * Parse a PNAMES lump: a 4 byte count followed by that many 8 byte names.
 * The names are views on [data] with their padding intact.
 */
export function parsePnames(data: Uint8Array, name = 'PNAMES'): Uint8Array[] {
    const reader = new BinaryReader(data, 0, null, name);
    const count = reader.readSignedIntLE();

    if (count < 0 || reader.remaining() < count * LUMP_NAME_LENGTH) {
        throw new MalformedAssetError(name,
            `${count} names do not fit into ${data.length} bytes`);
    }

    const names: Uint8Array[] = [];
    for (let i = 0; i < count; i++) {
        names.push(reader.readBytes(LUMP_NAME_LENGTH));
    }

    return names;
}
