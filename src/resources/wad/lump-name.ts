/** Lump names are at most 8 characters, NUL padded on disk, matched case-insensitively */
export const LUMP_NAME_LENGTH = 8;

/** Text of a raw 8 byte name: up to the first NUL, trailing spaces dropped, uppercased */
export function lumpNameToString(raw: Uint8Array): string {
    let result = '';

    for (let i = 0; i < raw.length && i < LUMP_NAME_LENGTH; i++) {
        const c = raw[i];
        if (c === 0) {
            break;
        }
        result += String.fromCharCode(c);
    }

    return result.trimEnd().toUpperCase();
}

/**
 * Normalise a user supplied lump name. Returns null for names that cannot
 * exist in a WAD directory (empty, too long or not printable ASCII).
 */
export function parseLumpName(name: string): string | null {
    if (name.length === 0 || name.length > LUMP_NAME_LENGTH) {
        return null;
    }

    if (!/^[\x21-\x7e]+$/.test(name)) {
        return null;
    }

    return name.toUpperCase();
}
