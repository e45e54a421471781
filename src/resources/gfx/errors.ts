/**
 * Failures raised while decoding or encoding WAD graphics.
 *
 * None of these are transient: the same bytes always fail the same way,
 * so callers report them and move on.
 */
export class GfxFormatError extends Error {
    constructor(msg: string) {
        super(msg);
        this.name = new.target.name;
    }
}

/** The bytes are shorter than, or inconsistent with, the structure they declare */
export class MalformedAssetError extends GfxFormatError {
    public readonly source: string;

    constructor(source: string, msg: string) {
        super(`${source}: ${msg}`);
        this.source = source;

        Object.seal(this);
    }
}

/** A field holds a value this asset family never uses */
export class UnsupportedFieldError extends GfxFormatError {
    public readonly field: string;
    public readonly value: number;
    public readonly expected: number;

    constructor(source: string, field: string, value: number, expected: number) {
        super(`${source}: unsupported ${field} ${value} (expected ${expected})`);
        this.field = field;
        this.value = value;
        this.expected = expected;

        Object.seal(this);
    }
}

/** A texture references a patch the provider cannot supply */
export class UnresolvedPatchError extends GfxFormatError {
    public readonly patchId: number;
    public readonly patchName: string | undefined;

    constructor(texture: string, patchId: number, patchName?: string) {
        const what = patchName ? `${patchName} (#${patchId})` : `#${patchId}`;
        super(`${texture}: cannot resolve patch ${what}`);
        this.patchId = patchId;
        this.patchName = patchName;

        Object.seal(this);
    }
}

/** A composited run does not fit into a post */
export class UnencodableRunError extends GfxFormatError {
    public readonly column: number;
    public readonly start: number;
    public readonly length: number;

    constructor(column: number, start: number, length: number, reason: string) {
        super(`column ${column}: run at row ${start} of ${length} pixels ${reason}`);
        this.column = column;
        this.start = start;
        this.length = length;

        Object.seal(this);
    }
}
