/** Half-open integer range [start, end) */
export interface Range {
    start: number;
    end: number;
}

export function range(start: number, end: number): Range {
    return { start, end };
}

export function add(r: Range, d: number): Range {
    return { start: r.start + d, end: r.end + d };
}

export function intersect(a: Range, b: Range): Range {
    return { start: Math.max(a.start, b.start), end: Math.min(a.end, b.end) };
}

export function rangeLength(r: Range): number {
    return Math.max(0, r.end - r.start);
}

export function isEmpty(r: Range): boolean {
    return r.end <= r.start;
}
