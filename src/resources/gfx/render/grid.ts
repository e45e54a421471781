/** A row-major width x height raster of arbitrary cells */
export class Grid<T> {
    public readonly width: number;
    public readonly height: number;
    public readonly data: T[];

    constructor(width: number, height: number, fill: T | ((x: number, y: number) => T)) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
            throw new RangeError(`invalid grid size ${width}x${height}`);
        }

        this.width = width;
        this.height = height;
        this.data = new Array<T>(width * height);

        if (isCellFactory(fill)) {
            for (let y = 0; y < height; y++) {
                for (let x = 0; x < width; x++) {
                    this.data[y * width + x] = fill(x, y);
                }
            }
        } else {
            this.data.fill(fill);
        }

        Object.seal(this);
    }

    public get(x: number, y: number): T {
        return this.data[y * this.width + x];
    }

    public set(x: number, y: number, value: T): void {
        this.data[y * this.width + x] = value;
    }

    public map<U>(fn: (value: T) => U): Grid<U> {
        return new Grid<U>(this.width, this.height, (x, y) => fn(this.get(x, y)));
    }

    /** Row [y] as a fresh array */
    public row(y: number): T[] {
        return this.data.slice(y * this.width, (y + 1) * this.width);
    }

    /** Column [x] as a fresh array */
    public column(x: number): T[] {
        const cells = new Array<T>(this.height);
        for (let y = 0; y < this.height; y++) {
            cells[y] = this.data[y * this.width + x];
        }
        return cells;
    }
}

function isCellFactory<T>(fill: T | ((x: number, y: number) => T)): fill is (x: number, y: number) => T {
    return typeof fill === 'function';
}
