export type Point = [number, number];

// Min/max pair per dimension: [minX, maxX, minY, maxY].
export type Bounds = [number, number, number, number];

export function makeBounds(min: Point, max: Point): Bounds {
    return [min[0], max[0], min[1], max[1]];
}

export function equals(a: Point, b: Point): boolean {
    return a[0] === b[0] && a[1] === b[1];
}

function within(min: number, max: number, value: number): boolean {
    return min <= value && value < max;
}

function overlaps(minA: number, maxA: number, minB: number, maxB: number): boolean {
    return minA <= maxB && minB <= maxA;
}

/**
 * Half open: the minimum belongs to the box, the maximum does not, so a point on a subdivision
 * line lands in exactly one quadrant. A NaN coordinate is never contained.
 */
export function contains(bounds: Bounds, point: Point): boolean {
    return within(bounds[0], bounds[1], point[0]) && within(bounds[2], bounds[3], point[1]);
}

// Closed on every side; a NaN edge overlaps nothing.
export function intersects(a: Bounds, b: Bounds): boolean {
    return overlaps(a[0], a[1], b[0], b[1]) && overlaps(a[2], a[3], b[2], b[3]);
}

export function midpoint(bounds: Bounds): Point {
    return [(bounds[0] + bounds[1]) / 2, (bounds[2] + bounds[3]) / 2];
}

/**
 * Splits `bounds` at `pivot` into four quadrants, ordered south-west, south-east, north-east,
 * north-west.
 */
export function subdivide(bounds: Bounds, pivot: Point): [Bounds, Bounds, Bounds, Bounds] {
    const [minX, maxX, minY, maxY] = bounds;
    const [x, y] = pivot;
    return [
        [minX, x, minY, y],
        [x, maxX, minY, y],
        [x, maxX, y, maxY],
        [minX, x, y, maxY]
    ];
}
