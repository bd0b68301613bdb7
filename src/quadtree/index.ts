import { Arena, Cell, NodeId, makeArena } from '../arena';
import { invariantError } from '../errors';
import { Logger, silentLogger } from '../logger';
import { Bounds, Point, contains, equals, intersects, subdivide } from './bounds';

export type { Bounds, Point } from './bounds';

export interface PointEntry<Payload> {
    point: Point;
    payload: Payload;
}

// Ordered south-west, south-east, north-east, north-west.
export type Quadrants = [NodeId, NodeId, NodeId, NodeId];

export interface Quad<Payload> {
    readonly id: NodeId;
    readonly bounds: Bounds;
    entry: PointEntry<Payload> | undefined;
    children: Quadrants | undefined;
}

export interface Quadtree<Payload> {
    arena: Arena<Quad<Payload>>;
    root: NodeId;
    count: number;
    logger: Logger;
}

export interface QuadtreeOptions {
    logger?: Logger;
}

function resolve<Payload>(tree: Quadtree<Payload>, id: NodeId): Cell<Quad<Payload>> {
    const cell = tree.arena.getNode(id);
    if (cell === undefined) {
        throw invariantError(tree.logger, `Quad ${id} is missing from the arena.`);
    }
    return cell;
}

function addQuad<Payload>(tree: Quadtree<Payload>, bounds: Bounds): NodeId {
    const id = tree.arena.newId();
    tree.arena.addNode({ id, bounds, entry: undefined, children: undefined });
    return id;
}

function copyEntry<Payload>(entry: PointEntry<Payload>): PointEntry<Payload> {
    return { point: [entry.point[0], entry.point[1]], payload: entry.payload };
}

function childContaining<Payload>(tree: Quadtree<Payload>, children: Quadrants, point: Point): NodeId {
    // Bounds never change after a quad is created, so they are read without taking the child's lock.
    const id = children.find((child) => contains(resolve(tree, child).node.bounds, point));
    if (id === undefined) {
        throw invariantError(tree.logger, `No quadrant contains (${point[0]}, ${point[1]}).`);
    }
    return id;
}

async function insertAt<Payload>(tree: Quadtree<Payload>, id: NodeId, entry: PointEntry<Payload>): Promise<boolean> {
    const cell = resolve(tree, id);
    // The write lock stays held while the child is visited, so inserts serialize at the root and
    // no reader sees a subdivision half built.
    return cell.lock.write(async () => {
        const quad = cell.node;
        if (!contains(quad.bounds, entry.point)) {
            return false;
        }
        if (quad.entry === undefined) {
            quad.entry = entry;
            tree.count += 1;
            return true;
        }
        const pivot = quad.entry.point;
        if (equals(pivot, entry.point)) {
            return false;
        }
        if (quad.children === undefined) {
            const [sw, se, ne, nw] = subdivide(quad.bounds, pivot);
            quad.children = [addQuad(tree, sw), addQuad(tree, se), addQuad(tree, ne), addQuad(tree, nw)];
            tree.logger.debug(`Subdivided quad ${quad.id} at (${pivot[0]}, ${pivot[1]}).`);
        }
        return insertAt(tree, childContaining(tree, quad.children, entry.point), entry);
    });
}

async function findAt<Payload>(tree: Quadtree<Payload>, id: NodeId, point: Point): Promise<PointEntry<Payload> | undefined> {
    const cell = resolve(tree, id);
    return cell.lock.read(async () => {
        const quad = cell.node;
        if (!contains(quad.bounds, point) || quad.entry === undefined) {
            return undefined;
        }
        if (equals(quad.entry.point, point)) {
            return copyEntry(quad.entry);
        }
        if (quad.children === undefined) {
            return undefined;
        }
        return findAt(tree, childContaining(tree, quad.children, point), point);
    });
}

async function searchAt<Payload>(tree: Quadtree<Payload>, id: NodeId, searchBounds: Bounds): Promise<PointEntry<Payload>[]> {
    const cell = resolve(tree, id);
    return cell.lock.read(async () => {
        const quad = cell.node;
        if (!intersects(quad.bounds, searchBounds)) {
            return [];
        }
        const results: PointEntry<Payload>[] = [];
        if (quad.entry !== undefined && contains(searchBounds, quad.entry.point)) {
            results.push(copyEntry(quad.entry));
        }
        if (quad.children !== undefined) {
            const searchResults = await Promise.all(quad.children.map((child) => searchAt(tree, child, searchBounds)));
            for (const result of searchResults) {
                results.push(...result);
            }
        }
        return results;
    });
}

/**
 * Stores `payload` at `point`. Resolves with `false`, leaving the tree untouched, when the point
 * lies outside the tree's bounds or is already stored.
 */
export function insert<Payload>(tree: Quadtree<Payload>, point: Point, payload: Payload): Promise<boolean> {
    return insertAt(tree, tree.root, { point: [point[0], point[1]], payload });
}

export function find<Payload>(tree: Quadtree<Payload>, point: Point): Promise<PointEntry<Payload> | undefined> {
    return findAt(tree, tree.root, point);
}

/**
 * Returns every stored point inside `searchBounds`, in south-west, south-east, north-east,
 * north-west pre-order.
 */
export function findWithin<Payload>(tree: Quadtree<Payload>, searchBounds: Bounds): Promise<PointEntry<Payload>[]> {
    return searchAt(tree, tree.root, searchBounds);
}

export function size<Payload>(tree: Quadtree<Payload>): number {
    return tree.count;
}

export function makeQuadtree<Payload>(bounds: Bounds, options: QuadtreeOptions = {}): Quadtree<Payload> {
    const arena = makeArena<Quad<Payload>>();
    const root = arena.newId();
    arena.addNode({ id: root, bounds: [bounds[0], bounds[1], bounds[2], bounds[3]], entry: undefined, children: undefined });
    return {
        arena,
        root,
        count: 0,
        logger: options.logger ?? silentLogger
    };
}
