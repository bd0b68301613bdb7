import { ArenaError, InvariantError } from '../errors';
import { ReadWriteLock } from './lock';
import { Identified, NodeId, isNodeId } from './node-id';

export { ReadWriteLock } from './lock';
export { isNodeId } from './node-id';
export type { Identified, NodeId } from './node-id';

/**
 * Shared storage for a single node. The arena table and every caller that resolved the cell hold
 * the same object; the node's fields are guarded by `lock`.
 */
export interface Cell<Node> {
    readonly lock: ReadWriteLock;
    readonly node: Node;
}

/**
 * Table from identity to lockable node storage, plus identity issuance. Knows nothing about tree
 * topology.
 *
 * Table operations are synchronous and therefore never interleave with each other or wait on a
 * node's lock.
 */
export interface Arena<Node extends Identified> {
    readonly size: number;
    newId(): NodeId;
    addNode(node: Node): Cell<Node>;
    getNode(id: NodeId): Cell<Node> | undefined;
    getNodeWeak(id: NodeId): WeakRef<Cell<Node>> | undefined;
    deleteNode(id: NodeId): void;
}

export function makeArena<Node extends Identified>(): Arena<Node> {
    const cells = new Map<NodeId, Cell<Node>>();
    let counter = 0;

    return {
        get size() {
            return cells.size;
        },
        newId() {
            const id = counter;
            if (!isNodeId(id)) {
                throw new InvariantError(`Identity ${id} cannot be issued.`);
            }
            counter += 1;
            return id;
        },
        addNode(node) {
            if (cells.has(node.id)) {
                throw new ArenaError('DuplicateIdentity', node.id);
            }
            const cell: Cell<Node> = { lock: new ReadWriteLock(), node };
            cells.set(node.id, cell);
            return cell;
        },
        getNode(id) {
            return cells.get(id);
        },
        getNodeWeak(id) {
            const cell = cells.get(id);
            if (cell === undefined) {
                return undefined;
            }
            return new WeakRef(cell);
        },
        deleteNode(id) {
            if (!cells.delete(id)) {
                throw new ArenaError('NotFound', id);
            }
        }
    };
}
