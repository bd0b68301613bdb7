import { Arena, Cell, NodeId, makeArena } from '../arena';
import { TrieError, invariantError } from '../errors';
import { Logger, silentLogger } from '../logger';
import { Alphabet, defaultAlphabet } from './alphabet';

export { makeAlphabet, defaultAlphabet } from './alphabet';
export type { Alphabet, CaseSensitivity } from './alphabet';

export interface Payload<Value> {
    value: Value;
}

export interface TrieNode<Value> {
    readonly id: NodeId;
    payload: Payload<Value> | undefined;
    readonly branches: (NodeId | undefined)[];
    // Set when the node is pruned, so that callers still holding its cell know to look again.
    detached: boolean;
}

export interface Trie<Value> {
    arena: Arena<TrieNode<Value>>;
    alphabet: Alphabet;
    root: NodeId;
    count: number;
    logger: Logger;
}

export interface TrieOptions {
    logger?: Logger;
}

type Collision<Value> = { type: 'reject' } | { type: 'apply'; combine: (previous: Value) => Value };

type InsertStep<Value> = { type: 'detached' } | { type: 'done'; previous: Payload<Value> | undefined };

interface RemoveStep<Value> {
    value: Value;
    pruned: boolean;
}

const detachedStep = { type: 'detached' } as const;

function resolve<Value>(trie: Trie<Value>, id: NodeId): Cell<TrieNode<Value>> {
    const cell = trie.arena.getNode(id);
    if (cell === undefined) {
        throw invariantError(trie.logger, `Trie node ${id} is missing from the arena.`);
    }
    return cell;
}

function addNode<Value>(trie: Trie<Value>, arity: number): Cell<TrieNode<Value>> {
    const id = trie.arena.newId();
    const cell = trie.arena.addNode({
        id,
        payload: undefined,
        branches: new Array<NodeId | undefined>(arity).fill(undefined),
        detached: false
    });
    trie.logger.debug(`Created trie node ${id}.`);
    return cell;
}

export function isTerminal(node: TrieNode<unknown>): boolean {
    return node.payload !== undefined;
}

export function isLeaf(node: TrieNode<unknown>): boolean {
    return node.branches.every((branch) => branch === undefined);
}

/**
 * Detaches `node` and removes it from the arena if it holds nothing and is not the root. Must be
 * called under the node's write lock.
 */
function prune<Value>(trie: Trie<Value>, node: TrieNode<Value>): boolean {
    if (node.id === trie.root || node.detached || isTerminal(node) || !isLeaf(node)) {
        return false;
    }
    if (trie.arena.getNode(node.id) === undefined) {
        throw invariantError(trie.logger, `Trie node ${node.id} is missing from the arena.`);
    }
    node.detached = true;
    trie.arena.deleteNode(node.id);
    trie.logger.debug(`Pruned trie node ${node.id}.`);
    return true;
}

function notFound(sequence: string): TrieError {
    return new TrieError('NotFound', `Sequence '${sequence}' was not found.`);
}

async function childFor<Value>(trie: Trie<Value>, cell: Cell<TrieNode<Value>>, index: number): Promise<Cell<TrieNode<Value>> | undefined> {
    return cell.lock.write(() => {
        const node = cell.node;
        if (node.detached) {
            return undefined;
        }
        const childId = node.branches[index];
        if (childId !== undefined) {
            const child = trie.arena.getNode(childId);
            if (child !== undefined) {
                return child;
            }
            // Pruned by a removal that has not cleared this slot yet.
        }
        const child = addNode(trie, node.branches.length);
        node.branches[index] = child.node.id;
        return child;
    });
}

async function insertAt<Value>(
    trie: Trie<Value>,
    cell: Cell<TrieNode<Value>>,
    sequence: string,
    symbols: number[],
    depth: number,
    value: Value,
    collision: Collision<Value>
): Promise<InsertStep<Value>> {
    if (depth === symbols.length) {
        return cell.lock.write((): InsertStep<Value> => {
            const node = cell.node;
            if (node.detached) {
                return detachedStep;
            }
            if (node.payload === undefined) {
                node.payload = { value };
                trie.count += 1;
                return { type: 'done', previous: undefined };
            }
            if (collision.type === 'reject') {
                throw new TrieError('AlreadyExists', `Sequence '${sequence}' already exists.`);
            }
            const previous = node.payload;
            node.payload = { value: collision.combine(previous.value) };
            return { type: 'done', previous };
        });
    }
    for (;;) {
        const child = await childFor(trie, cell, symbols[depth]);
        if (child === undefined) {
            return detachedStep;
        }
        const step = await insertAt(trie, child, sequence, symbols, depth + 1, value, collision);
        if (step.type === 'done') {
            return step;
        }
        // Pruned between resolving and locking it; take the branch again.
        trie.logger.warn(`Trie node ${child.node.id} was pruned before an insert reached it.`);
    }
}

async function insertWith<Value>(trie: Trie<Value>, sequence: string, value: Value, collision: Collision<Value>): Promise<Value | undefined> {
    const symbols = trie.alphabet.encode(sequence);
    const step = await insertAt(trie, resolve(trie, trie.root), sequence, symbols, 0, value, collision);
    if (step.type === 'detached') {
        throw invariantError(trie.logger, 'Trie root was detached.');
    }
    return step.previous?.value;
}

async function findAt<Value>(trie: Trie<Value>, symbols: number[]): Promise<Payload<Value> | undefined> {
    let cell = resolve(trie, trie.root);
    for (const index of symbols) {
        const current = cell;
        const childId = await current.lock.read(() => current.node.detached ? undefined : current.node.branches[index]);
        if (childId === undefined) {
            return undefined;
        }
        const child = trie.arena.getNode(childId);
        if (child === undefined) {
            return undefined;
        }
        cell = child;
    }
    const last = cell;
    return last.lock.read(() => {
        const { detached, payload } = last.node;
        return detached || payload === undefined ? undefined : { value: payload.value };
    });
}

async function removeAt<Value>(trie: Trie<Value>, cell: Cell<TrieNode<Value>>, sequence: string, symbols: number[], depth: number): Promise<RemoveStep<Value>> {
    // A detached node held nothing when it was pruned, so meeting one means the sequence was absent.
    if (depth === symbols.length) {
        return cell.lock.write(() => {
            const node = cell.node;
            if (node.detached || node.payload === undefined) {
                throw notFound(sequence);
            }
            const value = node.payload.value;
            node.payload = undefined;
            trie.count -= 1;
            return { value, pruned: prune(trie, node) };
        });
    }
    const index = symbols[depth];
    const childId = await cell.lock.read(() => cell.node.detached ? undefined : cell.node.branches[index]);
    if (childId === undefined) {
        throw notFound(sequence);
    }
    const child = trie.arena.getNode(childId);
    if (child === undefined) {
        throw notFound(sequence);
    }
    const step = await removeAt(trie, child, sequence, symbols, depth + 1);
    if (!step.pruned) {
        return step;
    }
    return cell.lock.write(() => {
        const node = cell.node;
        if (node.branches[index] === childId) {
            node.branches[index] = undefined;
        }
        return { value: step.value, pruned: prune(trie, node) };
    });
}

/**
 * Stores `value` under `sequence`. Rejects with an `AlreadyExists` error if the sequence is
 * already present.
 */
export async function insert<Value>(trie: Trie<Value>, sequence: string, value: Value): Promise<void> {
    await insertWith(trie, sequence, value, { type: 'reject' });
}

/**
 * Stores `value` under `sequence`, replacing any previous value. Resolves with the previous value.
 */
export function insertOrUpdate<Value>(trie: Trie<Value>, sequence: string, value: Value): Promise<Value | undefined> {
    return insertWith(trie, sequence, value, { type: 'apply', combine: () => value });
}

/**
 * Stores `value` under `sequence`, or `combine(previous)` when the sequence is already present.
 * Resolves with the previous value.
 */
export function insertOrApply<Value>(trie: Trie<Value>, sequence: string, value: Value, combine: (previous: Value) => Value): Promise<Value | undefined> {
    return insertWith(trie, sequence, value, { type: 'apply', combine });
}

export async function find<Value>(trie: Trie<Value>, sequence: string): Promise<Value | undefined> {
    if (isEmpty(trie)) {
        return undefined;
    }
    const payload = await findAt(trie, trie.alphabet.encode(sequence));
    return payload?.value;
}

export async function contains<Value>(trie: Trie<Value>, sequence: string): Promise<boolean> {
    if (isEmpty(trie)) {
        return false;
    }
    return await findAt(trie, trie.alphabet.encode(sequence)) !== undefined;
}

/**
 * Removes `sequence` and resolves with its value. Nodes left holding nothing are pruned, up to but
 * excluding the root.
 */
export async function remove<Value>(trie: Trie<Value>, sequence: string): Promise<Value> {
    if (isEmpty(trie)) {
        throw new TrieError('NotFound', `Sequence '${sequence}' was not found because the trie is empty.`);
    }
    const symbols = trie.alphabet.encode(sequence);
    const step = await removeAt(trie, resolve(trie, trie.root), sequence, symbols, 0);
    return step.value;
}

export function size<Value>(trie: Trie<Value>): number {
    return trie.count;
}

export function isEmpty<Value>(trie: Trie<Value>): boolean {
    return trie.count === 0;
}

export function makeTrie<Value>(alphabet: Alphabet = defaultAlphabet(), options: TrieOptions = {}): Trie<Value> {
    const arena = makeArena<TrieNode<Value>>();
    const root = arena.newId();
    arena.addNode({
        id: root,
        payload: undefined,
        branches: new Array<NodeId | undefined>(alphabet.cardinality).fill(undefined),
        detached: false
    });
    return {
        arena,
        alphabet,
        root,
        count: 0,
        logger: options.logger ?? silentLogger
    };
}
