import { describe, expect, it, vi } from 'vitest';
import type { NodeId } from '../arena';
import { InvariantError, TrieError } from '../errors';
import { Logger } from '../logger';
import { makeAlphabet } from './alphabet';
import { Trie, contains, find, insert, insertOrApply, insertOrUpdate, isEmpty, makeTrie, remove, size } from './index';

function recordingLogger(messages: string[]): Logger {
    return {
        debug(message) {
            messages.push(`debug: ${message}`);
        },
        warn(message) {
            messages.push(`warn: ${message}`);
        },
        error(message) {
            messages.push(`error: ${message}`);
        }
    };
}

function childOf<Value>(trie: Trie<Value>, id: NodeId, symbol: string): NodeId | undefined {
    const index = trie.alphabet.indexOf(symbol);
    const node = trie.arena.getNode(id)?.node;
    return index === undefined || node === undefined ? undefined : node.branches[index];
}

describe('trie', () => {
    it('inserts, rejects duplicates and removes', async () => {
        const trie = makeTrie<string>();
        expect(await find(trie, 'hello')).toBeUndefined();
        expect(size(trie)).toBe(0);
        expect(isEmpty(trie)).toBe(true);

        await insert(trie, 'hello', 'x');
        expect(size(trie)).toBe(1);
        expect(await find(trie, 'hello')).toBe('x');

        await expect(insert(trie, 'hello', 'y')).rejects.toMatchObject({ code: 'AlreadyExists' });
        expect(size(trie)).toBe(1);
        expect(await find(trie, 'hello')).toBe('x');

        expect(await remove(trie, 'hello')).toBe('x');
        expect(size(trie)).toBe(0);
        await expect(remove(trie, 'hello')).rejects.toMatchObject({ code: 'NotFound' });
        expect(size(trie)).toBe(0);
    });

    it('replaces values with insertOrUpdate', async () => {
        const trie = makeTrie<number>();
        expect(await insertOrUpdate(trie, 'key', 1)).toBeUndefined();
        expect(await insertOrUpdate(trie, 'key', 2)).toBe(1);
        expect(size(trie)).toBe(1);
        expect(await find(trie, 'key')).toBe(2);
    });

    it('combines values with insertOrApply', async () => {
        const trie = makeTrie<number>();
        const increment = (previous: number) => previous + 1;
        expect(await insertOrApply(trie, 'word', 1, increment)).toBeUndefined();
        expect(await insertOrApply(trie, 'word', 1, increment)).toBe(1);
        expect(await insertOrApply(trie, 'word', 1, increment)).toBe(2);
        expect(await find(trie, 'word')).toBe(3);
        expect(size(trie)).toBe(1);
    });

    it('distinguishes prefixes from stored sequences', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'car', 1);
        await insert(trie, 'cart', 2);
        expect(await find(trie, 'ca')).toBeUndefined();
        expect(await contains(trie, 'ca')).toBe(false);
        expect(await contains(trie, 'car')).toBe(true);
        expect(await find(trie, 'carts')).toBeUndefined();
        await expect(remove(trie, 'ca')).rejects.toMatchObject({ code: 'NotFound' });
        await expect(remove(trie, 'cars')).rejects.toMatchObject({ code: 'NotFound' });
        expect(size(trie)).toBe(2);
    });

    it('prunes emptied nodes back to the nearest survivor', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'car', 1);
        await insert(trie, 'cart', 2);
        expect(trie.arena.size).toBe(5);

        expect(await remove(trie, 'cart')).toBe(2);
        expect(trie.arena.size).toBe(4);
        expect(await find(trie, 'car')).toBe(1);

        expect(await remove(trie, 'car')).toBe(1);
        expect(trie.arena.size).toBe(1);
        expect(childOf(trie, trie.root, 'c')).toBeUndefined();
    });

    it('keeps descendants when an inner sequence is removed', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'car', 1);
        await insert(trie, 'cart', 2);
        await remove(trie, 'car');
        expect(trie.arena.size).toBe(5);
        expect(await find(trie, 'cart')).toBe(2);
        expect(await contains(trie, 'car')).toBe(false);
    });

    it('behaves the same after a remove and reinsert', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'alpha', 1);
        await insert(trie, 'beta', 2);
        await remove(trie, 'alpha');
        await insert(trie, 'alpha', 1);
        expect(size(trie)).toBe(2);
        expect(await find(trie, 'alpha')).toBe(1);
        expect(await find(trie, 'beta')).toBe(2);
    });

    it('stores a value under the empty sequence at the root', async () => {
        const trie = makeTrie<number>();
        await insert(trie, '', 7);
        expect(await find(trie, '')).toBe(7);
        expect(await remove(trie, '')).toBe(7);
        expect(trie.arena.size).toBe(1);
        expect(isEmpty(trie)).toBe(true);
    });

    it('treats a stored undefined as present', async () => {
        const trie = makeTrie<number | undefined>();
        await insert(trie, 'a', undefined);
        expect(await contains(trie, 'a')).toBe(true);
        await expect(insert(trie, 'a', 1)).rejects.toMatchObject({ code: 'AlreadyExists' });
    });

    it('folds case according to its alphabet', async () => {
        const folded = makeTrie<number>();
        await insert(folded, 'Hello', 1);
        expect(await find(folded, 'hELLO')).toBe(1);

        const sensitive = makeTrie<number>(makeAlphabet('abAB', 'sensitive'));
        expect(sensitive.arena.getNode(sensitive.root)?.node.branches).toHaveLength(4);
        await insert(sensitive, 'aB', 1);
        expect(await find(sensitive, 'ab')).toBeUndefined();
        expect(await find(sensitive, 'aB')).toBe(1);
    });

    it('rejects symbols outside the alphabet', async () => {
        const trie = makeTrie<number>();
        await expect(insert(trie, 'no way', 1)).rejects.toBeInstanceOf(TrieError);
        await expect(insert(trie, 'no way', 1)).rejects.toMatchObject({ code: 'InvalidSymbol' });
        await insert(trie, 'ok', 1);
        await expect(find(trie, 'ok!')).rejects.toMatchObject({ code: 'InvalidSymbol' });
        await expect(remove(trie, 'ok!')).rejects.toMatchObject({ code: 'InvalidSymbol' });
        expect(size(trie)).toBe(1);
    });

    it('detaches pruned nodes that callers still hold', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'ab', 1);
        const a = childOf(trie, trie.root, 'a');
        const b = a === undefined ? undefined : childOf(trie, a, 'b');
        if (b === undefined) {
            throw new Error('Node b was not created.');
        }
        const held = trie.arena.getNodeWeak(b)?.deref();
        expect(held?.node.detached).toBe(false);

        await remove(trie, 'ab');
        expect(trie.arena.getNode(b)).toBeUndefined();
        expect(held?.node.detached).toBe(true);
    });

    it('logs node creation and pruning', async () => {
        const messages: string[] = [];
        const trie = makeTrie<number>(undefined, { logger: recordingLogger(messages) });
        await insert(trie, 'ab', 1);
        await remove(trie, 'ab');
        expect(messages).toEqual([
            'debug: Created trie node 1.',
            'debug: Created trie node 2.',
            'debug: Pruned trie node 2.',
            'debug: Pruned trie node 1.'
        ]);
    });

    it('fails loudly when its root has vanished', async () => {
        const messages: string[] = [];
        const trie = makeTrie<number>(undefined, { logger: recordingLogger(messages) });
        trie.arena.deleteNode(trie.root);
        await expect(insert(trie, 'a', 1)).rejects.toBeInstanceOf(InvariantError);
        expect(messages).toEqual([`error: Trie node ${trie.root} is missing from the arena.`]);
    });

    it('handles concurrent inserts and removals on shared paths', async () => {
        const words = ['tea', 'ten', 'tent', 'to', 'toe', 'ted', 'tee', 'team', 'tear', 'teas'];
        const trie = makeTrie<number>();
        await Promise.all(words.map((word, i) => insert(trie, word, i)));
        expect(size(trie)).toBe(words.length);

        const removed = words.filter((_, i) => i % 2 === 0);
        const added = ['tease', 'tend', 'toes'];
        await Promise.all([
            ...removed.map((word) => remove(trie, word)),
            ...added.map((word) => insert(trie, word, word.length))
        ]);

        expect(size(trie)).toBe(words.length - removed.length + added.length);
        for (const word of removed) {
            expect(await contains(trie, word)).toBe(false);
        }
        for (const word of words.filter((_, i) => i % 2 === 1)) {
            expect(await find(trie, word)).toBe(words.indexOf(word));
        }
        for (const word of added) {
            expect(await find(trie, word)).toBe(word.length);
        }
    });

    it('rebuilds a branch that a concurrent removal prunes', async () => {
        const trie = makeTrie<number>();
        await insert(trie, 'ab', 1);
        await Promise.all([remove(trie, 'ab'), insert(trie, 'abc', 2)]);
        expect(size(trie)).toBe(1);
        expect(await contains(trie, 'ab')).toBe(false);
        expect(await find(trie, 'abc')).toBe(2);
        expect(trie.arena.size).toBe(4);
    });

    it('warns and takes the branch again when an insert meets a pruned node', async () => {
        const messages: string[] = [];
        const trie = makeTrie<number>(undefined, { logger: recordingLogger(messages) });
        await insert(trie, 'ab', 1);
        const a = childOf(trie, trie.root, 'a');
        const b = a === undefined ? undefined : childOf(trie, a, 'b');
        const cell = b === undefined ? undefined : trie.arena.getNode(b);
        if (b === undefined || cell === undefined) {
            throw new Error('Node b was not created.');
        }

        // Hold b so that the removal and then the insert queue on it in that order.
        let open: () => void = () => { };
        const holding = cell.lock.write(() => new Promise<void>((resolve) => {
            open = resolve;
        }));
        const removing = remove(trie, 'ab');
        await vi.waitFor(() => expect(cell.lock.pending).toBe(1));
        const inserting = insert(trie, 'abc', 2);
        await vi.waitFor(() => expect(cell.lock.pending).toBe(2));
        open();
        await Promise.all([holding, removing, inserting]);

        expect(messages).toContain(`warn: Trie node ${b} was pruned before an insert reached it.`);
        expect(cell.node.detached).toBe(true);
        expect(await find(trie, 'abc')).toBe(2);
        expect(await contains(trie, 'ab')).toBe(false);
        expect(size(trie)).toBe(1);
        expect(trie.arena.size).toBe(4);
    });

    it('prunes everything but the root once every sequence is removed concurrently', async () => {
        const words = ['apple', 'apply', 'ape', 'apt', 'bat', 'bath', 'b'];
        const trie = makeTrie<number>();
        await Promise.all(words.map((word, i) => insert(trie, word, i)));
        await Promise.all(words.map((word) => remove(trie, word)));
        expect(isEmpty(trie)).toBe(true);
        expect(trie.arena.size).toBe(1);
    });
});
