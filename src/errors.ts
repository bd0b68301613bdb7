import type { NodeId } from './arena/node-id';
import type { Logger } from './logger';

export type ArenaErrorCode = 'DuplicateIdentity' | 'NotFound';

export class ArenaError extends Error {
    constructor(
        public readonly code: ArenaErrorCode,
        public readonly id: NodeId
    ) {
        super(code === 'DuplicateIdentity' ? `Node ${id} already exists.` : `Node ${id} does not exist.`);
        this.name = 'ArenaError';
    }
}

export type TrieErrorCode = 'AlreadyExists' | 'NotFound' | 'InvalidSymbol';

export class TrieError extends Error {
    constructor(
        public readonly code: TrieErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'TrieError';
    }
}

/**
 * Thrown when a tree's own bookkeeping is corrupt, e.g. an identity the tree issued no longer
 * resolves. Not meant to be caught and recovered from.
 */
export class InvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantError';
    }
}

/**
 * Logs `message` at error level and returns the `InvariantError` for the caller to throw.
 */
export function invariantError(logger: Logger, message: string): InvariantError {
    const error = new InvariantError(message);
    logger.error(message, error);
    return error;
}
