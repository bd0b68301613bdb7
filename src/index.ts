export * as arena from './arena';
export * as quadtree from './quadtree';
export * as trie from './trie';
export * as bounds from './quadtree/bounds';
export { ArenaError, TrieError, InvariantError } from './errors';
export type { ArenaErrorCode, TrieErrorCode } from './errors';
export { silentLogger, consoleLogger } from './logger';
export type { Logger } from './logger';
export type { NodeId, Identified, Arena, Cell } from './arena';
export type { Bounds, Point, PointEntry, Quadtree, QuadtreeOptions } from './quadtree';
export type { Alphabet, CaseSensitivity, Trie, TrieOptions } from './trie';
