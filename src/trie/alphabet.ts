import { TrieError } from '../errors';

export type CaseSensitivity = 'sensitive' | 'insensitive';

/**
 * Maps each admissible symbol to a dense branch index in `[0, cardinality)`.
 */
export interface Alphabet {
    readonly cardinality: number;
    readonly caseSensitivity: CaseSensitivity;
    indexOf(symbol: string): number | undefined;
    encode(sequence: string): number[];
    symbols(): string[];
    toString(): string;
}

function fold(symbol: string, caseSensitivity: CaseSensitivity): string {
    if (caseSensitivity === 'insensitive' && symbol >= 'A' && symbol <= 'Z') {
        return symbol.toLowerCase();
    }
    return symbol;
}

export function makeAlphabet(symbols: string, caseSensitivity: CaseSensitivity = 'insensitive'): Alphabet {
    const indices = new Map<string, number>();
    const sorted = Array.from(symbols).sort((a, b) => a < b ? 1 : a > b ? -1 : 0);
    for (const symbol of sorted) {
        const key = fold(symbol, caseSensitivity);
        if (!indices.has(key)) {
            indices.set(key, indices.size);
        }
    }

    const alphabet: Alphabet = {
        cardinality: indices.size,
        caseSensitivity,
        indexOf(symbol) {
            return indices.get(fold(symbol, caseSensitivity));
        },
        encode(sequence) {
            const encoded: number[] = [];
            for (const symbol of sequence) {
                const index = alphabet.indexOf(symbol);
                if (index === undefined) {
                    throw new TrieError('InvalidSymbol', `Symbol '${symbol}' is not part of alphabet ${alphabet.toString()}.`);
                }
                encoded.push(index);
            }
            return encoded;
        },
        symbols() {
            const ordered: string[] = [];
            for (const [symbol, index] of indices) {
                ordered[index] = symbol;
            }
            return ordered;
        },
        toString() {
            return `[${alphabet.symbols().join('')}]`;
        }
    };
    return alphabet;
}

export function defaultAlphabet(): Alphabet {
    return makeAlphabet('abcdefghijklmnopqrstuvwxyz', 'insensitive');
}
