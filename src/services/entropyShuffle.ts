export interface EntropyShuffleResult<T> {
    items: T[];
    bytesUsed: number;
    /** False when the bytes ran out before the pass reached index 1. */
    complete: boolean;
}

/** Bytes needed for one full Fisher-Yates pass over `length` items. */
export function bytesForShuffle(length: number): number {
    return Math.max(0, length - 1);
}

/**
 * Fisher-Yates over a copy of `items`, drawing one byte per swap.
 *
 * The swap index is `byte % (i + 1)`, which slightly favours low indices when
 * `i + 1` does not divide 256. Known bias, kept so orderings stay reproducible
 * for a given byte sequence. When bytes run out the remaining head of the list
 * is left in its original order.
 */
export function shuffleWithEntropyBytes<T>(
    items: readonly T[],
    bytes: Uint8Array
): EntropyShuffleResult<T> {
    const shuffled = [...items];
    let cursor = 0;

    for (let i = shuffled.length - 1; i > 0; i -= 1) {
        if (cursor >= bytes.length) {
            return { items: shuffled, bytesUsed: cursor, complete: false };
        }
        const j = bytes[cursor] % (i + 1);
        cursor += 1;
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }

    return { items: shuffled, bytesUsed: cursor, complete: true };
}
