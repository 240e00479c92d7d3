export type CamelotMode = "A" | "B";

export interface ParsedCamelotKey {
    number: number;
    mode: CamelotMode;
}

const CAMELOT_PATTERN = /^(\d{1,2})([AB])$/;

/**
 * Parses a Camelot wheel position such as "8A" or "12B". Anything else,
 * including "Unknown", yields null.
 */
export function parseCamelotKey(label: unknown): ParsedCamelotKey | null {
    if (typeof label !== "string") return null;

    const match = CAMELOT_PATTERN.exec(label);
    if (!match) return null;

    const number = Number.parseInt(match[1], 10);
    if (number < 1 || number > 12) return null;

    return { number, mode: match[2] === "A" ? "A" : "B" };
}

export function formatCamelotKey(key: ParsedCamelotKey): string {
    return `${key.number}${key.mode}`;
}

/** Shortest distance between two wheel numbers, so 12 and 1 are one apart. */
export function camelotDistance(
    a: ParsedCamelotKey,
    b: ParsedCamelotKey
): number {
    const diff = Math.abs(a.number - b.number);
    return Math.min(diff, 12 - diff);
}
