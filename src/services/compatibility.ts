import {
    type CompatibilityTraits,
    UNKNOWN_LABEL,
} from "../types/track";
import { assertEntropy } from "../utils/errors";
import { camelotDistance, parseCamelotKey } from "../utils/camelot";
import { extractGenreKeywords, normalizeGenreTag } from "../utils/genreKeywords";

const BASE_TEMPO_TOLERANCE_BPM = 5;
const TEMPO_TOLERANCE_SPAN_BPM = 25;

// Key tiers: adjacency always, energy boost above 0.5, wide jump above 0.75.
const ENERGY_BOOST_ENTROPY = 0.5;
const WIDE_JUMP_ENTROPY = 0.75;

const RELATED_FEEL_ENTROPY = 0.6;
const RELATED_TIME_SIGNATURES: ReadonlyArray<readonly [string, string]> = [
    ["4/4", "2/4"],
    ["4/4", "2/2"],
    ["3/4", "6/8"],
];

const ONE_SIDED_GENRE_ENTROPY = 0.75;
const BROAD_GENRE_ENTROPY = 0.3;
const ANY_GENRE_ENTROPY = 0.9;

export interface CompatibilityBreakdown {
    tempo: boolean;
    key: boolean;
    timeSignature: boolean;
    genre: boolean;
    passed: number;
    required: number;
    compatible: boolean;
}

function readBpm(traits: CompatibilityTraits): number {
    return Number.isFinite(traits.bpm) ? traits.bpm : 0;
}

/** Allowed BPM difference: ±5 at entropy 0, widening to ±30 at entropy 1. */
export function tempoTolerance(entropy: number): number {
    assertEntropy(entropy);
    return (
        BASE_TEMPO_TOLERANCE_BPM +
        Math.floor(entropy * TEMPO_TOLERANCE_SPAN_BPM)
    );
}

export function isTempoCompatible(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): boolean {
    return Math.abs(readBpm(a) - readBpm(b)) <= tempoTolerance(entropy);
}

export function isKeyCompatible(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): boolean {
    assertEntropy(entropy);
    const keyA = parseCamelotKey(a.camelotPosition);
    const keyB = parseCamelotKey(b.camelotPosition);
    if (!keyA || !keyB) return false;

    const distance = camelotDistance(keyA, keyB);
    const sameMode = keyA.mode === keyB.mode;

    if (sameMode && distance <= 1) return true;
    if (entropy > ENERGY_BOOST_ENTROPY && !sameMode && distance === 0) {
        return true;
    }
    if (entropy > WIDE_JUMP_ENTROPY && sameMode && distance === 2) {
        return true;
    }
    return false;
}

function isKnownSignature(signature: string): boolean {
    const trimmed = signature.trim();
    return trimmed.length > 0 && trimmed !== UNKNOWN_LABEL;
}

export function isTimeSignatureCompatible(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): boolean {
    assertEntropy(entropy);
    const sigA = a.timeSignature.trim();
    const sigB = b.timeSignature.trim();
    if (!isKnownSignature(sigA) || !isKnownSignature(sigB)) return false;
    if (sigA === sigB) return true;
    if (entropy < RELATED_FEEL_ENTROPY) return false;

    return RELATED_TIME_SIGNATURES.some(
        ([first, second]) =>
            (sigA === first && sigB === second) ||
            (sigA === second && sigB === first)
    );
}

function toGenreSet(genres: readonly string[]): Set<string> {
    const set = new Set<string>();
    for (const genre of genres) {
        const normalized = normalizeGenreTag(genre);
        if (normalized.length > 0) set.add(normalized);
    }
    return set;
}

function keywordSet(tags: Set<string>): Set<string> {
    const keywords = new Set<string>();
    tags.forEach((tag) => {
        extractGenreKeywords(tag).forEach((keyword) => keywords.add(keyword));
    });
    return keywords;
}

export function isGenreCompatible(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): boolean {
    assertEntropy(entropy);
    const tagsA = toGenreSet(a.genres);
    const tagsB = toGenreSet(b.genres);

    if (tagsA.size === 0 && tagsB.size === 0) return true;
    if (tagsA.size === 0 || tagsB.size === 0) {
        return entropy >= ONE_SIDED_GENRE_ENTROPY;
    }

    for (const tag of tagsA) {
        if (tagsB.has(tag)) return true;
    }
    if (entropy < BROAD_GENRE_ENTROPY) return false;

    const keywordsB = keywordSet(tagsB);
    for (const keyword of keywordSet(tagsA)) {
        if (keywordsB.has(keyword)) return true;
    }

    return entropy >= ANY_GENRE_ENTROPY;
}

/** How many of the four dimensions must agree at a given entropy. */
export function requiredMatches(entropy: number): number {
    assertEntropy(entropy);
    if (entropy < 0.5) return 4;
    if (entropy < 0.8) return 3;
    return 2;
}

export function evaluateCompatibility(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): CompatibilityBreakdown {
    const tempo = isTempoCompatible(a, b, entropy);
    const key = isKeyCompatible(a, b, entropy);
    const timeSignature = isTimeSignatureCompatible(a, b, entropy);
    const genre = isGenreCompatible(a, b, entropy);

    const passed = [tempo, key, timeSignature, genre].filter(Boolean).length;
    const required = requiredMatches(entropy);

    return {
        tempo,
        key,
        timeSignature,
        genre,
        passed,
        required,
        compatible: passed >= required,
    };
}

export function isCompatible(
    a: CompatibilityTraits,
    b: CompatibilityTraits,
    entropy: number
): boolean {
    return evaluateCompatibility(a, b, entropy).compatible;
}
