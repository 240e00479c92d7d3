import {
    type CompatibilityTraits,
    DEFAULT_TIME_SIGNATURE,
    UNKNOWN_LABEL,
} from "../types/track";
import {
    type ParsedCamelotKey,
    formatCamelotKey,
    parseCamelotKey,
} from "../utils/camelot";
import { extractGenreKeywords } from "../utils/genreKeywords";

export const DEFAULT_CENTROID_BPM = 120;
export const CENTROID_GENRE_KEYWORD_LIMIT = 3;

/**
 * The "average track" of a collection. It carries no identity and is never
 * added to a library; it only serves as a comparison target.
 */
export interface CentroidProfile extends CompatibilityTraits {
    modalKey: ParsedCamelotKey | null;
    genreKeywords: string[];
}

/**
 * Counts occurrences while remembering first-seen order, so ranking ties are
 * resolved deterministically.
 */
export function rankByFrequency<T>(values: Iterable<T>): Array<[T, number]> {
    const counts = new Map<T, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    // Array.prototype.sort is stable, so equal counts keep insertion order.
    return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

function meanTempo(tracks: readonly CompatibilityTraits[]): number {
    const tempos = tracks
        .map((track) => track.bpm)
        .filter((bpm) => Number.isFinite(bpm) && bpm > 0);
    if (tempos.length === 0) return DEFAULT_CENTROID_BPM;
    return tempos.reduce((sum, bpm) => sum + bpm, 0) / tempos.length;
}

function modalKey(
    tracks: readonly CompatibilityTraits[]
): ParsedCamelotKey | null {
    const labels: string[] = [];
    for (const track of tracks) {
        const parsed = parseCamelotKey(track.camelotPosition);
        if (parsed) labels.push(formatCamelotKey(parsed));
    }
    const [top] = rankByFrequency(labels);
    return top ? parseCamelotKey(top[0]) : null;
}

function modalTimeSignature(tracks: readonly CompatibilityTraits[]): string {
    const signatures = tracks
        .map((track) => track.timeSignature.trim())
        .filter((sig) => sig.length > 0 && sig !== UNKNOWN_LABEL);
    const [top] = rankByFrequency(signatures);
    return top ? top[0] : DEFAULT_TIME_SIGNATURE;
}

function topGenreKeywords(tracks: readonly CompatibilityTraits[]): string[] {
    const matches: string[] = [];
    for (const track of tracks) {
        for (const tag of track.genres) {
            matches.push(...extractGenreKeywords(tag));
        }
    }
    return rankByFrequency(matches)
        .slice(0, CENTROID_GENRE_KEYWORD_LIMIT)
        .map(([keyword]) => keyword);
}

export function computeCentroid(
    tracks: readonly CompatibilityTraits[]
): CentroidProfile {
    const key = modalKey(tracks);
    const genreKeywords = topGenreKeywords(tracks);

    return {
        bpm: meanTempo(tracks),
        camelotPosition: key ? formatCamelotKey(key) : UNKNOWN_LABEL,
        timeSignature: modalTimeSignature(tracks),
        genres: [...genreKeywords],
        modalKey: key,
        genreKeywords,
    };
}
