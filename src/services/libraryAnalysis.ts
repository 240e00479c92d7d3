import { type Track, UNKNOWN_LABEL } from "../types/track";
import { rankByFrequency } from "./centroid";

const TOP_N = 3;

export interface RankedValue {
    value: string;
    count: number;
}

export interface TimeSignatureShare extends RankedValue {
    percentage: number;
}

export interface LibraryStats {
    trackCount: number;
    bpm: { average: number; min: number; max: number } | null;
    averageEnergy: number | null;
    commonKeys: RankedValue[];
    commonCamelotPositions: RankedValue[];
    timeSignatures: TimeSignatureShare[];
    commonGenres: RankedValue[];
    totalGenres: number;
    uniqueArtists: number;
    mostCommonArtist: RankedValue | null;
    leastCommonArtist: RankedValue | null;
}

function isKnownLabel(value: string): boolean {
    const trimmed = value.trim();
    return trimmed.length > 0 && trimmed !== UNKNOWN_LABEL;
}

function ranked(values: string[], limit?: number): RankedValue[] {
    const entries = rankByFrequency(values).map(([value, count]) => ({
        value,
        count,
    }));
    return limit === undefined ? entries : entries.slice(0, limit);
}

function average(values: number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Math.min(...list) overflows the call stack on large libraries.
function tempoSummary(
    bpms: readonly number[]
): { average: number; min: number; max: number } | null {
    if (bpms.length === 0) return null;
    let sum = 0;
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const bpm of bpms) {
        sum += bpm;
        if (bpm < min) min = bpm;
        if (bpm > max) max = bpm;
    }
    return { average: sum / bpms.length, min, max };
}

/** Summary figures for a library snapshot. Missing measurements are skipped. */
export function computeLibraryStats(tracks: readonly Track[]): LibraryStats {
    const bpms = tracks
        .map((track) => track.bpm)
        .filter((bpm) => Number.isFinite(bpm) && bpm > 0);

    const energies = tracks
        .map((track) => track.energyLevel)
        .filter((energy) => Number.isFinite(energy) && energy > 0);

    const signatureCounts = ranked(
        tracks.map((track) => track.timeSignature).filter(isKnownLabel)
    );
    const timeSignatures = signatureCounts.map((entry) => ({
        ...entry,
        percentage: (entry.count / tracks.length) * 100,
    }));

    const allGenres = tracks.flatMap((track) => [...track.genres]);
    const artists = ranked(tracks.map((track) => track.artist));

    return {
        trackCount: tracks.length,
        bpm: tempoSummary(bpms),
        averageEnergy: average(energies),
        commonKeys: ranked(
            tracks.map((track) => track.key).filter(isKnownLabel),
            TOP_N
        ),
        commonCamelotPositions: ranked(
            tracks.map((track) => track.camelotPosition).filter(isKnownLabel),
            TOP_N
        ),
        timeSignatures,
        commonGenres: ranked(allGenres, TOP_N),
        totalGenres: new Set(allGenres).size,
        uniqueArtists: artists.length,
        mostCommonArtist: artists[0] ?? null,
        leastCommonArtist: artists.length > 0 ? artists[artists.length - 1] : null,
    };
}
