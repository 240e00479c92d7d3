import { z } from "zod";
import { type Track, UNKNOWN_LABEL } from "../types/track";
import { logger } from "../utils/logger";

export const trackContributionSchema = z.object({
    trackId: z.string().trim().min(1),
    bpm: z.number().finite().positive().optional(),
    key: z.string().trim().min(1).optional(),
    timeSignature: z.string().trim().min(1).optional(),
    camelotKey: z.string().trim().min(1).optional(),
    genreKeywords: z.array(z.string().trim().min(1)).default([]),
    sourceDescription: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
});

export type TrackContribution = z.infer<typeof trackContributionSchema>;

/**
 * Validates raw contribution entries and indexes them by track id. Invalid
 * entries are skipped; on duplicate ids the first entry wins.
 */
export function buildContributionMap(
    entries: readonly unknown[]
): Map<string, TrackContribution> {
    const contributions = new Map<string, TrackContribution>();

    entries.forEach((entry, index) => {
        const parsed = trackContributionSchema.safeParse(entry);
        if (!parsed.success) {
            logger.warn(
                `[Contributions] Skipping invalid entry at index ${index}: ${parsed.error.issues
                    .map((issue) => `${issue.path.join(".") || "entry"} ${issue.message}`)
                    .join("; ")}`
            );
            return;
        }

        const contribution = parsed.data;
        if (contributions.has(contribution.trackId)) {
            logger.warn(
                `[Contributions] Duplicate contribution for ${contribution.trackId}, keeping the first`
            );
            return;
        }
        contributions.set(contribution.trackId, contribution);
    });

    return contributions;
}

function isMissingLabel(value: string): boolean {
    const trimmed = value.trim();
    return trimmed.length === 0 || trimmed === UNKNOWN_LABEL;
}

function mergeContribution(
    track: Track,
    contribution: TrackContribution
): Track {
    return {
        ...track,
        bpm: track.bpm > 0 ? track.bpm : contribution.bpm ?? track.bpm,
        key: isMissingLabel(track.key)
            ? contribution.key ?? track.key
            : track.key,
        camelotPosition: isMissingLabel(track.camelotPosition)
            ? contribution.camelotKey ?? track.camelotPosition
            : track.camelotPosition,
        timeSignature: isMissingLabel(track.timeSignature)
            ? contribution.timeSignature ?? track.timeSignature
            : track.timeSignature,
        genres:
            track.genres.length > 0 || contribution.genreKeywords.length === 0
                ? track.genres
                : [...contribution.genreKeywords],
    };
}

/**
 * Fills gaps in track metadata from contributions. Existing values are never
 * overwritten and tracks without a contribution keep their identity.
 */
export function applyContributions(
    tracks: readonly Track[],
    contributions: ReadonlyMap<string, TrackContribution>
): { tracks: Track[]; patched: number } {
    let patched = 0;
    const result = tracks.map((track) => {
        const contribution = contributions.get(track.id);
        if (!contribution) return track;
        patched += 1;
        return mergeContribution(track, contribution);
    });
    return { tracks: result, patched };
}
