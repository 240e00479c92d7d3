import { z } from "zod";

export const UNKNOWN_LABEL = "Unknown";
export const DEFAULT_TIME_SIGNATURE = "4/4";

/**
 * The musical attributes the compatibility rules read. Library tracks and the
 * aggregate centroid both implement it.
 */
export interface CompatibilityTraits {
    bpm: number;
    camelotPosition: string;
    timeSignature: string;
    genres: readonly string[];
}

export interface Track extends CompatibilityTraits {
    id: string;
    title: string;
    artist: string;
    key: string;
    energyLevel: number;
    album?: string;
    spotifyUrl?: string;
    albumArtUrl?: string;
}

const optionalLabel = (fallback: string) =>
    z
        .string()
        .trim()
        .optional()
        .transform((value) => (value && value.length > 0 ? value : fallback));

export const trackInputSchema = z.object({
    id: z.string().trim().min(1, "id is required"),
    title: z.string().trim().min(1, "title is required"),
    artist: z.string().trim().min(1, "artist is required"),
    bpm: z
        .number()
        .finite()
        .min(0, "bpm cannot be negative")
        .nullish()
        .transform((value) => value ?? 0),
    key: optionalLabel(UNKNOWN_LABEL),
    camelotPosition: optionalLabel(UNKNOWN_LABEL),
    energyLevel: z
        .number()
        .min(0)
        .max(1)
        .nullish()
        .transform((value) => value ?? 0),
    timeSignature: optionalLabel(DEFAULT_TIME_SIGNATURE),
    genres: z
        .array(z.string())
        .nullish()
        .transform((value) =>
            (value ?? [])
                .map((genre) => genre.trim())
                .filter((genre) => genre.length > 0)
        ),
    album: z.string().optional(),
    spotifyUrl: z.string().url().optional(),
    albumArtUrl: z.string().url().optional(),
});
