import type { Track } from "../types/track";
import { logger } from "../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    assertEntropy,
} from "../utils/errors";
import { computeCentroid } from "./centroid";
import { isCompatible } from "./compatibility";
import { bytesForShuffle, shuffleWithEntropyBytes } from "./entropyShuffle";
import {
    type EntropySource,
    type EntropyUnavailableReason,
    quantumEntropyService,
} from "./quantumEntropy";

// Centroid affinity only matters once matching is already permissive.
export const CENTROID_ENTROPY_THRESHOLD = 0.55;
export const CENTROID_ENTROPY_BIAS = 0.15;
// Below this, an unshuffled list is an acceptable answer when the source is down.
export const DETERMINISTIC_FALLBACK_ENTROPY = 0.1;

export type RecommendationOutcome =
    | { status: "ok"; tracks: Track[] }
    | {
          status: "deterministic-fallback";
          tracks: Track[];
          reason: EntropyUnavailableReason;
      }
    | { status: "no-compatible-tracks"; tracks: [] }
    | {
          status: "entropy-unavailable";
          tracks: [];
          reason: EntropyUnavailableReason;
      };

export type RecommendationStatus = RecommendationOutcome["status"];

function assertCount(count: number): void {
    if (!Number.isInteger(count) || count < 1) {
        throw new AppError(
            ErrorCode.INVALID_RECOMMENDATION_COUNT,
            ErrorCategory.RECOVERABLE,
            `Recommendation count must be a positive integer (received ${count})`,
            { count }
        );
    }
}

function concatBytes(first: Uint8Array, second: Uint8Array): Uint8Array {
    const merged = new Uint8Array(first.length + second.length);
    merged.set(first, 0);
    merged.set(second, first.length);
    return merged;
}

/**
 * Filters the library down to tracks compatible with the seed (or, at high
 * entropy, with the library centroid), in library order and without
 * duplicate ids.
 */
export function findCompatibleTracks(
    library: readonly Track[],
    seed: Track,
    entropy: number
): Track[] {
    assertEntropy(entropy);

    const useCentroid = entropy > CENTROID_ENTROPY_THRESHOLD;
    const centroid = useCentroid ? computeCentroid(library) : null;
    const centroidEntropy = Math.min(1, entropy + CENTROID_ENTROPY_BIAS);

    const seen = new Set<string>([seed.id]);
    const compatible: Track[] = [];

    for (const candidate of library) {
        if (seen.has(candidate.id)) continue;

        const matches =
            isCompatible(candidate, seed, entropy) ||
            (centroid !== null &&
                isCompatible(candidate, centroid, centroidEntropy));

        if (matches) {
            seen.add(candidate.id);
            compatible.push(candidate);
        }
    }

    return compatible;
}

export class RecommendationEngine {
    constructor(private readonly entropySource: EntropySource) {}

    /**
     * Picks up to `count` tracks compatible with `seed` and orders them with
     * externally fetched random bytes. The library is read, never modified.
     */
    async recommendTracks(
        library: readonly Track[],
        seed: Track,
        entropy: number,
        count: number
    ): Promise<RecommendationOutcome> {
        assertEntropy(entropy);
        assertCount(count);

        const compatible = findCompatibleTracks(library, seed, entropy);
        if (compatible.length === 0) {
            logger.debug(
                `[Recommendations] No compatible tracks for seed ${seed.id} at entropy ${entropy}`
            );
            return { status: "no-compatible-tracks", tracks: [] };
        }

        const numToSelect = Math.min(compatible.length, count);
        const bytesNeeded = bytesForShuffle(compatible.length);
        if (bytesNeeded === 0) {
            return { status: "ok", tracks: compatible.slice(0, numToSelect) };
        }

        const first = await this.entropySource.fetchRandomBytes(bytesNeeded);
        if (!first.ok) {
            if (entropy < DETERMINISTIC_FALLBACK_ENTROPY) {
                logger.warn(
                    `[Recommendations] Entropy source unavailable (${first.reason}); returning unshuffled picks`
                );
                return {
                    status: "deterministic-fallback",
                    tracks: compatible.slice(0, numToSelect),
                    reason: first.reason,
                };
            }
            logger.warn(
                `[Recommendations] Entropy source unavailable (${first.reason}); refusing to shuffle without it`
            );
            return {
                status: "entropy-unavailable",
                tracks: [],
                reason: first.reason,
            };
        }

        let bytes = first.bytes;
        if (bytes.length < bytesNeeded) {
            const topUp = await this.entropySource.fetchRandomBytes(
                bytesNeeded - bytes.length
            );
            if (topUp.ok) {
                bytes = concatBytes(bytes, topUp.bytes);
            } else {
                logger.warn(
                    `[Recommendations] Top-up fetch failed (${topUp.reason}); shuffling with ${bytes.length}/${bytesNeeded} bytes`
                );
            }
        }

        const shuffled = shuffleWithEntropyBytes(compatible, bytes);
        logger.debug(
            `[Recommendations] Selected ${numToSelect} of ${compatible.length} compatible tracks`,
            {
                seedId: seed.id,
                entropy,
                bytesUsed: shuffled.bytesUsed,
                completeShuffle: shuffled.complete,
            }
        );

        return { status: "ok", tracks: shuffled.items.slice(0, numToSelect) };
    }
}

export const recommendationEngine = new RecommendationEngine(
    quantumEntropyService
);
