import { Router } from "express";
import { z } from "zod";
import { config } from "../config";
import { musicLibrary } from "../services/musicLibrary";
import { recommendationEngine } from "../services/recommendationEngine";
import { sendRouteError, sendValidationError } from "./routeErrorResponse";

const router = Router();

const recommendationRequestSchema = z.object({
    seedTrackId: z.string().trim().min(1, "seedTrackId is required"),
    entropy: z
        .number()
        .min(0, "entropy must be between 0 and 1")
        .max(1, "entropy must be between 0 and 1"),
    count: z.number().int().min(1).max(100).optional(),
});

/**
 * @openapi
 * /api/recommendations:
 *   post:
 *     summary: Recommend tracks compatible with a seed track
 *     tags: [Recommendations]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [seedTrackId, entropy]
 *             properties:
 *               seedTrackId:
 *                 type: string
 *               entropy:
 *                 type: number
 *                 minimum: 0
 *                 maximum: 1
 *               count:
 *                 type: integer
 *                 minimum: 1
 *     responses:
 *       200:
 *         description: Ordered recommendations (possibly empty)
 *       400:
 *         description: Invalid request body
 *       404:
 *         description: Seed track not in library
 *       503:
 *         description: Entropy source unavailable
 */
// POST /recommendations
router.post("/", async (req, res, next) => {
    const parsed = recommendationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
        return sendValidationError(
            res,
            "Invalid recommendation request",
            parsed.error
        );
    }

    const { seedTrackId, entropy } = parsed.data;
    const count = parsed.data.count ?? config.recommendations.defaultCount;

    // Snapshot before the await so concurrent library edits cannot leak in.
    const library = musicLibrary.getAllTracks();
    const seed = library.find((track) => track.id === seedTrackId);
    if (!seed) {
        return sendRouteError(res, 404, "Seed track not found");
    }

    try {
        const outcome = await recommendationEngine.recommendTracks(
            library,
            seed,
            entropy,
            count
        );

        if (outcome.status === "entropy-unavailable") {
            return sendRouteError(res, 503, "Entropy source unavailable", {
                status: outcome.status,
                reason: outcome.reason,
                tracks: [],
            });
        }

        res.json(outcome);
    } catch (error) {
        next(error);
    }
});

export default router;
