import { Router } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { trackInputSchema } from "../types/track";
import { musicLibrary } from "../services/musicLibrary";
import { computeLibraryStats } from "../services/libraryAnalysis";
import {
    applyContributions,
    buildContributionMap,
} from "../services/trackContributions";
import { sendRouteError, sendValidationError } from "./routeErrorResponse";

const router = Router();

const addTracksSchema = z.union([
    z.array(trackInputSchema).min(1, "At least one track is required"),
    trackInputSchema.transform((track) => [track]),
]);

const contributionsSchema = z.object({
    contributions: z.array(z.unknown()),
});

// GET /library/tracks
router.get("/tracks", (_req, res) => {
    const tracks = musicLibrary.getAllTracks();
    res.json({ tracks, total: tracks.length });
});

// GET /library/tracks/:id
router.get("/tracks/:id", (req, res) => {
    const track = musicLibrary.getTrack(req.params.id);
    if (!track) {
        return sendRouteError(res, 404, "Track not found");
    }
    res.json({ track });
});

// POST /library/tracks
router.post("/tracks", (req, res) => {
    const parsed = addTracksSchema.safeParse(req.body);
    if (!parsed.success) {
        return sendValidationError(res, "Invalid track payload", parsed.error);
    }

    const added = musicLibrary.addTracks(parsed.data);
    const skipped = parsed.data.length - added;
    logger.debug(`[Library] Added ${added} tracks (${skipped} duplicates skipped)`);

    res.status(added > 0 ? 201 : 200).json({
        added,
        skipped,
        total: musicLibrary.size,
    });
});

// DELETE /library/tracks/:id
router.delete("/tracks/:id", (req, res) => {
    if (!musicLibrary.removeTrack(req.params.id)) {
        return sendRouteError(res, 404, "Track not found");
    }
    res.status(204).end();
});

// DELETE /library/tracks
router.delete("/tracks", (_req, res) => {
    musicLibrary.clear();
    res.status(204).end();
});

// GET /library/stats
router.get("/stats", (_req, res) => {
    res.json(computeLibraryStats(musicLibrary.getAllTracks()));
});

// POST /library/contributions
router.post("/contributions", (req, res) => {
    const parsed = contributionsSchema.safeParse(req.body);
    if (!parsed.success) {
        return sendValidationError(
            res,
            "Invalid contributions payload",
            parsed.error
        );
    }

    const contributions = buildContributionMap(parsed.data.contributions);
    const { tracks, patched } = applyContributions(
        musicLibrary.getAllTracks(),
        contributions
    );
    if (patched > 0) {
        musicLibrary.replaceTracks(tracks);
    }

    res.json({
        accepted: contributions.size,
        patched,
    });
});

export default router;
