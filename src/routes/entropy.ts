import { Router } from "express";
import { quantumEntropyService } from "../services/quantumEntropy";

const router = Router();

// GET /entropy/status
router.get("/status", async (_req, res, next) => {
    try {
        const probe = await quantumEntropyService.probeAvailability();
        if (probe.ok) {
            return res.json({ available: true });
        }
        res.json({
            available: false,
            reason: probe.reason,
            ...(probe.statusCode !== undefined && {
                statusCode: probe.statusCode,
            }),
        });
    } catch (error) {
        next(error);
    }
});

export default router;
