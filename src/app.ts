import express from "express";
import cors from "cors";
import helmet from "helmet";
import { config } from "./config";
import { apiLimiter, entropyLimiter } from "./middleware/rateLimiter";
import { errorHandler } from "./middleware/errorHandler";
import libraryRoutes from "./routes/library";
import recommendationsRoutes from "./routes/recommendations";
import entropyRoutes from "./routes/entropy";

export function createApp() {
    const app = express();

    app.set("trust proxy", true);
    app.use(helmet());
    app.use(
        cors({
            origin: config.allowedOrigins,
            credentials: true,
        })
    );
    app.use(express.json({ limit: "5mb" }));

    app.get("/health", (_req, res) => {
        res.json({ status: "ok" });
    });

    app.use("/api", apiLimiter);
    app.use("/api/library", libraryRoutes);
    app.use("/api/recommendations", entropyLimiter, recommendationsRoutes);
    app.use("/api/entropy", entropyLimiter, entropyRoutes);

    app.use(errorHandler);

    return app;
}
