import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import { parseEnvCsv, parseEnvInt } from "./utils/envParsers";

dotenv.config();

// Validate critical environment variables on startup
const envSchema = z.object({
    QUANTUM_ENTROPY_API_URL: z
        .string()
        .url("QUANTUM_ENTROPY_API_URL must be a valid URL"),
    QUANTUM_ENTROPY_API_KEY: z
        .string()
        .min(1, "QUANTUM_ENTROPY_API_KEY is required"),
    QUANTUM_ENTROPY_TIMEOUT_MS: z
        .string()
        .regex(/^\d+$/, "QUANTUM_ENTROPY_TIMEOUT_MS must be an integer")
        .optional(),
    PORT: z.string().optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
});

const parsedEnv = envSchema.safeParse(process.env);
if (!parsedEnv.success) {
    logger.error(" Environment validation failed:");
    parsedEnv.error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    logger.error(
        "\n Please check your .env file and ensure all required variables are set."
    );
    process.exit(1);
}
logger.debug("Environment variables validated");

const allowedOriginsFromEnv = parseEnvCsv(process.env.ALLOWED_ORIGINS);

export interface EntropyServiceConfig {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
}

/** Centralized runtime configuration for the HTTP surface and the entropy client. */
export const config = {
    port: parseEnvInt(process.env.PORT, 3006),
    nodeEnv: process.env.NODE_ENV || "development",

    entropy: {
        baseUrl: process.env.QUANTUM_ENTROPY_API_URL ?? "",
        apiKey: process.env.QUANTUM_ENTROPY_API_KEY ?? "",
        timeoutMs: parseEnvInt(process.env.QUANTUM_ENTROPY_TIMEOUT_MS, 10000),
    } satisfies EntropyServiceConfig,

    recommendations: {
        defaultCount: parseEnvInt(process.env.DEFAULT_RECOMMENDATION_COUNT, 5),
    },

    allowedOrigins:
        allowedOriginsFromEnv ||
        (process.env.NODE_ENV === "development" ? true : []),
};
