import rateLimit from "express-rate-limit";

// Self-hosted behind a reverse proxy; trust proxy validation would reject the
// app.set("trust proxy", true) setting the server relies on.
const trustProxyValidation = { validate: { trustProxy: false } };

// General API limiter (1000 req/minute per IP). Only guards against runaway clients.
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 1000,
    message: "Too many requests from this IP, please try again later.",
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});

// Endpoints that spend bytes from the remote entropy API (30 req/minute per IP).
export const entropyLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 30,
    message: "Too many recommendation requests. Please slow down.",
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});
