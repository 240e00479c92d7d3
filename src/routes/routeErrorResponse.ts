import type { Response } from "express";
import type { ZodError } from "zod";

export type RouteErrorExtras = Record<string, unknown>;

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

/** 400 response listing each failing field of a zod validation. */
export const sendValidationError = (
    res: Response,
    message: string,
    error: ZodError
): Response =>
    sendRouteError(res, 400, message, {
        details: error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
        })),
    });
