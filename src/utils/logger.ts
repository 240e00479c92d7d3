export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolves the active level from LOG_LEVEL. Unknown values silence output so
 * a typo never floods a production console.
 */
export function resolveLogLevel(
    env: NodeJS.ProcessEnv = process.env
): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return env.NODE_ENV === "production" ? "warn" : "debug";
    }
    return isLogLevel(configured) ? configured : "silent";
}

const currentLevel = resolveLogLevel();

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    args: unknown[]
): void {
    if (!shouldLog(level)) {
        return;
    }

    const prefix = scope
        ? `[${level.toUpperCase()}] [${scope}] ${message}`
        : `[${level.toUpperCase()}] ${message}`;
    const [first, ...rest] = args;
    const payload =
        args.length > 0 && isLogContextCandidate(first)
            ? [normalizeContext(first), ...rest.map(normalizeError)]
            : args.map(normalizeError);

    switch (level) {
        case "debug":
            console.debug(prefix, ...payload);
            break;
        case "info":
            console.info(prefix, ...payload);
            break;
        case "warn":
            console.warn(prefix, ...payload);
            break;
        case "error":
            console.error(prefix, ...payload);
            break;
    }
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, ...args) => emit("debug", message, scoped, args),
        info: (message, ...args) => emit("info", message, scoped, args),
        warn: (message, ...args) => emit("warn", message, scoped, args),
        error: (message, ...args) => emit("error", message, scoped, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

export const logger = createLogger();
