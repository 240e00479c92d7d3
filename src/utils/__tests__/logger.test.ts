const originalEnv = { ...process.env };

describe("logger", () => {
    afterEach(() => {
        process.env = originalEnv;
        jest.resetModules();
        jest.restoreAllMocks();
    });

    async function loadLoggerModule(options?: {
        logLevel?: string;
        nodeEnv?: string;
    }) {
        jest.resetModules();
        jest.restoreAllMocks();
        process.env = { ...originalEnv };

        if (options?.logLevel === undefined) {
            delete process.env.LOG_LEVEL;
        } else {
            process.env.LOG_LEVEL = options.logLevel;
        }

        if (options?.nodeEnv === undefined) {
            delete process.env.NODE_ENV;
        } else {
            process.env.NODE_ENV = options.nodeEnv;
        }

        const consoleDebug = jest.spyOn(console, "debug").mockImplementation(() => {});
        const consoleInfo = jest.spyOn(console, "info").mockImplementation(() => {});
        const consoleWarn = jest.spyOn(console, "warn").mockImplementation(() => {});
        const consoleError = jest.spyOn(console, "error").mockImplementation(() => {});

        const loggerModule = await import("../logger");

        return {
            ...loggerModule,
            consoleDebug,
            consoleInfo,
            consoleWarn,
            consoleError,
        };
    }

    it("gates logs based on LOG_LEVEL ordering", async () => {
        const cases = [
            { level: "debug", expected: [true, true, true, true] },
            { level: "info", expected: [false, true, true, true] },
            { level: "warn", expected: [false, false, true, true] },
            { level: "error", expected: [false, false, false, true] },
            { level: "silent", expected: [false, false, false, false] },
        ];

        for (const { level, expected } of cases) {
            const loaded = await loadLoggerModule({ logLevel: level });

            loaded.logger.debug("d");
            loaded.logger.info("i");
            loaded.logger.warn("w");
            loaded.logger.error("e");

            expect([
                loaded.consoleDebug.mock.calls.length > 0,
                loaded.consoleInfo.mock.calls.length > 0,
                loaded.consoleWarn.mock.calls.length > 0,
                loaded.consoleError.mock.calls.length > 0,
            ]).toEqual(expected);
        }
    });

    it("resolves the default level from NODE_ENV", async () => {
        const { resolveLogLevel } = await loadLoggerModule();

        expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("warn");
        expect(resolveLogLevel({ NODE_ENV: "development" })).toBe("debug");
        expect(resolveLogLevel({ LOG_LEVEL: " INFO " })).toBe("info");
        expect(resolveLogLevel({ LOG_LEVEL: "verbose" })).toBe("silent");
    });

    it("prefixes messages with level and nested scope", async () => {
        const { createLogger, consoleInfo, consoleWarn } = await loadLoggerModule({
            logLevel: "debug",
        });

        const scoped = createLogger(" engine ").child("shuffle");
        scoped.info("ready", 3);
        createLogger().warn("plain");

        expect(consoleInfo).toHaveBeenCalledWith("[INFO] [engine.shuffle] ready", 3);
        expect(consoleWarn).toHaveBeenCalledWith("[WARN] plain");
    });

    it("flattens errors in arguments and context objects", async () => {
        const { logger, consoleError } = await loadLoggerModule({ logLevel: "error" });
        const failure = new Error("boom");
        failure.stack = "stack-line";

        logger.error("failed", failure);
        logger.error("failed with context", { attempt: 2, error: failure });

        const flattened = { name: "Error", message: "boom", stack: "stack-line" };
        expect(consoleError).toHaveBeenNthCalledWith(1, "[ERROR] failed", flattened);
        expect(consoleError).toHaveBeenNthCalledWith(2, "[ERROR] failed with context", {
            attempt: 2,
            error: flattened,
        });
    });
});
