import axios, { AxiosInstance } from "axios";
import { config, type EntropyServiceConfig } from "../config";
import { BRAND_USER_AGENT } from "../config/brand";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

export type EntropyUnavailableReason =
    | "http-status"
    | "timeout"
    | "network"
    | "malformed";

export type EntropyFetchResult =
    | { ok: true; bytes: Uint8Array }
    | { ok: false; reason: EntropyUnavailableReason; statusCode?: number };

/** Anything that can hand out externally sourced random bytes. */
export interface EntropySource {
    fetchRandomBytes(count: number): Promise<EntropyFetchResult>;
}

const TIMEOUT_ERROR_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

function toBytes(data: unknown): Uint8Array | null {
    if (data instanceof ArrayBuffer) {
        return new Uint8Array(data);
    }
    if (ArrayBuffer.isView(data)) {
        return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    }
    return null;
}

/**
 * Client for the remote quantum randomness API. Every failure collapses into
 * an "unavailable" result. There is no local PRNG fallback.
 */
export class QuantumEntropyService implements EntropySource {
    private client: AxiosInstance;

    constructor(settings: EntropyServiceConfig) {
        if (!settings.baseUrl || !settings.apiKey) {
            throw new AppError(
                ErrorCode.INVALID_CONFIG,
                ErrorCategory.FATAL,
                "Quantum entropy API URL and key must both be configured"
            );
        }

        this.client = axios.create({
            baseURL: settings.baseUrl.replace(/\/+$/, ""),
            timeout: settings.timeoutMs,
            responseType: "arraybuffer",
            headers: {
                "X-API-Key": settings.apiKey,
                Accept: "application/octet-stream",
                "User-Agent": BRAND_USER_AGENT,
            },
        });
    }

    async fetchRandomBytes(count: number): Promise<EntropyFetchResult> {
        if (!Number.isInteger(count) || count <= 0) {
            throw new AppError(
                ErrorCode.INVALID_BYTE_REQUEST,
                ErrorCategory.RECOVERABLE,
                `Random byte count must be a positive integer (received ${count})`,
                { count }
            );
        }

        try {
            const response = await this.client.get<unknown>("/api/eris/raw", {
                params: { size: count },
            });

            const bytes = toBytes(response.data);
            if (!bytes || bytes.length === 0) {
                logger.warn(
                    `[QuantumEntropy] Malformed response for ${count} bytes`
                );
                return { ok: false, reason: "malformed" };
            }
            if (bytes.length < count) {
                logger.debug(
                    `[QuantumEntropy] Short response: ${bytes.length}/${count} bytes`
                );
            }

            return { ok: true, bytes: bytes.subarray(0, count) };
        } catch (error) {
            return this.classifyFailure(error);
        }
    }

    /** Fetches a single byte to report whether the source is reachable. */
    async probeAvailability(): Promise<EntropyFetchResult> {
        return this.fetchRandomBytes(1);
    }

    private classifyFailure(error: unknown): EntropyFetchResult {
        if (!axios.isAxiosError(error)) {
            logger.error("[QuantumEntropy] Unexpected fetch failure:", error);
            return { ok: false, reason: "network" };
        }

        if (error.response) {
            const statusCode = error.response.status;
            if (statusCode === 401 || statusCode === 403) {
                logger.error(
                    `[QuantumEntropy] Request rejected (${statusCode}); check QUANTUM_ENTROPY_API_KEY`
                );
            } else {
                logger.warn(
                    `[QuantumEntropy] Request failed with status ${statusCode}`
                );
            }
            return { ok: false, reason: "http-status", statusCode };
        }

        if (error.code && TIMEOUT_ERROR_CODES.has(error.code)) {
            logger.warn("[QuantumEntropy] Request timed out");
            return { ok: false, reason: "timeout" };
        }

        logger.warn(`[QuantumEntropy] Connection failed: ${error.message}`);
        return { ok: false, reason: "network" };
    }
}

export const quantumEntropyService = new QuantumEntropyService(config.entropy);
