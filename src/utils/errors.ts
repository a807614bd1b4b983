import axios from "axios";
import { ZodError } from "zod";
import type { ServiceOrigin } from "../services/queueItem";

/**
 * Error categories for classification
 */
export enum ErrorCategory {
    TRANSIENT = "TRANSIENT", // Retry on the next scheduled run
    PERMANENT = "PERMANENT", // Needs a fix upstream, skip for now
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Remote service errors
    SERVICE_TIMEOUT = "SERVICE_TIMEOUT",
    SERVICE_UNREACHABLE = "SERVICE_UNREACHABLE",
    SERVICE_HTTP_ERROR = "SERVICE_HTTP_ERROR",
    SERVICE_RATE_LIMITED = "SERVICE_RATE_LIMITED",
    MALFORMED_RESPONSE = "MALFORMED_RESPONSE",
    DOWNLOAD_CLIENT_UNHEALTHY = "DOWNLOAD_CLIENT_UNHEALTHY",
    MISSING_CONTENT_REFERENCE = "MISSING_CONTENT_REFERENCE",

    // State store errors
    STATE_WRITE_FAILED = "STATE_WRITE_FAILED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export type ServiceOperation =
    | "listQueue"
    | "removeItem"
    | "triggerSearchReplacement";

/**
 * Failure talking to one of the *arr services. `kind` is what the
 * orchestrator branches on; `status` is the HTTP status when one arrived.
 */
export class ServiceError extends AppError {
    public readonly kind: "transient" | "permanent";

    constructor(
        code: ErrorCode,
        category: ErrorCategory.TRANSIENT | ErrorCategory.PERMANENT,
        message: string,
        public readonly origin: ServiceOrigin,
        public readonly operation: ServiceOperation,
        public readonly status?: number
    ) {
        super(code, category, message, { origin, operation, status });
        this.name = "ServiceError";
        this.kind =
            category === ErrorCategory.TRANSIENT ? "transient" : "permanent";
        Object.setPrototypeOf(this, ServiceError.prototype);
    }
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

/**
 * Check if an error is permanent
 */
export function isPermanent(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.PERMANENT;
    }
    return false;
}

export function isNotFound(error: unknown): boolean {
    return axios.isAxiosError(error) && error.response?.status === 404;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map anything thrown while calling a service onto a ServiceError.
 * Timeouts, connection failures, 5xx and 429 are transient; every other
 * 4xx and any body that fails schema validation is permanent.
 */
export function toServiceError(
    error: unknown,
    origin: ServiceOrigin,
    operation: ServiceOperation
): ServiceError {
    if (error instanceof ServiceError) {
        return error;
    }

    const prefix = `${origin} ${operation}`;

    if (error instanceof ZodError) {
        const issues = error.issues
            .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
            .join("; ");
        return new ServiceError(
            ErrorCode.MALFORMED_RESPONSE,
            ErrorCategory.PERMANENT,
            `${prefix}: malformed response (${issues})`,
            origin,
            operation
        );
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;

        if (status === undefined) {
            const timedOut =
                error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
            return new ServiceError(
                timedOut ? ErrorCode.SERVICE_TIMEOUT : ErrorCode.SERVICE_UNREACHABLE,
                ErrorCategory.TRANSIENT,
                `${prefix}: ${timedOut ? "timed out" : "unreachable"} (${error.message})`,
                origin,
                operation
            );
        }

        if (status === 429) {
            return new ServiceError(
                ErrorCode.SERVICE_RATE_LIMITED,
                ErrorCategory.TRANSIENT,
                `${prefix}: rate limited (HTTP 429)`,
                origin,
                operation,
                status
            );
        }

        return new ServiceError(
            ErrorCode.SERVICE_HTTP_ERROR,
            status >= 500 ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
            `${prefix}: HTTP ${status}`,
            origin,
            operation,
            status
        );
    }

    return new ServiceError(
        ErrorCode.SERVICE_UNREACHABLE,
        ErrorCategory.TRANSIENT,
        `${prefix}: ${errorMessage(error)}`,
        origin,
        operation
    );
}
