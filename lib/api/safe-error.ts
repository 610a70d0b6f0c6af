// ============================================================
// Shared safe-error helpers for callers that expose the core
// over HTTP. Ensures no raw model / DB errors leak to clients.
// Every error body follows { error: string, code: string }.
// ============================================================

import { ZodError } from "zod/v4";
import type { AnswerJudgment } from "@/lib/parsing/judgment-parser";
import type { MutationResult } from "@/lib/storage/adapter";
import { StorageError } from "@/lib/storage/types";

// Stable, machine-readable error codes. Add new codes here as needed.
export type ApiErrorCode =
    // Auth
    | "AUTH_REQUIRED"
    // Validation
    | "VALIDATION_ERROR"
    // Model output
    | "JUDGMENT_PARSE_ERROR"
    // General
    | "INTERNAL_ERROR"
    | "NOT_FOUND"
    | "CONFLICT"
    | "SERVICE_UNAVAILABLE";

export interface SafeErrorResponse {
    status: number;
    body: { error: string; code: ApiErrorCode };
}

export function safeErrorBody(
    status: number,
    code: ApiErrorCode,
    error: string
): SafeErrorResponse {
    return { status, body: { error, code } };
}

export function notFoundError(entity: string): SafeErrorResponse {
    return safeErrorBody(404, "NOT_FOUND", `${entity} not found.`);
}

export function authRequiredError(): SafeErrorResponse {
    return safeErrorBody(401, "AUTH_REQUIRED", "Sign in to do this.");
}

/**
 * Maps an unreadable marking response to a 502. The judgment's own
 * error text is kept for logs, not sent to the client.
 */
export function judgmentErrorResponse(judgment: AnswerJudgment): SafeErrorResponse | null {
    if (judgment.error === null) {
        return null;
    }
    return safeErrorBody(
        502,
        "JUDGMENT_PARSE_ERROR",
        "The answer could not be marked. Please try again."
    );
}

/**
 * Maps anything thrown by the storage layer. Zod failures are input
 * problems; StorageError means the durable store let us down.
 */
export function storageErrorResponse(err: unknown): SafeErrorResponse {
    if (err instanceof ZodError) {
        const first = err.issues[0];
        const where = first && first.path.length > 0 ? ` (${first.path.map(String).join(".")})` : "";
        return safeErrorBody(400, "VALIDATION_ERROR", `Invalid input${where}.`);
    }
    if (err instanceof StorageError) {
        return safeErrorBody(
            503,
            "SERVICE_UNAVAILABLE",
            "Storage is temporarily unavailable. Please try again later."
        );
    }
    return safeErrorBody(500, "INTERNAL_ERROR", "Something went wrong.");
}

export function mutationErrorResponse<T>(result: MutationResult<T>): SafeErrorResponse | null {
    if (result.ok) {
        return null;
    }
    return result.code === "CONFLICT"
        ? safeErrorBody(409, "CONFLICT", result.message)
        : safeErrorBody(404, "NOT_FOUND", result.message);
}
