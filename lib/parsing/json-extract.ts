// ============================================================
// JSON extraction helpers for model output
// Fence stripping, direct parse, and a bounded brace scan.
// ============================================================

import { failure, success, type ParseResult } from "./result";

const FENCE = "```";

// Upper bound on characters examined by the brace scan.
export const MAX_SCAN_CHARS = 20_000;

// The outer object plus one level of nested braces.
const MAX_BRACE_DEPTH = 2;

/**
 * Drops a leading ```/```json line and, when present, a trailing ``` line.
 * Text that does not open with a fence is returned trimmed.
 */
export function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    const lines = trimmed.split(/\r?\n/);
    if (!lines[0]?.trim().startsWith(FENCE)) {
        return trimmed;
    }
    lines.shift();
    const last = lines[lines.length - 1];
    if (last !== undefined && last.trim().startsWith(FENCE)) {
        lines.pop();
    }
    return lines.join("\n").trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): ParseResult<unknown> {
    try {
        return success(JSON.parse(text));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return failure(`invalid JSON: ${message}`);
    }
}

export function parseJsonObject(text: string): ParseResult<Record<string, unknown>> {
    const parsed = parseJson(text);
    if (!parsed.ok) {
        return parsed;
    }
    if (!isPlainObject(parsed.value)) {
        return failure("JSON value is not an object");
    }
    return success(parsed.value);
}

/**
 * Returns the first `{...}` substring whose braces balance without
 * nesting deeper than one level. Braces inside JSON strings are ignored.
 * A start position that nests too deep is abandoned and the scan moves
 * on to the next `{`.
 */
export function findBalancedObject(text: string): string | null {
    const limit = Math.min(text.length, MAX_SCAN_CHARS);
    let start = text.indexOf("{");

    while (start !== -1 && start < limit) {
        const end = scanFrom(text, start, limit);
        if (end !== null) {
            return text.slice(start, end + 1);
        }
        start = text.indexOf("{", start + 1);
    }
    return null;
}

function scanFrom(text: string, start: number, limit: number): number | null {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < limit; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (ch === "\\") {
                escaped = true;
            } else if (ch === "\"") {
                inString = false;
            }
            continue;
        }
        if (ch === "\"") {
            inString = true;
        } else if (ch === "{") {
            depth++;
            if (depth > MAX_BRACE_DEPTH) {
                return null;
            }
        } else if (ch === "}") {
            depth--;
            if (depth === 0) {
                return i;
            }
        }
    }
    return null;
}
