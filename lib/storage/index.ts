// ============================================================
// Storage backend selection
// Controlled fallback:
// - DATABASE_URL set and reachable: Postgres
// - unset, malformed or unreachable: in-process backend, with a
//   one-time log per process
// ============================================================

import {
    resolveIdentity,
    type ResolveIdentityInput,
} from "@/lib/access/scope";
import { getDatabaseEnv, type DatabaseEnv } from "@/lib/config/env";
import { closePool, createPool, type DbPool } from "@/lib/db";
import { StorageAdapter, type StorageAdapterOptions } from "./adapter";
import { MemoryBackend } from "./memory-backend";
import { PostgresBackend } from "./postgres-backend";
import type { StorageBackend } from "./types";

export { StorageAdapter } from "./adapter";
export type { MutationFailureCode, MutationResult } from "./adapter";
export { MemoryBackend } from "./memory-backend";
export { PostgresBackend } from "./postgres-backend";
export { StorageError } from "./types";
export type { BackendKind, StorageBackend } from "./types";

export interface ResolvedStorage {
    backend: StorageBackend;
    /** Releases the pool, if any. Safe to call more than once. */
    close(): Promise<void>;
}

export interface ResolveStorageDeps {
    createPool: (config: DatabaseEnv) => DbPool;
}

let inMemoryFallbackLogged = false;

function logFallback(reason: string): void {
    if (inMemoryFallbackLogged) return;
    inMemoryFallbackLogged = true;
    console.warn(`[storage] using in-memory storage: ${reason}`);
}

function memoryStorage(): ResolvedStorage {
    return { backend: new MemoryBackend(), close: async () => {} };
}

/**
 * Picks the backend once, at startup. Failures after this point are
 * surfaced as StorageError, never as a silent switch to memory.
 */
export async function resolveStorageBackend(
    env: Record<string, string | undefined> = process.env,
    deps: ResolveStorageDeps = { createPool }
): Promise<ResolvedStorage> {
    let config: DatabaseEnv | null;
    try {
        config = getDatabaseEnv(env);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("[storage] database config invalid:", message);
        logFallback("database config invalid");
        return memoryStorage();
    }

    if (!config) {
        logFallback("DATABASE_URL is not set");
        return memoryStorage();
    }

    const pool = deps.createPool(config);
    const backend = new PostgresBackend(pool);
    try {
        await backend.ensureSchema();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("[storage] database unreachable:", message);
        await closePool(pool);
        logFallback("database unreachable");
        return memoryStorage();
    }

    let closed = false;
    return {
        backend,
        close: async () => {
            if (closed) return;
            closed = true;
            await closePool(pool);
        },
    };
}

/** One adapter per request: identity is resolved here and never changes. */
export function createStorageAdapter(
    backend: StorageBackend,
    caller: ResolveIdentityInput,
    options?: StorageAdapterOptions
): StorageAdapter {
    return new StorageAdapter(backend, resolveIdentity(caller), options);
}
