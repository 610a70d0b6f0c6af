// ============================================================
// node-postgres pool for the durable store
// The pool is created and closed explicitly by its owner;
// nothing here is cached on globalThis.
// ============================================================

import pg from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import type { DatabaseEnv } from "@/lib/config/env";

/** The slice of pg.Pool / pg.PoolClient the storage layer relies on. */
export interface DbClient {
    query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface DbPoolClient extends DbClient {
    release(err?: Error | boolean): void;
}

export interface DbPool extends DbClient {
    connect(): Promise<DbPoolClient>;
    end(): Promise<void>;
}

export function createPool(config: DatabaseEnv): pg.Pool {
    const pool = new pg.Pool({
        connectionString: config.connectionString,
        max: config.poolMax,
    });

    // An idle client losing its connection must not crash the process.
    pool.on("error", (error) => {
        console.error("[db] idle client error:", error.message);
        if (process.env.NODE_ENV === "development") {
            console.warn("[db] pool will reconnect on next query");
        }
    });

    return pool;
}

export async function closePool(pool: DbPool): Promise<void> {
    try {
        await pool.end();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("[db] failed to close pool:", message);
    }
}

/**
 * Runs `work` inside BEGIN/COMMIT on one pooled client.
 * Rolls back and rethrows on any failure.
 */
export async function withTransaction<T>(
    pool: DbPool,
    work: (client: DbClient) => Promise<T>
): Promise<T> {
    const client = await pool.connect();
    try {
        await client.query("BEGIN");
        const result = await work(client);
        await client.query("COMMIT");
        return result;
    } catch (error) {
        try {
            await client.query("ROLLBACK");
        } catch (rollbackError) {
            const message =
                rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
            console.error("[db] rollback failed:", message);
        }
        throw error;
    } finally {
        client.release();
    }
}
