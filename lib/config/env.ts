// ============================================================
// Database environment
// No connection string is a normal state: storage then runs
// in-process. A malformed one is a configuration error.
// ============================================================

export interface DatabaseEnv {
    connectionString: string;
    poolMax: number;
}

export class DatabaseConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DatabaseConfigError";
    }
}

const DEFAULT_POOL_MAX = 5;
const POSTGRES_URL_REGEX = /^postgres(?:ql)?:\/\/\S+$/i;

type EnvSource = Record<string, string | undefined>;

function readPoolMax(raw: string | undefined): number {
    const value = raw?.trim();
    if (!value) {
        return DEFAULT_POOL_MAX;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new DatabaseConfigError(
            `DATABASE_POOL_MAX must be a positive integer, got "${value}".`
        );
    }
    return parsed;
}

export function getDatabaseEnv(env: EnvSource = process.env): DatabaseEnv | null {
    const connectionString = (env.DATABASE_URL ?? env.DIRECT_URL)?.trim();
    if (!connectionString) {
        return null;
    }

    if (!POSTGRES_URL_REGEX.test(connectionString)) {
        // Never echo the value: it may carry credentials.
        throw new DatabaseConfigError(
            "DATABASE_URL must be a postgres:// or postgresql:// connection string."
        );
    }

    return { connectionString, poolMax: readPoolMax(env.DATABASE_POOL_MAX) };
}
