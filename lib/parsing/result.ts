// ============================================================
// Parse results and ordered strategies
// Each strategy reports success or failure as a value; the
// first success wins. Nothing here throws.
// ============================================================

export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: string };

export interface ParseStrategy<I, T> {
    name: string;
    parse(input: I): ParseResult<T>;
}

export interface StrategyOutcome<T> {
    result: ParseResult<T>;
    /** Name of the strategy that succeeded, or null when all failed. */
    strategy: string | null;
}

export function success<T>(value: T): ParseResult<T> {
    return { ok: true, value };
}

export function failure<T>(reason: string): ParseResult<T> {
    return { ok: false, reason };
}

export function firstSuccess<I, T>(
    strategies: ReadonlyArray<ParseStrategy<I, T>>,
    input: I
): StrategyOutcome<T> {
    const reasons: string[] = [];
    for (const strategy of strategies) {
        const result = strategy.parse(input);
        if (result.ok) {
            return { result, strategy: strategy.name };
        }
        reasons.push(`${strategy.name}: ${result.reason}`);
    }
    return { result: failure(reasons.join("; ")), strategy: null };
}
