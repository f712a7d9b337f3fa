// src/result.ts

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(error: unknown): Result<T> => ({ ok: false, error: toError(error) });

export function toError(error: unknown): Error {
    if (error instanceof Error) return error;
    if (typeof error === 'string') return new Error(error);
    return new Error(describe(error));
}

// JSON.stringify throws on cycles and BigInt, and returns undefined for some values.
function describe(value: unknown): string {
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return typeof value === 'bigint' ? `${value}n` : Object.prototype.toString.call(value);
    }
}

// Runs an async operation and folds any rejection into the failed branch.
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
    try {
        return ok(await fn());
    } catch (e) {
        return fail(e);
    }
}
