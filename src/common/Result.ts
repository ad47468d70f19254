import { AnalysisError } from "../errors/AnalysisError.js";

export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Err<E> {
    readonly ok: false;
    readonly error: E;
}

export type Result<T, E = AnalysisError> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Runs `fn` and captures an AnalysisError as an Err. Anything else is a bug
 * and keeps propagating.
 */
export function captureAnalysisError<T>(fn: () => T): Result<T> {
    try {
        return ok(fn());
    } catch (error) {
        if (error instanceof AnalysisError) {
            return err(error);
        }
        throw error;
    }
}

export async function captureAnalysisErrorAsync<T>(fn: () => Promise<T>): Promise<Result<T>> {
    try {
        return ok(await fn());
    } catch (error) {
        if (error instanceof AnalysisError) {
            return err(error);
        }
        throw error;
    }
}
