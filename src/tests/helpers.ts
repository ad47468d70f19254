import { AnalysisError } from '../errors/AnalysisError.js';

export function thrownBy(fn: () => unknown): AnalysisError {
    try {
        fn();
    } catch (error) {
        if (error instanceof AnalysisError) return error;
        throw error;
    }
    throw new Error('expected an AnalysisError');
}

export async function rejection(promise: Promise<unknown>): Promise<AnalysisError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof AnalysisError) return error;
        throw error;
    }
    throw new Error('expected the promise to reject');
}
