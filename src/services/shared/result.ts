import type { ServiceResult } from '../../types';
import { CircleError } from './errors';

export function ok<T>(data: T): ServiceResult<T> {
    return { success: true, data };
}

export function err<T = never>(error: CircleError): ServiceResult<T> {
    return error.details
        ? { success: false, error: error.message, code: error.code, details: error.details }
        : { success: false, error: error.message, code: error.code };
}

/**
 * Runs `operation` and reports domain failures as a failed result.
 * Anything that is not a CircleError propagates.
 */
export async function toResult<T>(operation: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
        return ok(await operation());
    } catch (error) {
        if (error instanceof CircleError) {
            return err(error);
        }
        throw error;
    }
}
