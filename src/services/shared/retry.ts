import { isRetryableConflict } from './errors';

export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Re-runs `operation` while it fails with a retryable conflict, up to
 * `maxAttempts` runs in total. The last conflict is rethrown.
 */
export async function withConflictRetry<T>(
    operation: () => Promise<T>,
    maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
    onRetry?: (attempt: number, error: Error) => void
): Promise<T> {
    let attempt = 1;
    for (;;) {
        try {
            return await operation();
        } catch (error) {
            if (!isRetryableConflict(error) || attempt >= maxAttempts) {
                throw error;
            }
            onRetry?.(attempt, error);
            attempt++;
        }
    }
}
