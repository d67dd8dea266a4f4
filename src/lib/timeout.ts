// lib/timeout.ts
import { OperationTimeoutError } from '../types/errors';

/**
 * Race an operation against a deadline.
 * The operation keeps running after the deadline; its result is dropped.
 * `controller` is aborted the moment the deadline passes, so the operation
 * can tell it was abandoned before it produces anything.
 */
export async function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    label: string,
    controller?: AbortController
): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
            controller?.abort();
            reject(new OperationTimeoutError(label, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation, deadline]);
    } finally {
        clearTimeout(timeoutId);
    }
}
