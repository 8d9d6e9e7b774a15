/**
 * AVR Utility Functions
 * Reusable helpers for command handling and timing
 */

import * as CONST from './constants';
import { AvrTimeoutError } from './errors';

/**
 * Split a (possibly multi-step) command into its individual device tokens.
 * Segments are trimmed and blank ones dropped.
 *
 * @param command - Tokens joined by the command separator, e.g. "MVUP\nMVUP"
 */
export function splitCommandSequence(command: string): string[] {
    return command
        .split(CONST.COMMAND_SEPARATOR)
        .map(s => s.trim())
        .filter(s => s.length > 0);
}

/**
 * Clamp a volume value to the receiver's 0-98 scale
 */
export function clampVolume(value: number): number {
    return Math.min(CONST.MAX_VOLUME, Math.max(CONST.MIN_VOLUME, value));
}

/**
 * Backoff delay before attempt `attempt + 1`: min(base * 2^attempt, max)
 */
export function retryDelay(attempt: number, baseDelay: number, maxDelay: number): number {
    return Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
}

/**
 * Wait for `ms` milliseconds. Resolves early (without throwing) when the
 * signal is aborted, so loops can check the signal right after waking.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Race an operation against a timeout
 *
 * @param operation - Operation to perform
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Name of operation for error message
 * @returns Result of operation, or rejects with AvrTimeoutError
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new AvrTimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Parse a numeric config value, falling back when missing or not a finite,
 * non-negative integer
 */
export function parseIntOr(value: string | number | undefined, fallback: number): number {
    if (value === undefined || value === '') return fallback;
    const parsed = typeof value === 'number' ? value : parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed < 0) return fallback;
    return Math.floor(parsed);
}
