import { setTimeout as sleep } from "node:timers/promises";
import { SyncError } from "../errors.js";

export type RetryPolicy = {
	/** Total attempts including the first one */
	attempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	attempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 8000,
};

export type RetryOptions = {
	signal?: AbortSignal;
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
	return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/** Only errors flagged retryable are tried again. */
export function isRetryable(error: unknown): boolean {
	if (error instanceof SyncError) return error.retryable;
	return false;
}

export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	policy: RetryPolicy = DEFAULT_RETRY_POLICY,
	options: RetryOptions = {},
): Promise<T> {
	const attempts = Math.max(1, policy.attempts);
	let lastError: unknown;

	for (let attempt = 1; attempt <= attempts; attempt++) {
		options.signal?.throwIfAborted();
		try {
			return await operation(attempt);
		} catch (error) {
			lastError = error;
			if (attempt === attempts || !isRetryable(error)) {
				throw error;
			}

			const delayMs = backoffDelay(policy, attempt);
			options.onRetry?.(attempt, delayMs, error);
			if (delayMs > 0) {
				await sleep(delayMs, undefined, { signal: options.signal });
			}
		}
	}

	throw lastError;
}
