/**
 * Retry Utilities with Fixed Backoff
 *
 * Value-driven retry: the operation never throws, it returns an outcome, and
 * a predicate on that outcome decides whether another attempt is made.
 */

/**
 * Retry configuration
 */
export interface RetryPolicy {
	/** Total attempts, first try included (minimum 1) */
	maxAttempts: number;

	/** Fixed wait between attempts in milliseconds */
	backoffMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Sleep for specified milliseconds without blocking other work
 *
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryHooks<T> {
	/** Injected sleep (default: timer-based sleep) */
	sleep?: SleepFn;

	/** Called before each wait */
	onRetry?: (value: T, attempt: number, delayMs: number) => void;
}

/**
 * Outcome of a retried operation
 */
export interface RetryOutcome<T> {
	/** Value of the last attempt */
	value: T;

	/** Attempts made */
	attempts: number;
}

/**
 * Run `fn` until `shouldRetry` rejects its value or attempts run out
 *
 * @param fn - Operation receiving the 1-based attempt number
 * @param shouldRetry - Whether a value warrants another attempt
 * @param policy - Attempt count and backoff
 */
export async function retryWhile<T>(
	fn: (attempt: number) => Promise<T>,
	shouldRetry: (value: T) => boolean,
	policy: RetryPolicy,
	hooks: RetryHooks<T> = {}
): Promise<RetryOutcome<T>> {
	const maxAttempts = Math.max(1, policy.maxAttempts);
	const wait = hooks.sleep ?? sleep;

	let attempt = 1;
	let value = await fn(attempt);

	while (attempt < maxAttempts && shouldRetry(value)) {
		hooks.onRetry?.(value, attempt, policy.backoffMs);
		await wait(policy.backoffMs);
		attempt++;
		value = await fn(attempt);
	}

	return { value, attempts: attempt };
}
