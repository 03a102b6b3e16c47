/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result/Either pattern using neverthrow.
 * Pipeline stages report failures as values so that no exception crosses a
 * stage boundary.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute an async function and wrap its outcome in a Result
 *
 * @param fn - Async function to execute
 * @param errorHandler - Function to convert thrown values to type E
 */
export async function tryAsync<T, E>(
	fn: () => Promise<T>,
	errorHandler: (error: unknown) => E
): Promise<Result<T, E>> {
	try {
		const value = await fn();
		return neverthrowOk(value);
	} catch (error) {
		return neverthrowErr(errorHandler(error));
	}
}
