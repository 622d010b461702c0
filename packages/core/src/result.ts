import { toSplitError, type SplitError, type SplitErrorContext, type SplitErrorKind } from './errors'

/**
 * Outcome of a stage: value or typed error
 */
export type Result<T, E = SplitError> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error }
}

/**
 * Run a stage, converting anything it throws into a SplitError result
 * of the stage's kind (SplitErrors keep their own kind)
 */
export function attempt<T>(kind: SplitErrorKind, fn: () => T, context: SplitErrorContext = {}): Result<T> {
	try {
		return ok(fn())
	} catch (error) {
		return err(toSplitError(error, kind, context))
	}
}

/**
 * Async variant of attempt
 */
export async function attemptAsync<T>(
	kind: SplitErrorKind,
	fn: () => Promise<T>,
	context: SplitErrorContext = {}
): Promise<Result<T>> {
	try {
		return ok(await fn())
	} catch (error) {
		return err(toSplitError(error, kind, context))
	}
}
