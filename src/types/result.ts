/**
 * @file Result type shared by every layer, plus helpers turning thrown values into results.
 */

/**
 * Represents the outcome of a computation that may fail.
 */
export type Result<T, E> =
	| {
			readonly ok: true;
			readonly data: T;
	  }
	| {
			readonly ok: false;
			readonly error: E;
	  };

/**
 * Create a successful `Result`.
 */
export const ok = <T, E>(data: T): Result<T, E> => ({ ok: true, data });

/**
 * Create a failed `Result`.
 */
export const err = <T, E>(error: E): Result<T, E> => ({ ok: false, error });

/**
 * Run a computation that may throw, capturing the thrown value as the error.
 */
export const tryResult = <T>(compute: () => T): Result<T, unknown> => {
	try {
		return ok(compute());
	} catch (cause) {
		return err(cause);
	}
};

/**
 * Await a computation that may reject, capturing the rejection as the error.
 */
export const tryResultAsync = async <T>(
	compute: () => Promise<T>,
): Promise<Result<T, unknown>> => {
	try {
		return ok(await compute());
	} catch (cause) {
		return err(cause);
	}
};

/**
 * Message of a thrown value.
 */
export const causeMessage = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);
