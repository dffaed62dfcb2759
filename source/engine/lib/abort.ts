/**
 * Abort utilities for cooperative cancellation and provider deadlines.
 */

function normalizeReason(reason: unknown): string {
	if (reason instanceof Error) {
		return reason.message || 'Cancelled';
	}
	if (typeof reason === 'string' && reason.trim().length > 0) {
		return reason;
	}
	if (reason === undefined || reason === null) {
		return 'Cancelled';
	}
	return String(reason);
}

export function getAbortReason(signal?: AbortSignal): string {
	const reason: unknown = signal?.reason;
	return normalizeReason(reason);
}

export function createAbortError(reason?: unknown): Error {
	const error = new Error(normalizeReason(reason));
	error.name = 'AbortError';
	return error;
}

export function throwIfAborted(signal?: AbortSignal, context?: string): void {
	if (!signal?.aborted) {
		return;
	}
	const reason = getAbortReason(signal);
	const message = context ? `${context}: ${reason}` : reason;
	throw createAbortError(message);
}

export function isAbortError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = 'code' in error ? error.code : undefined;
	return (
		error.name === 'AbortError' ||
		error.name === 'TimeoutError' ||
		code === 'ABORT_ERR' ||
		code === 'ERR_ABORTED'
	);
}

/**
 * Race a promise against a deadline.
 *
 * Rejects with an AbortError once `timeoutMs` elapses. The underlying work is
 * not interrupted; its eventual result is ignored. A non-positive timeout
 * returns the promise unchanged.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	context: string,
): Promise<T> {
	if (timeoutMs <= 0) {
		return promise;
	}

	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(createAbortError(`${context}: timed out after ${timeoutMs}ms`));
		}, timeoutMs);

		promise.then(
			value => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}
