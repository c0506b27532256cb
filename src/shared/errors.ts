export type CodecErrorCode = 'MALFORMED_XML' | 'UNEXPECTED_ROOT' | 'TYPE_MISMATCH' | 'UNKNOWN_NOTIFICATION';

export class CodecError extends Error {
	code: CodecErrorCode;
	path?: string;
	details?: unknown;

	constructor(code: CodecErrorCode, message: string, path?: string, details?: unknown) {
		super(message);
		this.name = 'CodecError';
		this.code = code;
		this.path = path;
		this.details = details;
	}
}

/**
 * Raised when a webhook's root tag is not in the registry. Callers are expected
 * to log and skip these rather than treat them as fatal.
 */
export class UnknownNotificationError extends CodecError {
	readonly notification: string;

	constructor(notification: string) {
		super('UNKNOWN_NOTIFICATION', `unknown notification: ${notification}`, notification);
		this.name = 'UnknownNotificationError';
		this.notification = notification;
	}
}

export function isUnknownNotification(e: unknown): e is UnknownNotificationError {
	return e instanceof UnknownNotificationError;
}

export function toCodecError(e: unknown): CodecError {
	if (e instanceof CodecError) return e;
	const message = e instanceof Error ? e.message : typeof e === 'string' ? e : 'Malformed input';
	return new CodecError('MALFORMED_XML', message, undefined, e);
}

export function typeMismatch(path: string, expected: string, text: string, issues?: unknown): CodecError {
	return new CodecError('TYPE_MISMATCH', `${path}: expected ${expected}, got ${JSON.stringify(text)}`, path, issues);
}
