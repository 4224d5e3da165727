export type ErrorCode =
	| "network"
	| "auth"
	| "parse"
	| "download"
	| "lock"
	| "library-refresh"
	| "config";

export class SyncError extends Error {
	readonly code: ErrorCode;
	readonly retryable: boolean;
	readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		options: {
			retryable?: boolean;
			cause?: unknown;
			context?: Record<string, unknown>;
		} = {},
	) {
		super(message, { cause: options.cause });
		this.name = "SyncError";
		this.code = code;
		this.retryable = options.retryable ?? false;
		this.context = options.context;
	}
}

/** Transport failure or unexpected HTTP status. */
export class NetworkError extends SyncError {
	readonly status?: number;

	constructor(
		message: string,
		options: { status?: number; retryable?: boolean; cause?: unknown } = {},
	) {
		super("network", message, {
			retryable: options.retryable ?? true,
			cause: options.cause,
			context: options.status ? { status: options.status } : undefined,
		});
		this.name = "NetworkError";
		this.status = options.status;
	}
}

export class AuthError extends SyncError {
	constructor(message: string, cause?: unknown) {
		super("auth", message, { cause });
		this.name = "AuthError";
	}
}

export class ParseError extends SyncError {
	constructor(message: string, cause?: unknown) {
		super("parse", message, { cause });
		this.name = "ParseError";
	}
}

export class DownloadError extends SyncError {
	constructor(message: string, cause?: unknown) {
		super("download", message, { cause });
		this.name = "DownloadError";
	}
}

export class LockError extends SyncError {
	readonly lockPath: string;

	constructor(lockPath: string, message: string, cause?: unknown) {
		super("lock", message, { cause, context: { lockPath } });
		this.name = "LockError";
		this.lockPath = lockPath;
	}
}

export class LibraryRefreshError extends SyncError {
	constructor(message: string, cause?: unknown) {
		super("library-refresh", message, { cause });
		this.name = "LibraryRefreshError";
	}
}

export class ConfigError extends SyncError {
	constructor(message: string, cause?: unknown) {
		super("config", message, { cause });
		this.name = "ConfigError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** True for a Node system error carrying one of the given errno codes. */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		typeof error.code === "string" &&
		codes.includes(error.code)
	);
}
