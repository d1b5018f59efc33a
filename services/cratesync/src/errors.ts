/**
 * Error taxonomy for the sync engine
 */

export type SyncErrorCode =
	| "SESSION_EXPIRED"
	| "NOT_FOUND"
	| "PREMIUM_REQUIRED"
	| "BUSY"
	| "CANCELLED"
	| "TRANSIENT"
	| "CORRUPT_STATE";

export class SyncError extends Error {
	readonly code: SyncErrorCode;

	constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** The remote site redirected to its login page. */
export class SessionExpiredError extends SyncError {
	constructor(message = "Remote session expired, log in again") {
		super("SESSION_EXPIRED", message);
	}
}

export class NotFoundError extends SyncError {
	constructor(message = "No matching track found") {
		super("NOT_FOUND", message);
	}
}

export class PremiumRequiredError extends SyncError {
	constructor(message = "Operation requires a premium account") {
		super("PREMIUM_REQUIRED", message);
	}
}

export class BusyError extends SyncError {
	readonly runningJob: string;

	constructor(runningJob: string) {
		super("BUSY", `A job is already running: ${runningJob}`);
		this.runningJob = runningJob;
	}
}

export class CancelledError extends SyncError {
	constructor(message = "Stopped by user") {
		super("CANCELLED", message);
	}
}

/** Network or automation failure; safe to retry. */
export class TransientBackendError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("TRANSIENT", message, options);
	}
}

export class CorruptStateError extends SyncError {
	readonly path: string;

	constructor(path: string, options?: { cause?: unknown }) {
		super("CORRUPT_STATE", `State file is unreadable: ${path}`, options);
		this.path = path;
	}
}
