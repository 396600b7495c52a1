// ─── Errors ──────────────────────────────────────────────────────────────────

export type InvariantKind = 'server-ratchet' | 'seeds-exceed-servers';

/**
 * Requested configuration breaks a reconciliation invariant.
 * Not retryable; the operator has to change the launch configuration.
 */
export class InvariantViolationError extends Error {
	constructor(
		readonly kind: InvariantKind,
		readonly requested: number,
		readonly limit: number,
		message: string
	) {
		super(message);
		this.name = 'InvariantViolationError';
	}
}

export type PersistenceOperation = 'open' | 'load' | 'store' | 'storeIfAbsent' | 'delete' | 'flush';

export class PersistenceError extends Error {
	constructor(
		readonly key: string,
		readonly operation: PersistenceOperation,
		cause: unknown
	) {
		super(`Persistence ${operation} failed for "${key}": ${describeError(cause)}`, { cause });
		this.name = 'PersistenceError';
	}
}

/**
 * Raised when the configuration manager cannot be brought up.
 * The original failure is kept as `cause`.
 */
export class ConfigurationInitError extends Error {
	constructor(cause: unknown) {
		super(`Failed to reconcile configuration: ${describeError(cause)}`, { cause });
		this.name = 'ConfigurationInitError';
	}
}

export class ConfigValidationError extends Error {
	constructor(readonly problems: string[]) {
		super(`Configuration validation failed:\n${problems.join('\n')}`);
		this.name = 'ConfigValidationError';
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
