// ─── In-Memory Persistence ───────────────────────────────────────────────────

import { PersistenceOperation } from '../core/errors';
import { KeyValueBackend, StoreReference } from './reference';
import { PersistenceFactory, PersistentReference, Serializer } from './types';

type FailingOperation = Exclude<PersistenceOperation, 'open' | 'flush'>;

/**
 * MemoryPersistence - process-local store.
 *
 * Nothing survives the process. Failures can be injected per key and
 * operation so callers can exercise their error paths.
 */
export class MemoryPersistence implements PersistenceFactory, KeyValueBackend {
	private readonly values = new Map<string, string>();
	private readonly failures = new Map<string, Error>();

	createReference<T>(key: string, serializer: Serializer<T>): PersistentReference<T> {
		return new StoreReference(key, this, serializer);
	}

	async close(): Promise<void> {
		this.values.clear();
	}

	async read(key: string): Promise<string | undefined> {
		this.throwIfFailing(key, 'load');
		return this.values.get(key);
	}

	async write(key: string, value: string): Promise<void> {
		this.throwIfFailing(key, 'store');
		this.values.set(key, value);
	}

	async writeIfAbsent(key: string, value: string): Promise<string> {
		this.throwIfFailing(key, 'storeIfAbsent');
		const existing = this.values.get(key);
		if (existing !== undefined) {
			return existing;
		}
		this.values.set(key, value);
		return value;
	}

	async remove(key: string): Promise<void> {
		this.throwIfFailing(key, 'delete');
		this.values.delete(key);
	}

	/**
	 * Make every later `operation` on `key` reject with `error`
	 */
	failOn(key: string, operation: FailingOperation, error: Error = new Error('store unavailable')): void {
		this.failures.set(`${key}:${operation}`, error);
	}

	clearFailures(): void {
		this.failures.clear();
	}

	/**
	 * Stored text for a key, bypassing serializers
	 */
	raw(key: string): string | undefined {
		return this.values.get(key);
	}

	private throwIfFailing(key: string, operation: FailingOperation): void {
		const error = this.failures.get(`${key}:${operation}`);
		if (error) {
			throw error;
		}
	}
}
