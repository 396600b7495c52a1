// ─── Store-backed References ─────────────────────────────────────────────────

import { PersistenceError, PersistenceOperation } from '../core/errors';
import { PersistentReference, Serializer } from './types';

/**
 * Raw string storage a backend provides. Each call is atomic per key.
 */
export interface KeyValueBackend {
	read(key: string): Promise<string | undefined>;
	write(key: string, value: string): Promise<void>;
	/** Returns the text stored under `key` after the call */
	writeIfAbsent(key: string, value: string): Promise<string>;
	remove(key: string): Promise<void>;
}

/**
 * Typed view of one key in a KeyValueBackend.
 */
export class StoreReference<T> implements PersistentReference<T> {
	constructor(
		readonly key: string,
		private readonly backend: KeyValueBackend,
		private readonly serializer: Serializer<T>
	) {}

	load(): Promise<T | undefined> {
		return this.guard('load', async () => {
			const raw = await this.backend.read(this.key);
			return raw === undefined ? undefined : this.serializer.deserialize(raw);
		});
	}

	store(value: T): Promise<void> {
		return this.guard('store', () => this.backend.write(this.key, this.serializer.serialize(value)));
	}

	storeIfAbsent(value: T): Promise<T> {
		return this.guard('storeIfAbsent', async () => {
			const raw = await this.backend.writeIfAbsent(this.key, this.serializer.serialize(value));
			return this.serializer.deserialize(raw);
		});
	}

	delete(): Promise<void> {
		return this.guard('delete', () => this.backend.remove(this.key));
	}

	private async guard<R>(operation: PersistenceOperation, fn: () => Promise<R>): Promise<R> {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof PersistenceError) {
				throw error;
			}
			throw new PersistenceError(this.key, operation, error);
		}
	}
}
