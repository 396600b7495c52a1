// ─── Persistence Contracts ───────────────────────────────────────────────────

/**
 * Converts a value to and from its stored string form.
 * `deserialize` throws when the stored text is not a valid value.
 */
export interface Serializer<T> {
	serialize(value: T): string;
	deserialize(raw: string): T;
}

/**
 * A single named value in the persistent store.
 * All failures reject with PersistenceError.
 */
export interface PersistentReference<T> {
	readonly key: string;
	load(): Promise<T | undefined>;
	store(value: T): Promise<void>;
	/**
	 * Write `value` only if nothing is stored under this key yet.
	 * Resolves to whatever is persisted afterwards.
	 */
	storeIfAbsent(value: T): Promise<T>;
	delete(): Promise<void>;
}

export interface PersistenceFactory {
	createReference<T>(key: string, serializer: Serializer<T>): PersistentReference<T>;
	close(): Promise<void>;
}

/** Keys the configuration manager persists under */
export const CONFIG_KEYS = {
	clusterConfig: 'clusterConfig',
	executorConfig: 'executorConfig',
	serverCount: 'serverCount',
	seedCount: 'seedCount',
} as const;
