// ─── Cluster Config Transformations ──────────────────────────────────────────

import { ClusterConfig, ExecutorConfig, SeedProviderConfig } from './types';

/**
 * Recursively freeze a value. Already-frozen subtrees are skipped.
 */
export function freezeDeep<T>(value: T): T {
	if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			freezeDeep(child);
		}
	}
	return value;
}

/**
 * Independent, frozen copy of a config value.
 */
export function cloneDeep<T>(value: T): T {
	return freezeDeep(structuredClone(value));
}

export function withVolumeId(config: ClusterConfig, id: string): ClusterConfig {
	return {
		...config,
		volume: { ...config.volume, id },
	};
}

export function withSeedProvider(config: ClusterConfig, seedProvider: SeedProviderConfig): ClusterConfig {
	return {
		...config,
		application: { ...config.application, seedProvider },
	};
}

/**
 * Seed provider that asks the coordinator's seed-discovery endpoint for peers.
 */
export function createRemoteSeedProvider(url: string): SeedProviderConfig {
	return { type: 'remote', url };
}

export function executorUris(config: ExecutorConfig): string[] {
	return [config.runtimeLocation, config.executorLocation, config.daemonLocation];
}
