// ─── Module Exports ──────────────────────────────────────────────────────────

export * from './core/types';
export * from './core/errors';
export { FieldLock } from './core/fieldLock';
export {
	cloneDeep,
	createRemoteSeedProvider,
	executorUris,
	freezeDeep,
	withSeedProvider,
	withVolumeId,
} from './core/clusterConfig';
export type { PersistenceFactory, PersistentReference, Serializer } from './persistence/types';
export { CONFIG_KEYS } from './persistence/types';
export type { KeyValueBackend } from './persistence/reference';
export { StoreReference } from './persistence/reference';
export { MemoryPersistence } from './persistence/memoryStore';
export { SqlJsPersistence } from './persistence/sqliteStore';
export {
	clusterConfigSchema,
	clusterConfigSerializer,
	countSerializer,
	executorConfigSchema,
	executorConfigSerializer,
	jsonSerializer,
} from './persistence/serializers';
export { Logger } from './coordinator/log';
export type { LogLevel, LogEntry, LoggerOptions } from './coordinator/log';
export {
	defaultConfig,
	ensureDirectories,
	loadConfig,
	loadValidatedConfig,
	parseTOML,
	toClusterConfig,
	toExecutorConfig,
	validateConfig,
} from './coordinator/config';
export type { CoordinatorConfig } from './coordinator/config';
export { Reconciler } from './coordinator/reconciler';
export type {
	ConfigurationReferences,
	ConfigurationValues,
	ReconciliationMode,
	ReconciliationResult,
} from './coordinator/reconciler';
export { DaemonFactory } from './coordinator/daemonFactory';
export type { ConfigurationSnapshot, DaemonRequest } from './coordinator/daemonFactory';
export { ConfigurationManager } from './coordinator/configurationManager';
export type { ConfigurationManagerOptions, ConfigurationSnapshotView } from './coordinator/configurationManager';
export { CoordinatorServer } from './coordinator/server';
export type { CoordinatorServerOptions } from './coordinator/server';
