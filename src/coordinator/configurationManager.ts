// ─── Configuration Manager ───────────────────────────────────────────────────

import { cloneDeep } from '../core/clusterConfig';
import { ConfigurationInitError } from '../core/errors';
import { FieldLock } from '../core/fieldLock';
import {
	ClusterConfig,
	DaemonDescriptor,
	ExecutorConfig,
	ExecutorDescriptor,
} from '../core/types';
import {
	clusterConfigSerializer,
	countSerializer,
	executorConfigSerializer,
} from '../persistence/serializers';
import { CONFIG_KEYS, PersistenceFactory, PersistentReference } from '../persistence/types';
import { DaemonFactory, DaemonRequest } from './daemonFactory';
import { Logger } from './log';
import { ConfigurationReferences, ConfigurationValues, Reconciler, ReconciliationMode } from './reconciler';

export interface ConfigurationManagerOptions extends ConfigurationValues {
	updateConfig: boolean;
	placementStrategy: string;
	planStrategy: string;
	/** Seed-discovery endpoint stamped into every new daemon's config */
	seedsUrl: string;
	persistence: PersistenceFactory;
	logger: Logger;
	/** Identifier source for descriptors; defaults to random UUIDs */
	generateId?: () => string;
}

export interface ConfigurationSnapshotView extends ConfigurationValues {
	placementStrategy: string;
	planStrategy: string;
	seedsUrl: string;
	updateRequested: boolean;
}

/**
 * A persisted field together with the lock that serializes its writers.
 */
class ManagedField<T> {
	private readonly lock = new FieldLock();

	constructor(
		readonly ref: PersistentReference<T>,
		private current: T
	) {}

	get(): T {
		return this.current;
	}

	/**
	 * Persist first, publish second. A failed store leaves `current` alone.
	 */
	set(value: T): Promise<void> {
		return this.lock.run(async () => {
			await this.ref.store(value);
			this.current = value;
		});
	}
}

/**
 * ConfigurationManager - owns the reconciled configuration for the process
 *
 * Created once at startup through `create()`, which runs reconciliation
 * against the store. Reads are plain in-memory reads of the last published
 * value. Each setter persists under its own field's lock before the new
 * value becomes visible; different fields never wait on each other.
 */
export class ConfigurationManager {
	private readonly clusterConfig: ManagedField<ClusterConfig>;
	private readonly executorConfig: ManagedField<ExecutorConfig>;
	private readonly serverCount: ManagedField<number>;
	private readonly seedCount: ManagedField<number>;
	private readonly factory: DaemonFactory;

	private constructor(
		refs: ConfigurationReferences,
		values: ConfigurationValues,
		readonly mode: ReconciliationMode,
		private readonly options: ConfigurationManagerOptions
	) {
		this.clusterConfig = new ManagedField(refs.clusterConfig, cloneDeep(values.clusterConfig));
		this.executorConfig = new ManagedField(refs.executorConfig, cloneDeep(values.executorConfig));
		this.serverCount = new ManagedField(refs.serverCount, values.serverCount);
		this.seedCount = new ManagedField(refs.seedCount, values.seedCount);
		this.factory = new DaemonFactory(this, options.generateId);
	}

	/**
	 * Reconcile against the store and return the manager.
	 * Any failure, including invariant violations, rejects with
	 * ConfigurationInitError and no manager is created.
	 */
	static async create(options: ConfigurationManagerOptions): Promise<ConfigurationManager> {
		const { persistence, logger } = options;
		try {
			const refs: ConfigurationReferences = {
				clusterConfig: persistence.createReference(CONFIG_KEYS.clusterConfig, clusterConfigSerializer),
				executorConfig: persistence.createReference(CONFIG_KEYS.executorConfig, executorConfigSerializer),
				serverCount: persistence.createReference(CONFIG_KEYS.serverCount, countSerializer),
				seedCount: persistence.createReference(CONFIG_KEYS.seedCount, countSerializer),
			};

			const result = await new Reconciler(refs, logger).reconcile(
				{
					clusterConfig: options.clusterConfig,
					executorConfig: options.executorConfig,
					serverCount: options.serverCount,
					seedCount: options.seedCount,
				},
				options.updateConfig
			);

			logger.info('config-manager', 'Configuration reconciled', {
				mode: result.mode,
				servers: result.serverCount,
				seeds: result.seedCount,
			});

			return new ConfigurationManager(refs, result, result.mode, options);
		} catch (error) {
			logger.error('config-manager', 'Failed to reconcile configuration', { error: String(error) });
			throw new ConfigurationInitError(error);
		}
	}

	// ─── Reads ──────────────────────────────────────────────────────────────

	getClusterConfig(): ClusterConfig {
		return this.clusterConfig.get();
	}

	getExecutorConfig(): ExecutorConfig {
		return this.executorConfig.get();
	}

	getServerCount(): number {
		return this.serverCount.get();
	}

	getSeedCount(): number {
		return this.seedCount.get();
	}

	getPlacementStrategy(): string {
		return this.options.placementStrategy;
	}

	getPlanStrategy(): string {
		return this.options.planStrategy;
	}

	getSeedsUrl(): string {
		return this.options.seedsUrl;
	}

	isUpdateRequested(): boolean {
		return this.options.updateConfig;
	}

	snapshot(): ConfigurationSnapshotView {
		return {
			clusterConfig: this.getClusterConfig(),
			executorConfig: this.getExecutorConfig(),
			serverCount: this.getServerCount(),
			seedCount: this.getSeedCount(),
			placementStrategy: this.getPlacementStrategy(),
			planStrategy: this.getPlanStrategy(),
			seedsUrl: this.getSeedsUrl(),
			updateRequested: this.isUpdateRequested(),
		};
	}

	// ─── Writes ─────────────────────────────────────────────────────────────

	async setClusterConfig(config: ClusterConfig): Promise<void> {
		await this.clusterConfig.set(cloneDeep(config));
		this.options.logger.info('config-manager', 'Cluster configuration updated');
	}

	async setExecutorConfig(config: ExecutorConfig): Promise<void> {
		await this.executorConfig.set(cloneDeep(config));
		this.options.logger.info('config-manager', 'Executor configuration updated');
	}

	async setSeedCount(seeds: number): Promise<void> {
		await this.seedCount.set(seeds);
		this.options.logger.info('config-manager', `Seed count set to ${seeds}`);
	}

	async setServerCount(servers: number): Promise<void> {
		await this.serverCount.set(servers);
		this.options.logger.info('config-manager', `Server count set to ${servers}`);
	}

	// ─── Descriptors ────────────────────────────────────────────────────────

	createExecutorDescriptor(clusterId: string, executorId: string): ExecutorDescriptor {
		return this.factory.createExecutorDescriptor(clusterId, executorId);
	}

	createDaemonDescriptor(
		clusterId: string,
		agentId: string,
		hostname: string,
		name: string,
		role: string,
		principal: string
	): DaemonDescriptor {
		const request: DaemonRequest = { clusterId, agentId, hostname, name, role, principal };
		const daemon = this.factory.createDaemonDescriptor(request);
		this.options.logger.debug('config-manager', `Created daemon descriptor ${daemon.id}`, {
			agentId,
			hostname,
		});
		return daemon;
	}

	// ─── Lifecycle ──────────────────────────────────────────────────────────

	/**
	 * Reconciliation already happened in `create()`; nothing left to start.
	 */
	async start(): Promise<void> {
		this.options.logger.debug('config-manager', 'start');
	}

	async stop(): Promise<void> {
		this.options.logger.debug('config-manager', 'stop');
	}
}
