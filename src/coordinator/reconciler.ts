// ─── Configuration Reconciliation ────────────────────────────────────────────

import { InvariantViolationError } from '../core/errors';
import { ClusterConfig, ExecutorConfig } from '../core/types';
import { PersistentReference } from '../persistence/types';
import { Logger } from './log';

export interface ConfigurationValues {
	clusterConfig: ClusterConfig;
	executorConfig: ExecutorConfig;
	serverCount: number;
	seedCount: number;
}

export interface ConfigurationReferences {
	clusterConfig: PersistentReference<ClusterConfig>;
	executorConfig: PersistentReference<ExecutorConfig>;
	serverCount: PersistentReference<number>;
	seedCount: PersistentReference<number>;
}

export type ReconciliationMode = 'update' | 'steady-state';

export interface ReconciliationResult extends ConfigurationValues {
	mode: ReconciliationMode;
	/** Server count found in the store before reconciling, if any */
	previousServerCount?: number;
}

/**
 * Reconciler - decides between supplied and persisted configuration
 *
 * Update mode: the supplied values win, provided the server count does not
 * grow past the persisted one and seeds do not outnumber servers. All four
 * values are then overwritten in the store.
 *
 * Steady-state mode: each value is seeded into the store only if absent,
 * and whatever the store holds afterwards is adopted.
 *
 * Failures are not retried here.
 */
export class Reconciler {
	constructor(
		private readonly refs: ConfigurationReferences,
		private readonly logger: Logger
	) {}

	async reconcile(supplied: ConfigurationValues, updateRequested: boolean): Promise<ReconciliationResult> {
		this.logger.info('reconciler', 'Reconciling supplied and persisted configuration');

		const previousServerCount = await this.refs.serverCount.load();

		if (updateRequested) {
			this.logger.info('reconciler', 'Configuration update requested', {
				servers: supplied.serverCount,
				seeds: supplied.seedCount,
				persistedServers: previousServerCount ?? null,
			});
			this.checkInvariants(supplied, previousServerCount);

			await this.refs.serverCount.store(supplied.serverCount);
			await this.refs.seedCount.store(supplied.seedCount);
			await this.refs.clusterConfig.store(supplied.clusterConfig);
			await this.refs.executorConfig.store(supplied.executorConfig);

			return { mode: 'update', previousServerCount, ...supplied };
		}

		this.logger.info('reconciler', 'Using persisted configuration');
		const serverCount = await this.refs.serverCount.storeIfAbsent(supplied.serverCount);
		const seedCount = await this.refs.seedCount.storeIfAbsent(supplied.seedCount);
		const clusterConfig = await this.refs.clusterConfig.storeIfAbsent(supplied.clusterConfig);
		const executorConfig = await this.refs.executorConfig.storeIfAbsent(supplied.executorConfig);

		if (previousServerCount !== undefined && serverCount !== supplied.serverCount) {
			this.logger.warn('reconciler', 'Supplied server count ignored in favour of persisted value', {
				supplied: supplied.serverCount,
				persisted: serverCount,
			});
		}

		return {
			mode: 'steady-state',
			previousServerCount,
			clusterConfig,
			executorConfig,
			serverCount,
			seedCount,
		};
	}

	private checkInvariants(supplied: ConfigurationValues, persistedServers: number | undefined): void {
		const { serverCount, seedCount } = supplied;

		if (persistedServers !== undefined && serverCount > persistedServers) {
			throw this.violation(
				new InvariantViolationError(
					'server-ratchet',
					serverCount,
					persistedServers,
					`The requested number of servers (${serverCount}) exceeds the persisted number of ` +
					`servers (${persistedServers}). Resizing the cluster requires an explicit ` +
					'server removal or expansion procedure'
				)
			);
		}

		if (seedCount > serverCount) {
			throw this.violation(
				new InvariantViolationError(
					'seeds-exceed-servers',
					seedCount,
					serverCount,
					`The requested number of seeds (${seedCount}) exceeds the requested number of ` +
					`servers (${serverCount}). Reduce the number of seeds or increase the number of servers`
				)
			);
		}
	}

	private violation(error: InvariantViolationError): InvariantViolationError {
		this.logger.error('reconciler', error.message, {
			kind: error.kind,
			requested: error.requested,
			limit: error.limit,
		});
		return error;
	}
}
