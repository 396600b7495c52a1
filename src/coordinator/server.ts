// ─── Coordinator Server ──────────────────────────────────────────────────────

import { ConfigurationManager } from './configurationManager';
import {
	CoordinatorConfig,
	ensureDirectories,
	loadValidatedConfig,
	toClusterConfig,
	toExecutorConfig,
} from './config';
import { Logger } from './log';
import { PersistenceFactory } from '../persistence/types';
import { SqlJsPersistence } from '../persistence/sqliteStore';

export interface CoordinatorServerOptions {
	configPath?: string;
	/** Overrides the config file's updateConfig flag */
	updateConfig?: boolean;
	/** Keep the store in memory instead of at config.dbPath */
	ephemeral?: boolean;
	logger?: Logger;
	/** Store to use instead of opening one from config.dbPath */
	persistence?: PersistenceFactory;
	config?: CoordinatorConfig;
}

/**
 * CoordinatorServer - process lifecycle around the configuration manager
 *
 * Lifecycle:
 * 1. Load and validate config
 * 2. Open the configuration store
 * 3. Reconcile (ConfigurationManager.create)
 * 4. Handle shutdown signals
 *
 * A reconciliation failure is fatal: start() rejects and nothing is served.
 */
export class CoordinatorServer {
	private readonly config: CoordinatorConfig;
	private readonly logger: Logger;
	private persistence?: PersistenceFactory;
	private manager?: ConfigurationManager;
	private running = false;

	constructor(private readonly options: CoordinatorServerOptions = {}) {
		const config = options.config ?? loadValidatedConfig(options.configPath);
		this.config = options.updateConfig === undefined
			? config
			: { ...config, updateConfig: options.updateConfig };

		if (!options.ephemeral && !options.persistence) {
			ensureDirectories(this.config);
		}

		this.logger = options.logger ?? new Logger({
			level: this.config.logLevel,
			logFile: options.ephemeral ? undefined : this.config.logFile,
		});
	}

	async start(): Promise<ConfigurationManager> {
		if (this.running) {
			throw new Error('Coordinator already running');
		}

		this.logger.info('server', 'Starting coordinator', {
			clusterId: this.config.clusterId,
			updateConfig: this.config.updateConfig,
		});

		try {
			const persistence = this.options.persistence
				?? await SqlJsPersistence.open(this.options.ephemeral ? null : this.config.dbPath, this.logger);
			this.persistence = persistence;

			this.manager = await ConfigurationManager.create({
				clusterConfig: toClusterConfig(this.config),
				executorConfig: toExecutorConfig(this.config),
				serverCount: this.config.servers,
				seedCount: this.config.seeds,
				updateConfig: this.config.updateConfig,
				placementStrategy: this.config.placementStrategy,
				planStrategy: this.config.planStrategy,
				seedsUrl: this.config.seedsUrl,
				persistence,
				logger: this.logger,
			});
			await this.manager.start();

			this.running = true;
			this.logger.info('server', 'Coordinator started');
			return this.manager;
		} catch (error) {
			this.logger.error('server', 'Failed to start coordinator', { error: String(error) });
			await this.closePersistence();
			throw error;
		}
	}

	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}

		this.logger.info('server', 'Stopping coordinator');
		try {
			await this.manager?.stop();
		} finally {
			await this.closePersistence();
			this.running = false;
			this.logger.info('server', 'Coordinator stopped');
		}
	}

	/**
	 * Stop on SIGTERM/SIGINT and exit
	 */
	installSignalHandlers(): void {
		const shutdown = (signal: NodeJS.Signals) => {
			this.logger.info('server', `Received ${signal}, shutting down`);
			this.stop().then(
				() => process.exit(0),
				(error: unknown) => {
					this.logger.error('server', 'Error during shutdown', { error: String(error) });
					process.exit(1);
				}
			);
		};
		process.once('SIGTERM', shutdown);
		process.once('SIGINT', shutdown);
	}

	isRunning(): boolean {
		return this.running;
	}

	getManager(): ConfigurationManager | undefined {
		return this.manager;
	}

	getConfig(): CoordinatorConfig {
		return this.config;
	}

	private async closePersistence(): Promise<void> {
		const persistence = this.persistence;
		this.persistence = undefined;
		if (persistence && !this.options.persistence) {
			await persistence.close();
		}
	}
}
