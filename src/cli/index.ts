// ─── Command Line ────────────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { describeError } from '../core/errors';
import { ConfigurationSnapshotView } from '../coordinator/configurationManager';
import { loadValidatedConfig } from '../coordinator/config';
import { Logger } from '../coordinator/log';
import { CoordinatorServer } from '../coordinator/server';
import { clusterConfigSerializer, countSerializer, executorConfigSerializer } from '../persistence/serializers';
import { SqlJsPersistence } from '../persistence/sqliteStore';
import { CONFIG_KEYS } from '../persistence/types';
import { error, formatPairs, output } from './output';

interface CommonOptions {
	config?: string;
	json?: boolean;
	verbose?: boolean;
}

interface RunOptions extends CommonOptions {
	update?: boolean;
	ephemeral?: boolean;
}

interface CreateDaemonOptions extends RunOptions {
	agent: string;
	host: string;
	role: string;
	principal: string;
	clusterId?: string;
}

function readVersion(): string {
	const pkgPath = path.join(__dirname, '..', '..', 'package.json');
	const pkg = z.object({ version: z.string() }).safeParse(JSON.parse(fs.readFileSync(pkgPath, 'utf-8')));
	return pkg.success ? pkg.data.version : '0.0.0';
}

function cliLogger(options: CommonOptions): Logger {
	return new Logger({ level: options.verbose ? 'debug' : 'warn' });
}

function oneShotServer(options: RunOptions): CoordinatorServer {
	return new CoordinatorServer({
		configPath: options.config,
		updateConfig: options.update ? true : undefined,
		ephemeral: options.ephemeral,
		logger: cliLogger(options),
	});
}

function formatSnapshot(view: ConfigurationSnapshotView): string {
	const { clusterConfig, executorConfig } = view;
	return formatPairs([
		['servers', view.serverCount],
		['seeds', view.seedCount],
		['placement strategy', view.placementStrategy],
		['plan strategy', view.planStrategy],
		['seeds url', view.seedsUrl],
		['cluster', clusterConfig.application.clusterName],
		['daemon cpus', clusterConfig.cpus],
		['daemon memory (MB)', clusterConfig.memoryMb],
		['daemon disk (MB)', clusterConfig.diskMb],
		['executor command', executorConfig.command],
		['executor heap (MB)', executorConfig.heapMb],
	]);
}

async function withErrors(fn: () => Promise<void>): Promise<void> {
	try {
		await fn();
	} catch (err) {
		error(`Error: ${describeError(err)}`);
	}
}

export function buildProgram(): Command {
	const program = new Command();

	program
		.name('cluster-coordinator')
		.description('Reconcile cluster launch configuration and provision daemon descriptors')
		.version(readVersion());

	program
		.command('serve')
		.description('Reconcile configuration and keep the coordinator running')
		.option('-c, --config <path>', 'Config file (TOML)')
		.option('--update', 'Apply the supplied configuration instead of the persisted one')
		.option('--ephemeral', 'Keep the configuration store in memory')
		.action((options: RunOptions) => withErrors(async () => {
			const server = new CoordinatorServer({
				configPath: options.config,
				updateConfig: options.update ? true : undefined,
				ephemeral: options.ephemeral,
			});
			server.installSignalHandlers();
			await server.start();
			// Nothing else holds the event loop open
			setInterval(() => undefined, 60_000);
		}));

	program
		.command('reconcile')
		.description('Run reconciliation once and print the effective configuration')
		.option('-c, --config <path>', 'Config file (TOML)')
		.option('--update', 'Apply the supplied configuration instead of the persisted one')
		.option('--ephemeral', 'Keep the configuration store in memory')
		.option('--json', 'Output JSON')
		.option('-v, --verbose', 'Log debug output to the console')
		.action((options: RunOptions) => withErrors(async () => {
			const server = oneShotServer(options);
			const manager = await server.start();
			try {
				const view = manager.snapshot();
				output(options.json ? view : formatSnapshot(view), { json: options.json });
			} finally {
				await server.stop();
			}
		}));

	program
		.command('show')
		.description('Print the persisted configuration without changing it')
		.option('-c, --config <path>', 'Config file (TOML)')
		.option('--json', 'Output JSON')
		.action((options: CommonOptions) => withErrors(async () => {
			const config = loadValidatedConfig(options.config);
			if (!fs.existsSync(config.dbPath)) {
				output(options.json ? {} : `No persisted configuration at ${config.dbPath}`, { json: options.json });
				return;
			}

			const store = await SqlJsPersistence.open(config.dbPath);
			try {
				const persisted = {
					serverCount: await store.createReference(CONFIG_KEYS.serverCount, countSerializer).load(),
					seedCount: await store.createReference(CONFIG_KEYS.seedCount, countSerializer).load(),
					clusterConfig: await store.createReference(CONFIG_KEYS.clusterConfig, clusterConfigSerializer).load(),
					executorConfig: await store.createReference(CONFIG_KEYS.executorConfig, executorConfigSerializer).load(),
				};
				if (options.json) {
					output(persisted, { json: true });
				} else {
					output(formatPairs([
						['servers', persisted.serverCount ?? '(unset)'],
						['seeds', persisted.seedCount ?? '(unset)'],
						['cluster', persisted.clusterConfig?.application.clusterName ?? '(unset)'],
						['executor command', persisted.executorConfig?.command ?? '(unset)'],
					]));
				}
			} finally {
				await store.close();
			}
		}));

	program
		.command('create-daemon <name>')
		.description('Build a descriptor for a new daemon from the current configuration')
		.requiredOption('--agent <id>', 'Agent the daemon is placed on')
		.requiredOption('--host <hostname>', 'Hostname of the agent')
		.option('--role <role>', 'Resource role', '*')
		.option('--principal <principal>', 'Security principal', 'coordinator-principal')
		.option('--cluster-id <id>', 'Cluster identifier (defaults to the configured one)')
		.option('-c, --config <path>', 'Config file (TOML)')
		.option('--update', 'Apply the supplied configuration instead of the persisted one')
		.option('--ephemeral', 'Keep the configuration store in memory')
		.option('--json', 'Output JSON')
		.option('-v, --verbose', 'Log debug output to the console')
		.action((name: string, options: CreateDaemonOptions) => withErrors(async () => {
			const server = oneShotServer(options);
			const manager = await server.start();
			try {
				const daemon = manager.createDaemonDescriptor(
					options.clusterId ?? server.getConfig().clusterId,
					options.agent,
					options.host,
					name,
					options.role,
					options.principal
				);
				output(options.json ? daemon : formatPairs([
					['id', daemon.id],
					['executor', daemon.executor.id],
					['host', daemon.hostname],
					['volume', daemon.config.volume.id ?? ''],
					['state', daemon.status.state],
					['mode', daemon.status.mode],
				]), { json: options.json });
			} finally {
				await server.stop();
			}
		}));

	return program;
}
