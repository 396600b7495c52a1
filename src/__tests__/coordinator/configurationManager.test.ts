// ─── Configuration Manager Tests ─────────────────────────────────────────────

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigurationInitError, InvariantViolationError, PersistenceError } from '../../core/errors';
import { DaemonMode, TaskState } from '../../core/types';
import { ConfigurationManager, ConfigurationManagerOptions } from '../../coordinator/configurationManager';
import { MemoryPersistence } from '../../persistence/memoryStore';
import { clusterConfig, executorConfig, silentLogger } from '../fixtures';

function optionsFor(store: MemoryPersistence, overrides: Partial<ConfigurationManagerOptions> = {}): ConfigurationManagerOptions {
	return {
		clusterConfig: clusterConfig(),
		executorConfig: executorConfig(),
		serverCount: 3,
		seedCount: 2,
		updateConfig: false,
		placementStrategy: 'NODE',
		planStrategy: 'DEFAULT',
		seedsUrl: 'http://coordinator.test/v1/seeds',
		persistence: store,
		logger: silentLogger(),
		...overrides,
	};
}

describe('ConfigurationManager', () => {
	let store: MemoryPersistence;

	beforeEach(() => {
		store = new MemoryPersistence();
	});

	describe('create', () => {
		it('seeds an empty store in steady-state mode', async () => {
			const manager = await ConfigurationManager.create(optionsFor(store));

			expect(manager.mode).toBe('steady-state');
			expect(manager.getServerCount()).toBe(3);
			expect(manager.getSeedCount()).toBe(2);
			expect(manager.getClusterConfig()).toEqual(clusterConfig());
			expect(manager.getExecutorConfig()).toEqual(executorConfig());
			expect(store.raw('serverCount')).toBe('3');
		});

		it('exposes the launch strategies and seeds url', async () => {
			const manager = await ConfigurationManager.create(optionsFor(store, {
				placementStrategy: 'ANY',
				planStrategy: 'PARALLEL',
			}));

			expect(manager.getPlacementStrategy()).toBe('ANY');
			expect(manager.getPlanStrategy()).toBe('PARALLEL');
			expect(manager.getSeedsUrl()).toBe('http://coordinator.test/v1/seeds');
			expect(manager.isUpdateRequested()).toBe(false);
		});

		it('adopts persisted values on restart', async () => {
			await ConfigurationManager.create(optionsFor(store));
			const restarted = await ConfigurationManager.create(optionsFor(store, {
				serverCount: 8,
				seedCount: 1,
				executorConfig: executorConfig({ heapMb: 999 }),
			}));

			expect(restarted.getServerCount()).toBe(3);
			expect(restarted.getSeedCount()).toBe(2);
			expect(restarted.getExecutorConfig().heapMb).toBe(128);
		});

		it('wraps an invariant violation in ConfigurationInitError', async () => {
			await ConfigurationManager.create(optionsFor(store));

			const failure = ConfigurationManager.create(optionsFor(store, { serverCount: 5, updateConfig: true }));

			await expect(failure).rejects.toBeInstanceOf(ConfigurationInitError);
			const error = await failure.catch((err: unknown) => err);
			expect(error instanceof ConfigurationInitError && error.cause).toBeInstanceOf(InvariantViolationError);
		});

		it('wraps an unreachable store in ConfigurationInitError', async () => {
			store.failOn('serverCount', 'load', new Error('connection refused'));

			const failure = ConfigurationManager.create(optionsFor(store));

			await expect(failure).rejects.toThrow(
				'Failed to reconcile configuration: Persistence load failed for "serverCount": connection refused'
			);
		});

		it('applies supplied values in update mode', async () => {
			await ConfigurationManager.create(optionsFor(store));

			const manager = await ConfigurationManager.create(optionsFor(store, {
				updateConfig: true,
				serverCount: 3,
				seedCount: 1,
			}));

			expect(manager.mode).toBe('update');
			expect(manager.isUpdateRequested()).toBe(true);
			expect(manager.getSeedCount()).toBe(1);
			expect(store.raw('seedCount')).toBe('1');
		});
	});

	describe('setters', () => {
		let manager: ConfigurationManager;

		beforeEach(async () => {
			manager = await ConfigurationManager.create(optionsFor(store));
		});

		it('persists then publishes the server count', async () => {
			await manager.setServerCount(5);

			expect(manager.getServerCount()).toBe(5);
			expect(store.raw('serverCount')).toBe('5');
		});

		it('persists then publishes the seed count', async () => {
			await manager.setSeedCount(1);

			expect(manager.getSeedCount()).toBe(1);
			expect(store.raw('seedCount')).toBe('1');
		});

		it('persists then publishes the executor config', async () => {
			await manager.setExecutorConfig(executorConfig({ command: './bin/next' }));

			expect(manager.getExecutorConfig().command).toBe('./bin/next');
			expect(JSON.parse(store.raw('executorConfig') ?? '{}').command).toBe('./bin/next');
		});

		it('keeps a frozen copy of the cluster config it was given', async () => {
			const next = clusterConfig({ cpus: 4 });
			await manager.setClusterConfig(next);

			expect(manager.getClusterConfig()).toEqual(next);
			expect(manager.getClusterConfig()).not.toBe(next);
			expect(Object.isFrozen(manager.getClusterConfig())).toBe(true);
		});

		it('leaves the snapshot unchanged when persisting fails', async () => {
			store.failOn('clusterConfig', 'store', new Error('write timeout'));

			await expect(manager.setClusterConfig(clusterConfig({ cpus: 8 }))).rejects.toBeInstanceOf(PersistenceError);

			expect(manager.getClusterConfig().cpus).toBe(1);
		});

		it('recovers after a failed write', async () => {
			store.failOn('serverCount', 'store');
			await expect(manager.setServerCount(9)).rejects.toBeInstanceOf(PersistenceError);

			store.clearFailures();
			await manager.setServerCount(4);
			expect(manager.getServerCount()).toBe(4);
		});

		it.each([-1, 2.5, NaN])('rejects server count %s and keeps the current value', async (servers) => {
			await expect(manager.setServerCount(servers)).rejects.toBeInstanceOf(PersistenceError);

			expect(manager.getServerCount()).toBe(3);
			expect(store.raw('serverCount')).toBe('3');
		});

		it.each([-1, 2.5, NaN])('rejects seed count %s and keeps the current value', async (seeds) => {
			await expect(manager.setSeedCount(seeds)).rejects.toBeInstanceOf(PersistenceError);

			expect(manager.getSeedCount()).toBe(2);
			expect(store.raw('seedCount')).toBe('2');
		});

		it('rejects a cluster config the store could not load back', async () => {
			await expect(manager.setClusterConfig(clusterConfig({ cpus: 0 }))).rejects.toThrow(
				'Persistence store failed for "clusterConfig"'
			);

			expect(manager.getClusterConfig().cpus).toBe(1);
			expect(JSON.parse(store.raw('clusterConfig') ?? '{}').cpus).toBe(1);
		});

		it('still restarts after a rejected setter call', async () => {
			await expect(manager.setServerCount(-1)).rejects.toBeInstanceOf(PersistenceError);

			const restarted = await ConfigurationManager.create(optionsFor(store));
			expect(restarted.getServerCount()).toBe(3);
		});

		it('does not publish before the store resolves', async () => {
			let release: () => void = () => undefined;
			const gate = new Promise<void>(resolve => { release = resolve; });
			const original = store.write.bind(store);
			vi.spyOn(store, 'write').mockImplementation(async (key, value) => {
				await gate;
				return original(key, value);
			});

			const pending = manager.setServerCount(7);
			await Promise.resolve();
			expect(manager.getServerCount()).toBe(3);

			release();
			await pending;
			expect(manager.getServerCount()).toBe(7);
		});

		it('serializes writers to the same field in call order', async () => {
			await Promise.all([
				manager.setServerCount(4),
				manager.setServerCount(5),
				manager.setServerCount(6),
			]);

			expect(manager.getServerCount()).toBe(6);
			expect(store.raw('serverCount')).toBe('6');
		});

		it('does not make other fields wait on a blocked write', async () => {
			let release: () => void = () => undefined;
			const gate = new Promise<void>(resolve => { release = resolve; });
			const original = store.write.bind(store);
			vi.spyOn(store, 'write').mockImplementation(async (key, value) => {
				if (key === 'clusterConfig') {
					await gate;
				}
				return original(key, value);
			});

			const blocked = manager.setClusterConfig(clusterConfig({ cpus: 2 }));
			await manager.setSeedCount(0);

			expect(manager.getSeedCount()).toBe(0);
			expect(manager.getClusterConfig().cpus).toBe(1);

			release();
			await blocked;
			expect(manager.getClusterConfig().cpus).toBe(2);
		});
	});

	describe('descriptors', () => {
		let manager: ConfigurationManager;

		beforeEach(async () => {
			manager = await ConfigurationManager.create(optionsFor(store));
		});

		it('creates a staging daemon with a stamped config', () => {
			const daemon = manager.createDaemonDescriptor('cluster-1', 'agent-1', 'host-1.test', 'node-0', '*', 'principal');

			expect(daemon.id).toMatch(/^node-0_[0-9a-f-]{36}$/);
			expect(daemon.executor.id).toBe(`${daemon.id}_executor`);
			expect(daemon.executor.clusterId).toBe('cluster-1');
			expect(daemon.config.application.seedProvider).toEqual({
				type: 'remote',
				url: 'http://coordinator.test/v1/seeds',
			});
			expect(daemon.status).toEqual({
				state: TaskState.STAGING,
				id: daemon.id,
				agentId: 'agent-1',
				name: 'node-0',
				clusterRole: null,
				mode: DaemonMode.STARTING,
			});
		});

		it('isolates issued descriptors from later config changes', async () => {
			const daemon = manager.createDaemonDescriptor('cluster-1', 'agent-1', 'host-1.test', 'node-0', '*', 'principal');

			await manager.setClusterConfig(clusterConfig({ cpus: 16, memoryMb: 65536 }));

			expect(daemon.cpus).toBe(1);
			expect(daemon.config.cpus).toBe(1);
			expect(daemon.config.memoryMb).toBe(2048);
		});

		it('builds executors from the current executor config', async () => {
			await manager.setExecutorConfig(executorConfig({ apiPort: 9100 }));

			const executor = manager.createExecutorDescriptor('cluster-1', 'exec-1');

			expect(executor.id).toBe('exec-1');
			expect(executor.apiPort).toBe(9100);
		});
	});

	it('start and stop are no-ops', async () => {
		const manager = await ConfigurationManager.create(optionsFor(store));
		await manager.start();
		await manager.stop();
		expect(manager.getServerCount()).toBe(3);
	});

	it('snapshot reports every effective value', async () => {
		const manager = await ConfigurationManager.create(optionsFor(store));

		expect(manager.snapshot()).toEqual({
			clusterConfig: clusterConfig(),
			executorConfig: executorConfig(),
			serverCount: 3,
			seedCount: 2,
			placementStrategy: 'NODE',
			planStrategy: 'DEFAULT',
			seedsUrl: 'http://coordinator.test/v1/seeds',
			updateRequested: false,
		});
	});
});
