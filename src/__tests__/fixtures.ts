// ─── Shared Test Fixtures ────────────────────────────────────────────────────

import { ClusterConfig, ExecutorConfig } from '../core/types';
import { Logger } from '../coordinator/log';

export function clusterConfig(overrides: Partial<ClusterConfig> = {}): ClusterConfig {
	return {
		cpus: 1,
		memoryMb: 2048,
		diskMb: 4096,
		volume: { path: 'volume', sizeMb: 2048 },
		application: {
			clusterName: 'test-cluster',
			numTokens: 16,
			storagePort: 7000,
			nativeTransportPort: 9042,
			seedProvider: { type: 'static', seeds: ['10.0.0.1'] },
		},
		...overrides,
	};
}

export function executorConfig(overrides: Partial<ExecutorConfig> = {}): ExecutorConfig {
	return {
		command: './bin/executor',
		arguments: ['server', 'conf/executor.yml'],
		cpus: 0.1,
		memoryMb: 512,
		diskMb: 256,
		heapMb: 128,
		apiPort: 9001,
		adminPort: 9002,
		runtimeLocation: 'https://artifacts.test/runtime.tar.gz',
		executorLocation: 'https://artifacts.test/executor.zip',
		daemonLocation: 'https://artifacts.test/daemon.tar.gz',
		runtimeHome: './runtime',
		...overrides,
	};
}

/** Logger that writes nowhere */
export function silentLogger(): Logger {
	return new Logger({ level: 'debug', console: false });
}
