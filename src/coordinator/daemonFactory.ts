// ─── Daemon & Executor Descriptors ───────────────────────────────────────────

import * as crypto from 'crypto';
import {
	createRemoteSeedProvider,
	executorUris,
	freezeDeep,
	withSeedProvider,
	withVolumeId,
} from '../core/clusterConfig';
import {
	ClusterConfig,
	DaemonDescriptor,
	DaemonMode,
	ExecutorConfig,
	ExecutorDescriptor,
	TaskState,
} from '../core/types';

/**
 * Read side of the configuration manager the factory builds from
 */
export interface ConfigurationSnapshot {
	getClusterConfig(): ClusterConfig;
	getExecutorConfig(): ExecutorConfig;
	getSeedsUrl(): string;
}

export interface DaemonRequest {
	clusterId: string;
	agentId: string;
	hostname: string;
	name: string;
	role: string;
	principal: string;
}

/**
 * DaemonFactory - builds immutable descriptors for new daemons
 *
 * Reads the current snapshot on every call, so descriptors always reflect
 * the configuration in effect at the moment they were created.
 */
export class DaemonFactory {
	constructor(
		private readonly snapshot: ConfigurationSnapshot,
		private readonly generateId: () => string = () => crypto.randomUUID()
	) {}

	createExecutorDescriptor(clusterId: string, executorId: string): ExecutorDescriptor {
		const config = this.snapshot.getExecutorConfig();
		return freezeDeep({
			id: executorId,
			clusterId,
			command: config.command,
			arguments: [...config.arguments],
			cpus: config.cpus,
			memoryMb: config.memoryMb,
			diskMb: config.diskMb,
			heapMb: config.heapMb,
			apiPort: config.apiPort,
			adminPort: config.adminPort,
			uris: executorUris(config),
			runtimeHome: config.runtimeHome,
		});
	}

	createDaemonDescriptor(request: DaemonRequest): DaemonDescriptor {
		const { clusterId, agentId, hostname, name, role, principal } = request;
		const unique = this.generateId();
		const id = `${name}_${unique}`;
		const executor = this.createExecutorDescriptor(clusterId, `${name}_${unique}_executor`);

		const template = this.snapshot.getClusterConfig();
		const config = withSeedProvider(
			withVolumeId(structuredClone(template), this.generateId()),
			createRemoteSeedProvider(this.snapshot.getSeedsUrl())
		);

		return freezeDeep({
			id,
			agentId,
			hostname,
			executor,
			name,
			role,
			principal,
			cpus: template.cpus,
			memoryMb: template.memoryMb,
			diskMb: template.diskMb,
			config,
			status: {
				state: TaskState.STAGING,
				id,
				agentId,
				name,
				clusterRole: null,
				mode: DaemonMode.STARTING,
			},
		});
	}
}
