// ─── Cluster & Executor Configuration ────────────────────────────────────────

export interface VolumeConfig {
	/** Mount path relative to the daemon sandbox */
	readonly path: string;
	readonly sizeMb: number;
	/** Volume identity; assigned per daemon when its descriptor is built */
	readonly id?: string;
}

export type SeedProviderConfig =
	| { readonly type: 'static'; readonly seeds: readonly string[] }
	| { readonly type: 'remote'; readonly url: string };

export interface ApplicationConfig {
	readonly clusterName: string;
	readonly numTokens: number;
	readonly storagePort: number;
	readonly nativeTransportPort: number;
	readonly seedProvider: SeedProviderConfig;
}

export interface ClusterConfig {
	readonly cpus: number;
	readonly memoryMb: number;
	readonly diskMb: number;
	readonly volume: VolumeConfig;
	readonly application: ApplicationConfig;
}

export interface ExecutorConfig {
	readonly command: string;
	readonly arguments: readonly string[];
	readonly cpus: number;
	readonly memoryMb: number;
	readonly diskMb: number;
	readonly heapMb: number;
	readonly apiPort: number;
	readonly adminPort: number;
	/** Artifact locations fetched into the executor sandbox */
	readonly runtimeLocation: string;
	readonly executorLocation: string;
	readonly daemonLocation: string;
	readonly runtimeHome: string;
}

// ─── Daemon Lifecycle ────────────────────────────────────────────────────────

export enum TaskState {
	STAGING = 'staging',
	STARTING = 'starting',
	RUNNING = 'running',
	FINISHED = 'finished',
	FAILED = 'failed',
	KILLED = 'killed',
	LOST = 'lost'
}

export enum DaemonMode {
	STARTING = 'starting',
	NORMAL = 'normal',
	JOINING = 'joining',
	LEAVING = 'leaving',
	DECOMMISSIONED = 'decommissioned',
	DRAINING = 'draining',
	DRAINED = 'drained'
}

export interface DaemonStatus {
	readonly state: TaskState;
	readonly id: string;
	readonly agentId: string;
	readonly name: string;
	/** Role within the running cluster; null until the daemon reports one */
	readonly clusterRole: string | null;
	readonly mode: DaemonMode;
}

// ─── Descriptors ─────────────────────────────────────────────────────────────

export interface ExecutorDescriptor {
	readonly id: string;
	readonly clusterId: string;
	readonly command: string;
	readonly arguments: readonly string[];
	readonly cpus: number;
	readonly memoryMb: number;
	readonly diskMb: number;
	readonly heapMb: number;
	readonly apiPort: number;
	readonly adminPort: number;
	/** runtime, executor and daemon artifacts, in that order */
	readonly uris: readonly string[];
	readonly runtimeHome: string;
}

export interface DaemonDescriptor {
	readonly id: string;
	readonly agentId: string;
	readonly hostname: string;
	readonly executor: ExecutorDescriptor;
	readonly name: string;
	readonly role: string;
	readonly principal: string;
	readonly cpus: number;
	readonly memoryMb: number;
	readonly diskMb: number;
	/** Stamped copy of the cluster config; never shared with the template */
	readonly config: ClusterConfig;
	readonly status: DaemonStatus;
}
