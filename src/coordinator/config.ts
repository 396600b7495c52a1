// ─── Config Loading & Validation ─────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigValidationError } from '../core/errors';
import { ClusterConfig, ExecutorConfig } from '../core/types';
import { LOG_LEVELS, LogLevel } from './log';

export interface ClusterSection {
	cpus: number;
	memoryMb: number;
	diskMb: number;
	volumePath: string;
	volumeSizeMb: number;
}

export interface ApplicationSection {
	clusterName: string;
	numTokens: number;
	storagePort: number;
	nativeTransportPort: number;
	/** Initial static seed list; replaced per daemon by the discovery endpoint */
	seeds: string[];
}

export interface ExecutorSection {
	command: string;
	arguments: string[];
	cpus: number;
	memoryMb: number;
	diskMb: number;
	heapMb: number;
	apiPort: number;
	adminPort: number;
	runtimeLocation: string;
	executorLocation: string;
	daemonLocation: string;
	runtimeHome: string;
}

export interface CoordinatorConfig {
	// Process settings
	logLevel: LogLevel;
	logFile: string;
	dataDir: string;
	dbPath: string;

	// Launch configuration
	clusterId: string;
	servers: number;
	seeds: number;
	updateConfig: boolean;
	placementStrategy: string;
	planStrategy: string;
	seedsUrl: string;

	cluster: ClusterSection;
	application: ApplicationSection;
	executor: ExecutorSection;
}

const HOME_DIR = path.join(os.homedir(), '.cluster-coordinator');

export const DEFAULT_CONFIG_PATH = path.join(HOME_DIR, 'config.toml');

const DEFAULT_CONFIG: CoordinatorConfig = {
	logLevel: 'info',
	logFile: path.join(HOME_DIR, 'coordinator.log'),
	dataDir: HOME_DIR,
	dbPath: path.join(HOME_DIR, 'state.db'),

	clusterId: 'cluster-coordinator',
	servers: 3,
	seeds: 2,
	updateConfig: false,
	placementStrategy: 'NODE',
	planStrategy: 'DEFAULT',
	seedsUrl: 'http://localhost:9000/v1/seeds',

	cluster: {
		cpus: 0.5,
		memoryMb: 4096,
		diskMb: 10240,
		volumePath: 'volume',
		volumeSizeMb: 9216,
	},

	application: {
		clusterName: 'cluster',
		numTokens: 256,
		storagePort: 7000,
		nativeTransportPort: 9042,
		seeds: [],
	},

	executor: {
		command: './executor/bin/executor',
		arguments: ['server', './executor/conf/executor.yml'],
		cpus: 0.1,
		memoryMb: 768,
		diskMb: 512,
		heapMb: 256,
		apiPort: 9001,
		adminPort: 9002,
		runtimeLocation: 'https://downloads.example.com/runtime.tar.gz',
		executorLocation: 'https://downloads.example.com/executor.zip',
		daemonLocation: 'https://downloads.example.com/daemon.tar.gz',
		runtimeHome: './runtime',
	},
};

export function defaultConfig(): CoordinatorConfig {
	return structuredClone(DEFAULT_CONFIG);
}

// ─── File Schema ─────────────────────────────────────────────────────────────

const fileSchema = z.object({
	logLevel: z.enum(['debug', 'info', 'warn', 'error']),
	logFile: z.string(),
	dataDir: z.string(),
	dbPath: z.string(),
	clusterId: z.string(),
	servers: z.number(),
	seeds: z.number(),
	updateConfig: z.boolean(),
	placementStrategy: z.string(),
	planStrategy: z.string(),
	seedsUrl: z.string(),
	cluster: z.object({
		cpus: z.number(),
		memoryMb: z.number(),
		diskMb: z.number(),
		volumePath: z.string(),
		volumeSizeMb: z.number(),
	}).strict().partial(),
	application: z.object({
		clusterName: z.string(),
		numTokens: z.number(),
		storagePort: z.number(),
		nativeTransportPort: z.number(),
		seeds: z.array(z.string()),
	}).strict().partial(),
	executor: z.object({
		command: z.string(),
		arguments: z.array(z.string()),
		cpus: z.number(),
		memoryMb: z.number(),
		diskMb: z.number(),
		heapMb: z.number(),
		apiPort: z.number(),
		adminPort: z.number(),
		runtimeLocation: z.string(),
		executorLocation: z.string(),
		daemonLocation: z.string(),
		runtimeHome: z.string(),
	}).strict().partial(),
}).strict().partial();

type FileConfig = z.infer<typeof fileSchema>;

/**
 * Load coordinator configuration from a TOML file with defaults.
 * A missing file means all defaults; a malformed one is an error.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
	const finalPath = configPath || DEFAULT_CONFIG_PATH;

	let fileConfig: FileConfig = {};
	if (fs.existsSync(finalPath)) {
		const content = fs.readFileSync(finalPath, 'utf-8');
		const parsed = fileSchema.safeParse(parseTOML(content));
		if (!parsed.success) {
			throw new ConfigValidationError(
				parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			);
		}
		fileConfig = parsed.data;
	}

	return applyEnvironment(mergeConfig(defaultConfig(), fileConfig), env);
}

function mergeConfig(base: CoordinatorConfig, file: FileConfig): CoordinatorConfig {
	return {
		...base,
		...file,
		cluster: { ...base.cluster, ...file.cluster },
		application: { ...base.application, ...file.application },
		executor: { ...base.executor, ...file.executor },
	};
}

function applyEnvironment(config: CoordinatorConfig, env: NodeJS.ProcessEnv): CoordinatorConfig {
	const result = { ...config };

	const update = env.COORDINATOR_UPDATE_CONFIG;
	if (update === 'true' || update === 'false') {
		result.updateConfig = update === 'true';
	}

	const level = env.COORDINATOR_LOG_LEVEL;
	if (level && isLogLevel(level)) {
		result.logLevel = level;
	}

	return result;
}

function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ─── TOML ────────────────────────────────────────────────────────────────────

export type TomlPrimitive = string | number | boolean;
export type TomlValue = TomlPrimitive | TomlPrimitive[] | TomlTable;
export interface TomlTable {
	[key: string]: TomlValue;
}

/**
 * Minimal TOML reader: comments, key = value, [section] tables and
 * single-line arrays. Dotted keys and [[array]] tables are not supported.
 */
export function parseTOML(content: string): TomlTable {
	const result: TomlTable = {};
	let currentSection: TomlTable = result;

	const lines = content.split('\n');
	for (let line of lines) {
		line = line.trim();

		if (!line || line.startsWith('#')) {
			continue;
		}

		if (line.startsWith('[') && line.endsWith(']')) {
			const sectionName = line.slice(1, -1).trim();
			const section: TomlTable = {};
			result[sectionName] = section;
			currentSection = section;
			continue;
		}

		const eqIndex = line.indexOf('=');
		if (eqIndex === -1) {
			continue;
		}

		const key = line.slice(0, eqIndex).trim();
		const raw = stripComment(line.slice(eqIndex + 1).trim());

		if (raw.startsWith('[') && raw.endsWith(']')) {
			const inner = raw.slice(1, -1).trim();
			currentSection[key] = inner ? inner.split(',').map(s => parseValue(s.trim())) : [];
		} else {
			currentSection[key] = parseValue(raw);
		}
	}

	return result;
}

function stripComment(value: string): string {
	let quoted = false;
	for (let i = 0; i < value.length; i++) {
		const ch = value[i];
		if (ch === '"') {
			quoted = !quoted;
		} else if (ch === '#' && !quoted) {
			return value.slice(0, i).trim();
		}
	}
	return value;
}

function parseValue(val: string): TomlPrimitive {
	if (val.startsWith('"') && val.endsWith('"') && val.length >= 2) {
		return val.slice(1, -1);
	}
	if (val === 'true') {
		return true;
	}
	if (val === 'false') {
		return false;
	}
	if (/^-?\d+$/.test(val)) {
		return parseInt(val, 10);
	}
	if (/^-?\d+\.\d+$/.test(val)) {
		return parseFloat(val);
	}
	return val;
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate configuration values. The seed/server relationship is checked
 * during reconciliation, not here.
 */
export function validateConfig(config: CoordinatorConfig): string[] {
	const errors: string[] = [];

	if (!isLogLevel(config.logLevel)) {
		errors.push('logLevel must be one of: debug, info, warn, error');
	}

	for (const [name, value] of [['servers', config.servers], ['seeds', config.seeds]] as const) {
		if (!Number.isInteger(value) || value < 0) {
			errors.push(`${name} must be a non-negative integer`);
		}
	}

	const ports: Array<[string, number]> = [
		['application.storagePort', config.application.storagePort],
		['application.nativeTransportPort', config.application.nativeTransportPort],
		['executor.apiPort', config.executor.apiPort],
		['executor.adminPort', config.executor.adminPort],
	];
	for (const [name, port] of ports) {
		if (!Number.isInteger(port) || port < 1 || port > 65535) {
			errors.push(`${name} must be between 1 and 65535`);
		}
	}

	const resources: Array<[string, number]> = [
		['cluster.cpus', config.cluster.cpus],
		['cluster.memoryMb', config.cluster.memoryMb],
		['cluster.diskMb', config.cluster.diskMb],
		['cluster.volumeSizeMb', config.cluster.volumeSizeMb],
		['executor.cpus', config.executor.cpus],
		['executor.memoryMb', config.executor.memoryMb],
		['executor.diskMb', config.executor.diskMb],
		['executor.heapMb', config.executor.heapMb],
	];
	for (const [name, value] of resources) {
		if (!(value > 0)) {
			errors.push(`${name} must be > 0`);
		}
	}

	if (!Number.isInteger(config.application.numTokens) || config.application.numTokens < 1) {
		errors.push('application.numTokens must be a positive integer');
	}

	if (!config.seedsUrl) {
		errors.push('seedsUrl is required');
	}

	if (!config.executor.command) {
		errors.push('executor.command is required');
	}

	return errors;
}

/**
 * Load and validate in one step; throws ConfigValidationError on problems.
 */
export function loadValidatedConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
	const config = loadConfig(configPath, env);
	const errors = validateConfig(config);
	if (errors.length > 0) {
		throw new ConfigValidationError(errors);
	}
	return config;
}

// ─── Snapshot Builders ───────────────────────────────────────────────────────

export function toClusterConfig(config: CoordinatorConfig): ClusterConfig {
	const { cluster, application } = config;
	return {
		cpus: cluster.cpus,
		memoryMb: cluster.memoryMb,
		diskMb: cluster.diskMb,
		volume: {
			path: cluster.volumePath,
			sizeMb: cluster.volumeSizeMb,
		},
		application: {
			clusterName: application.clusterName,
			numTokens: application.numTokens,
			storagePort: application.storagePort,
			nativeTransportPort: application.nativeTransportPort,
			seedProvider: { type: 'static', seeds: [...application.seeds] },
		},
	};
}

export function toExecutorConfig(config: CoordinatorConfig): ExecutorConfig {
	return { ...config.executor, arguments: [...config.executor.arguments] };
}

/**
 * Ensure required directories exist
 */
export function ensureDirectories(config: CoordinatorConfig): void {
	const dirs = [
		config.dataDir,
		path.dirname(config.logFile),
		path.dirname(config.dbPath),
	];

	for (const dir of dirs) {
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
	}
}
