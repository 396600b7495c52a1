// ─── Serializers ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import { ClusterConfig, ExecutorConfig } from '../core/types';
import { Serializer } from './types';

const seedProviderSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('static'), seeds: z.array(z.string()) }),
	z.object({ type: z.literal('remote'), url: z.string().min(1) }),
]);

const portSchema = z.number().int().min(1).max(65535);

export const clusterConfigSchema: z.ZodType<ClusterConfig> = z.object({
	cpus: z.number().positive(),
	memoryMb: z.number().int().positive(),
	diskMb: z.number().int().positive(),
	volume: z.object({
		path: z.string().min(1),
		sizeMb: z.number().int().positive(),
		id: z.string().optional(),
	}),
	application: z.object({
		clusterName: z.string().min(1),
		numTokens: z.number().int().positive(),
		storagePort: portSchema,
		nativeTransportPort: portSchema,
		seedProvider: seedProviderSchema,
	}),
});

export const executorConfigSchema: z.ZodType<ExecutorConfig> = z.object({
	command: z.string().min(1),
	arguments: z.array(z.string()),
	cpus: z.number().positive(),
	memoryMb: z.number().int().positive(),
	diskMb: z.number().int().positive(),
	heapMb: z.number().int().positive(),
	apiPort: portSchema,
	adminPort: portSchema,
	runtimeLocation: z.string(),
	executorLocation: z.string(),
	daemonLocation: z.string(),
	runtimeHome: z.string(),
});

export const countSchema = z.number().int().nonnegative();

/**
 * JSON serializer that validates in both directions, so nothing the
 * schema would refuse on load can be written.
 */
export function jsonSerializer<T>(schema: z.ZodType<T>): Serializer<T> {
	return {
		serialize: (value: T) => JSON.stringify(schema.parse(value)),
		deserialize: (raw: string) => schema.parse(JSON.parse(raw)),
	};
}

export const clusterConfigSerializer = jsonSerializer(clusterConfigSchema);
export const executorConfigSerializer = jsonSerializer(executorConfigSchema);
export const countSerializer = jsonSerializer(countSchema);
