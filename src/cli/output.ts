// ─── CLI Output ──────────────────────────────────────────────────────────────

export interface OutputOptions {
	json?: boolean;
}

export function output(data: unknown, options: OutputOptions = {}): void {
	if (options.json) {
		console.log(JSON.stringify(data, null, 2));
	} else if (typeof data === 'string') {
		console.log(data);
	} else if (data !== null && data !== undefined) {
		console.log(data);
	}
}

export function error(message: string, exitCode: number = 1): never {
	console.error(message);
	process.exit(exitCode);
}

/**
 * Render a flat key/value listing, keys padded to the widest one
 */
export function formatPairs(pairs: Array<[string, string | number | boolean]>): string {
	const width = Math.max(0, ...pairs.map(([key]) => key.length));
	return pairs.map(([key, value]) => `${key.padEnd(width)}  ${value}`).join('\n');
}
