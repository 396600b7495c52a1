// ─── Logger Tests ────────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '../../coordinator/log';

describe('Logger', () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coordinator-log-test-'));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it('writes JSON lines to stdout for info', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		const logger = new Logger('info');

		logger.info('reconciler', 'Using persisted configuration', { servers: 3 });

		expect(log).toHaveBeenCalledTimes(1);
		const entry = JSON.parse(String(log.mock.calls[0][0]));
		expect(entry).toMatchObject({
			level: 'info',
			component: 'reconciler',
			message: 'Using persisted configuration',
			data: { servers: 3 },
		});
		expect(typeof entry.timestamp).toBe('string');
	});

	it('writes warn and error to stderr', () => {
		const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		const logger = new Logger('debug');

		logger.warn('server', 'careful');
		logger.error('server', 'failed');

		expect(err).toHaveBeenCalledTimes(2);
	});

	it('drops entries below the configured level', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		const logger = new Logger('warn');

		logger.debug('server', 'hidden');
		logger.info('server', 'hidden');
		expect(log).not.toHaveBeenCalled();

		logger.setLevel('debug');
		logger.debug('server', 'shown');
		expect(log).toHaveBeenCalledTimes(1);
		expect(logger.getLevel()).toBe('debug');
	});

	it('omits data when none is given', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		new Logger().info('server', 'started');

		expect(JSON.parse(String(log.mock.calls[0][0]))).not.toHaveProperty('data');
	});

	it('appends to a log file and rotates it when full', () => {
		const logFile = path.join(tempDir, 'logs', 'coordinator.log');
		const logger = new Logger({ level: 'info', logFile, console: false, maxFileSizeBytes: 10, maxBackups: 2 });

		logger.info('server', 'first');
		logger.info('server', 'second');
		logger.info('server', 'third');

		expect(JSON.parse(fs.readFileSync(logFile, 'utf-8')).message).toBe('third');
		expect(JSON.parse(fs.readFileSync(`${logFile}.1`, 'utf-8')).message).toBe('second');
		expect(JSON.parse(fs.readFileSync(`${logFile}.2`, 'utf-8')).message).toBe('first');
	});
});
