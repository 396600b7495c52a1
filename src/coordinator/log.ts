// ─── Structured Logging ──────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface LogEntry {
	level: LogLevel;
	component: string;
	message: string;
	data?: unknown;
	timestamp: string;
}

export interface LoggerOptions {
	level?: LogLevel;
	/** Append lines to this file as well as the console */
	logFile?: string;
	/** Write to the console; defaults to true */
	console?: boolean;
	maxFileSizeBytes?: number;
	maxBackups?: number;
}

/**
 * Logger - JSON-lines structured logging
 *
 * warn/error go to stderr, everything else to stdout. With a log file,
 * the file is rotated once it passes maxFileSizeBytes
 * (coordinator.log → coordinator.log.1 → ...).
 */
export class Logger {
	private level: LogLevel;
	private readonly logFile?: string;
	private readonly toConsole: boolean;
	private readonly maxFileSizeBytes: number;
	private readonly maxBackups: number;

	constructor(options: LoggerOptions | LogLevel = {}) {
		const opts = typeof options === 'string' ? { level: options } : options;
		this.level = opts.level ?? 'info';
		this.logFile = opts.logFile;
		this.toConsole = opts.console ?? true;
		this.maxFileSizeBytes = opts.maxFileSizeBytes ?? 20 * 1024 * 1024;
		this.maxBackups = opts.maxBackups ?? 5;

		if (this.logFile) {
			fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
		}
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	debug(component: string, message: string, data?: unknown): void {
		this.log('debug', component, message, data);
	}

	info(component: string, message: string, data?: unknown): void {
		this.log('info', component, message, data);
	}

	warn(component: string, message: string, data?: unknown): void {
		this.log('warn', component, message, data);
	}

	error(component: string, message: string, data?: unknown): void {
		this.log('error', component, message, data);
	}

	private log(level: LogLevel, component: string, message: string, data?: unknown): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
			return;
		}

		const entry: LogEntry = {
			level,
			component,
			message,
			timestamp: new Date().toISOString(),
		};
		if (data !== undefined) {
			entry.data = data;
		}

		const line = JSON.stringify(entry);

		if (this.toConsole) {
			if (level === 'warn' || level === 'error') {
				console.error(line);
			} else {
				console.log(line);
			}
		}

		if (this.logFile) {
			this.writeToFile(this.logFile, line);
		}
	}

	private writeToFile(file: string, line: string): void {
		try {
			if (fs.existsSync(file) && fs.statSync(file).size >= this.maxFileSizeBytes) {
				this.rotate(file);
			}
			fs.appendFileSync(file, line + '\n', 'utf-8');
		} catch (error) {
			console.error('Failed to write to log file:', error);
		}
	}

	private rotate(file: string): void {
		const oldest = `${file}.${this.maxBackups}`;
		if (fs.existsSync(oldest)) {
			fs.unlinkSync(oldest);
		}
		for (let i = this.maxBackups - 1; i >= 1; i--) {
			if (fs.existsSync(`${file}.${i}`)) {
				fs.renameSync(`${file}.${i}`, `${file}.${i + 1}`);
			}
		}
		fs.renameSync(file, `${file}.1`);
	}
}
