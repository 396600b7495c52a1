// ─── SQLite Persistence (sql.js) ─────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase } from 'sql.js';
import { PersistenceError } from '../core/errors';
import { FieldLock } from '../core/fieldLock';
import { Logger } from '../coordinator/log';
import { KeyValueBackend, StoreReference } from './reference';
import { PersistenceFactory, PersistentReference, Serializer } from './types';

interface StoredRow {
	value: string;
	updatedAt: number;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS config_values (
    key TEXT PRIMARY KEY, value TEXT NOT NULL, updatedAt INTEGER NOT NULL);
`;

/**
 * SqlJsPersistence - key/value store in a sql.js database image on disk.
 *
 * Every mutating call writes the whole image back (temp file + rename)
 * before it resolves, and is undone in memory when that write fails. With a null path the database only lives in memory.
 */
export class SqlJsPersistence implements PersistenceFactory, KeyValueBackend {
	private readonly writeLock = new FieldLock();
	private closed = false;

	private constructor(
		private readonly db: SqlJsDatabase,
		private readonly dbPath: string | null,
		private readonly logger?: Logger
	) {}

	static async open(dbPath: string | null, logger?: Logger): Promise<SqlJsPersistence> {
		try {
			const SQL = await initSqlJs();
			const db = dbPath && fs.existsSync(dbPath)
				? new SQL.Database(fs.readFileSync(dbPath))
				: new SQL.Database();
			db.run(SCHEMA);
			logger?.info('persistence', 'Opened configuration store', { path: dbPath ?? ':memory:' });
			return new SqlJsPersistence(db, dbPath, logger);
		} catch (error) {
			throw new PersistenceError(dbPath ?? ':memory:', 'open', error);
		}
	}

	createReference<T>(key: string, serializer: Serializer<T>): PersistentReference<T> {
		return new StoreReference(key, this, serializer);
	}

	async read(key: string): Promise<string | undefined> {
		this.assertOpen();
		const result = this.db.exec('SELECT value FROM config_values WHERE key = ?', [key]);
		if (result.length === 0 || result[0].values.length === 0) {
			return undefined;
		}
		const value = result[0].values[0][0];
		if (typeof value !== 'string') {
			throw new Error(`Stored value for "${key}" is not text`);
		}
		return value;
	}

	async write(key: string, value: string): Promise<void> {
		await this.commit(key, () => {
			this.db.run(
				'INSERT OR REPLACE INTO config_values (key, value, updatedAt) VALUES (?, ?, ?)',
				[key, value, Date.now()]
			);
			return true;
		});
	}

	async writeIfAbsent(key: string, value: string): Promise<string> {
		const inserted = await this.commit(key, () => {
			this.db.run(
				'INSERT OR IGNORE INTO config_values (key, value, updatedAt) VALUES (?, ?, ?)',
				[key, value, Date.now()]
			);
			return this.db.getRowsModified() > 0;
		});
		if (inserted) {
			this.logger?.debug('persistence', `Seeded "${key}"`);
		}
		const stored = await this.read(key);
		if (stored === undefined) {
			throw new Error(`Value for "${key}" vanished after insert`);
		}
		return stored;
	}

	async remove(key: string): Promise<void> {
		await this.commit(key, () => {
			this.db.run('DELETE FROM config_values WHERE key = ?', [key]);
			return this.db.getRowsModified() > 0;
		});
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		await this.writeLock.run(async () => undefined);
		this.closed = true;
		this.db.close();
		this.logger?.info('persistence', 'Closed configuration store');
	}

	private assertOpen(): void {
		if (this.closed) {
			throw new Error('Configuration store is closed');
		}
	}

	/**
	 * Apply one row change and write the image to disk. Mutations run one at
	 * a time; if the file write fails the row is put back as it was, so the
	 * rejected change never reaches a later flush.
	 */
	private commit(key: string, apply: () => boolean): Promise<boolean> {
		return this.writeLock.run(async () => {
			this.assertOpen();
			const previous = this.readRow(key);
			if (!apply()) {
				return false;
			}
			try {
				await this.flush();
			} catch (error) {
				this.restoreRow(key, previous);
				throw error;
			}
			return true;
		});
	}

	private readRow(key: string): StoredRow | undefined {
		const result = this.db.exec('SELECT value, updatedAt FROM config_values WHERE key = ?', [key]);
		if (result.length === 0 || result[0].values.length === 0) {
			return undefined;
		}
		const [value, updatedAt] = result[0].values[0];
		if (typeof value !== 'string' || typeof updatedAt !== 'number') {
			throw new Error(`Stored row for "${key}" is malformed`);
		}
		return { value, updatedAt };
	}

	private restoreRow(key: string, row: StoredRow | undefined): void {
		if (row) {
			this.db.run(
				'INSERT OR REPLACE INTO config_values (key, value, updatedAt) VALUES (?, ?, ?)',
				[key, row.value, row.updatedAt]
			);
		} else {
			this.db.run('DELETE FROM config_values WHERE key = ?', [key]);
		}
	}

	private async flush(): Promise<void> {
		const dbPath = this.dbPath;
		if (!dbPath) {
			return;
		}
		const image = Buffer.from(this.db.export());
		const tmp = `${dbPath}.tmp`;
		await fs.promises.mkdir(path.dirname(dbPath), { recursive: true });
		await fs.promises.writeFile(tmp, image);
		await fs.promises.rename(tmp, dbPath);
	}
}
