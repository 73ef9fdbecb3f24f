import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { QuestlineConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import type { ProgressStore } from './progress-store.js';
import { FileProgressStore } from './stores/file.store.js';
import { SqliteProgressStore } from './stores/sqlite.store.js';

const log = createLogger('Store');

let db: Database.Database | null = null;
let dbPath: string | null = null;

/**
 * Shared database handle. The first call opens `filePath` (":memory:" for
 * an in-process database); later calls return the same handle.
 */
export function getDb(filePath = ':memory:'): Database.Database {
    if (!db) {
        if (filePath !== ':memory:') {
            mkdirSync(path.dirname(filePath), { recursive: true });
        }
        db = new Database(filePath);
        db.pragma('journal_mode = WAL');
        dbPath = filePath;
        log.info(`Opened database ${filePath}`);
    }
    return db;
}

export function closeDb(): void {
    if (db) {
        db.close();
        log.debug(`Closed database ${dbPath}`);
        db = null;
        dbPath = null;
    }
}

export function createProgressStore(config: QuestlineConfig): ProgressStore {
    if (config.store === 'sqlite') {
        return new SqliteProgressStore(getDb(config.dbPath));
    }
    return new FileProgressStore(config.dataDir);
}

export type { ProgressStore, StoreOptions, StoreResult, ProgressCategory } from './progress-store.js';
export { FileProgressStore, SqliteProgressStore };
