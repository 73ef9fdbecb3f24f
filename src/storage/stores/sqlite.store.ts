import Database from 'better-sqlite3';
import { ProgressStoreError } from '../../engine/quest/errors.js';
import type { ProgressData } from '../../schema/quest.js';
import { createLogger, createTimer, getErrorMessage } from '../../utils/logger.js';
import { err, ok } from '../../utils/result.js';
import {
    abortedError,
    validateProgressData,
    type ProgressCategory,
    type ProgressStore,
    type StoreOptions,
    type StoreResult
} from '../progress-store.js';

const log = createLogger('Store').child('Sqlite');

const TABLES: Record<ProgressCategory, string> = {
    current: 'current_progress',
    completed: 'completed_progress'
};

interface ProgressRow {
    quester: string;
    quest: string;
    progress: string;
}

/**
 * SQLite-backed progress store. Each category lives in its own table and
 * every save rewrites that table inside one transaction.
 */
export class SqliteProgressStore implements ProgressStore {
    constructor(private db: Database.Database) {
        for (const table of Object.values(TABLES)) {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS ${table} (
                    quester TEXT NOT NULL,
                    quest TEXT NOT NULL,
                    progress TEXT NOT NULL,
                    PRIMARY KEY (quester, quest)
                )
            `);
        }
    }

    async saveCurrentQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>> {
        return this.save('current', data, options);
    }

    async loadCurrentQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>> {
        return this.load('current', options);
    }

    async saveCompletedQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>> {
        return this.save('completed', data, options);
    }

    async loadCompletedQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>> {
        return this.load('completed', options);
    }

    private save(category: ProgressCategory, data: ProgressData, options?: StoreOptions): StoreResult<void> {
        if (options?.signal?.aborted) {
            return err(abortedError(category));
        }

        const table = TABLES[category];
        const timer = createTimer(log);

        try {
            const insert = this.db.prepare(`INSERT INTO ${table} (quester, quest, progress) VALUES (?, ?, ?)`);
            const replaceAll = this.db.transaction((entries: ProgressData) => {
                this.db.prepare(`DELETE FROM ${table}`).run();
                for (const [quester, byQuest] of Object.entries(entries)) {
                    for (const [quest, progress] of Object.entries(byQuest)) {
                        insert.run(quester, quest, progress);
                    }
                }
            });
            replaceAll(data);
        } catch (error) {
            log.error(`Failed to save ${category} progress: ${getErrorMessage(error)}`);
            return err(new ProgressStoreError(`Cannot write ${category} progress`, 'io', error));
        }

        timer.done(`Saved ${category} progress for ${Object.keys(data).length} questers`);
        return ok(undefined);
    }

    private load(category: ProgressCategory, options?: StoreOptions): StoreResult<ProgressData> {
        if (options?.signal?.aborted) {
            return err(abortedError(category));
        }

        let rows: ProgressRow[];
        try {
            rows = this.db.prepare(`SELECT quester, quest, progress FROM ${TABLES[category]}`).all() as ProgressRow[];
        } catch (error) {
            log.error(`Failed to read ${category} progress: ${getErrorMessage(error)}`);
            return err(new ProgressStoreError(`Cannot read ${category} progress`, 'io', error));
        }

        const grouped = new Map<string, [string, string][]>();
        for (const row of rows) {
            const entries = grouped.get(row.quester) ?? [];
            entries.push([row.quest, row.progress]);
            grouped.set(row.quester, entries);
        }
        const data = Object.fromEntries(
            Array.from(grouped, ([quester, entries]): [string, Record<string, string>] => [quester, Object.fromEntries(entries)])
        );
        return validateProgressData(data, category);
    }
}
