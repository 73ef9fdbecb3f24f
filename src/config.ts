/**
 * Runtime configuration, read from the environment.
 *
 * Environment:
 *   QUEST_DATA_DIR=<dir>           where the file store keeps its documents (default: ./data)
 *   QUEST_STORE=file|sqlite        progress backend (default: file)
 *   QUEST_DB_PATH=<path>           SQLite database (default: <QUEST_DATA_DIR>/progress.db)
 *   QUEST_LOG_LEVEL=<level>        see utils/logger.ts
 */

import path from 'path';
import { z } from 'zod';
import { QuestConfigurationError } from './engine/quest/errors.js';
import { LOG_LEVELS } from './utils/logger.js';

const EnvSchema = z.object({
    QUEST_DATA_DIR: z.string().min(1).default('./data'),
    QUEST_STORE: z.enum(['file', 'sqlite']).default('file'),
    QUEST_DB_PATH: z.string().min(1).optional(),
    QUEST_LOG_LEVEL: z.enum(LOG_LEVELS).optional()
});

export interface QuestlineConfig {
    dataDir: string;
    store: 'file' | 'sqlite';
    dbPath: string;
    logLevel?: z.infer<typeof EnvSchema>['QUEST_LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): QuestlineConfig {
    const parsed = EnvSchema.safeParse({
        QUEST_DATA_DIR: env.QUEST_DATA_DIR || undefined,
        QUEST_STORE: env.QUEST_STORE?.toLowerCase() || undefined,
        QUEST_DB_PATH: env.QUEST_DB_PATH || undefined,
        QUEST_LOG_LEVEL: env.QUEST_LOG_LEVEL?.toLowerCase() || undefined
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new QuestConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
    }

    const values = parsed.data;
    return {
        dataDir: values.QUEST_DATA_DIR,
        store: values.QUEST_STORE,
        dbPath: values.QUEST_DB_PATH ?? path.join(values.QUEST_DATA_DIR, 'progress.db'),
        logLevel: values.QUEST_LOG_LEVEL
    };
}
