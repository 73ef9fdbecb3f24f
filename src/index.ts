/**
 * questline - quest definitions, per-quester progress and its persistence
 *
 * Usage:
 *   const questline = await createQuestline({ questFile: 'quests.json' });
 *   const instance = questline.manager.beginQuest('One', 'alice');
 *   instance.resolveObjective('Tree', 'Yep');
 *   await questline.save();
 */

import { loadConfig, type QuestlineConfig } from './config.js';
import { loadQuestFile, registerQuests } from './engine/quest/definition.js';
import { QuestManager } from './engine/quest/quest-manager.js';
import { loadProgress, saveProgress } from './engine/quest/progress-sync.js';
import type { QuestDefinitionInput } from './schema/quest.js';
import { closeDb, createProgressStore } from './storage/index.js';
import type { ProgressStore, StoreResult } from './storage/progress-store.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Questline');

export interface QuestlineOptions {
    config?: QuestlineConfig;
    /** JSON file holding an array of quest definitions */
    questFile?: string;
    definitions?: QuestDefinitionInput[];
    /** Overrides the configured backend */
    store?: ProgressStore;
}

export interface Questline {
    config: QuestlineConfig;
    manager: QuestManager;
    store: ProgressStore;
    save(): Promise<StoreResult<void>>;
    reload(): Promise<StoreResult<void>>;
    close(): void;
}

/**
 * Registers quest definitions, opens the configured progress store and
 * loads saved progress into a fresh manager. Throws when definitions are
 * invalid or the stored progress cannot be loaded.
 */
export async function createQuestline(options: QuestlineOptions = {}): Promise<Questline> {
    const config = options.config ?? loadConfig();
    if (config.logLevel) {
        setLogLevel(config.logLevel);
    }

    const manager = new QuestManager();
    if (options.questFile) {
        registerQuests(manager, await loadQuestFile(options.questFile));
    }
    if (options.definitions) {
        registerQuests(manager, options.definitions);
    }

    const store = options.store ?? createProgressStore(config);
    const loaded = await loadProgress(manager, store);
    if (!loaded.ok) {
        throw loaded.error;
    }
    log.info(`Ready with ${manager.getQuests().length} quests (${config.store} store)`);

    return {
        config,
        manager,
        store,
        save: () => saveProgress(manager, store),
        reload: () => loadProgress(manager, store),
        close: closeDb
    };
}

export { loadConfig } from './config.js';
export type { QuestlineConfig } from './config.js';
export * from './engine/quest/errors.js';
export { Objective, Outcome } from './engine/quest/objective.js';
export { ObjectiveProgress } from './engine/quest/objective-progress.js';
export { Quest } from './engine/quest/quest.js';
export type { QuestInit } from './engine/quest/quest.js';
export { QuestInstance } from './engine/quest/quest-instance.js';
export { QuestManager } from './engine/quest/quest-manager.js';
export type { QuestEvents } from './engine/quest/quest-manager.js';
export { evaluatePrerequisites, describePrerequisiteFailure } from './engine/quest/prerequisites.js';
export type { PrerequisiteCheck } from './engine/quest/prerequisites.js';
export type { QuestRegistry, QuestHost, InstanceStatus } from './engine/quest/types.js';
export { createQuest, parseQuestDefinitions, registerQuests, loadQuestFile } from './engine/quest/definition.js';
export { saveProgress, loadProgress } from './engine/quest/progress-sync.js';
export * from './schema/quest.js';
export {
    FileProgressStore,
    SqliteProgressStore,
    createProgressStore,
    getDb,
    closeDb
} from './storage/index.js';
export type { ProgressStore, StoreOptions, StoreResult, ProgressCategory } from './storage/index.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
