import type { ProgressStore, StoreOptions, StoreResult } from '../../storage/progress-store.js';
import { createLogger, createTimer } from '../../utils/logger.js';
import { err, ok } from '../../utils/result.js';
import { ProgressDecodeError, ProgressStoreError } from './errors.js';
import type { QuestManager } from './quest-manager.js';

const log = createLogger('ProgressSync');

/**
 * Writes the manager's active attempts and completion counts to `store`.
 * Categories are saved current first; the first failure is returned and
 * the completed document is then left as it was.
 */
export async function saveProgress(
    manager: QuestManager,
    store: ProgressStore,
    options?: StoreOptions
): Promise<StoreResult<void>> {
    const timer = createTimer(log);

    const current = await store.saveCurrentQuestData(manager.exportCurrentProgress(), options);
    if (!current.ok) return current;

    const completed = await store.saveCompletedQuestData(manager.exportCompletedProgress(), options);
    if (!completed.ok) return completed;

    timer.done('Saved quest progress');
    return ok(undefined);
}

/**
 * Replaces the manager's progress with what `store` holds. Quest
 * definitions must already be registered. On any failure the manager is
 * unchanged.
 */
export async function loadProgress(
    manager: QuestManager,
    store: ProgressStore,
    options?: StoreOptions
): Promise<StoreResult<void>> {
    const timer = createTimer(log);

    const current = await store.loadCurrentQuestData(options);
    if (!current.ok) return current;

    const completed = await store.loadCompletedQuestData(options);
    if (!completed.ok) return completed;

    try {
        manager.importProgress(current.value, completed.value);
    } catch (error) {
        if (error instanceof ProgressDecodeError) {
            log.error(`Stored progress does not match quest definitions: ${error.toString()}`);
            return err(new ProgressStoreError(error.toString(), 'decode', error));
        }
        throw error;
    }

    timer.done('Loaded quest progress');
    return ok(undefined);
}
