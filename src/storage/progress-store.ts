import { ProgressDataSchema, type ProgressData } from '../schema/quest.js';
import { ProgressStoreError } from '../engine/quest/errors.js';
import { err, ok, type Result } from '../utils/result.js';

export type StoreResult<T> = Result<T, ProgressStoreError>;

export type ProgressCategory = 'current' | 'completed';

export interface StoreOptions {
    /** Aborting before the write commits leaves the stored document as it was */
    signal?: AbortSignal;
}

/**
 * Durable home for quest progress. Two independent documents are kept:
 * attempts in progress ("current") and completion counts ("completed").
 *
 * Contract:
 * - loading a category that was never saved yields `ok({})`
 * - a save replaces the whole category or nothing
 * - any I/O or decode failure comes back as `ok: false`
 */
export interface ProgressStore {
    saveCurrentQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>>;
    loadCurrentQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>>;
    saveCompletedQuestData(data: ProgressData, options?: StoreOptions): Promise<StoreResult<void>>;
    loadCompletedQuestData(options?: StoreOptions): Promise<StoreResult<ProgressData>>;
}

/**
 * Validates data read back from a backend.
 */
export function validateProgressData(raw: unknown, category: ProgressCategory): StoreResult<ProgressData> {
    const result = ProgressDataSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        return err(new ProgressStoreError(
            `Stored ${category} progress is malformed at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
            'decode',
            result.error
        ));
    }
    return ok(result.data);
}

export function abortedError(category: ProgressCategory): ProgressStoreError {
    return new ProgressStoreError(`Operation on ${category} progress was aborted`, 'io');
}
