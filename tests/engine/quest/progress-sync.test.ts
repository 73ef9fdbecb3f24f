import { describe, it, expect, beforeEach } from 'vitest';
import { ProgressStoreError } from '../../../src/engine/quest/errors.js';
import { loadProgress, saveProgress } from '../../../src/engine/quest/progress-sync.js';
import { QuestManager } from '../../../src/engine/quest/quest-manager.js';
import type { ProgressData } from '../../../src/schema/quest.js';
import type { ProgressStore, StoreResult } from '../../../src/storage/progress-store.js';
import { err, ok } from '../../../src/utils/result.js';
import { questOne, twoStepQuest } from './helpers.js';

/**
 * In-memory store; `failing` names the operations that report an I/O error.
 */
class MemoryStore implements ProgressStore {
    current: ProgressData = {};
    completed: ProgressData = {};
    failing = new Set<string>();

    private check(operation: string): StoreResult<void> {
        return this.failing.has(operation)
            ? err(new ProgressStoreError(`${operation} failed`, 'io'))
            : ok(undefined);
    }

    async saveCurrentQuestData(data: ProgressData): Promise<StoreResult<void>> {
        const result = this.check('saveCurrent');
        if (result.ok) this.current = structuredClone(data);
        return result;
    }

    async loadCurrentQuestData(): Promise<StoreResult<ProgressData>> {
        const result = this.check('loadCurrent');
        return result.ok ? ok(structuredClone(this.current)) : result;
    }

    async saveCompletedQuestData(data: ProgressData): Promise<StoreResult<void>> {
        const result = this.check('saveCompleted');
        if (result.ok) this.completed = structuredClone(data);
        return result;
    }

    async loadCompletedQuestData(): Promise<StoreResult<ProgressData>> {
        const result = this.check('loadCompleted');
        return result.ok ? ok(structuredClone(this.completed)) : result;
    }
}

function freshManager(): QuestManager {
    const manager = new QuestManager();
    manager.addQuest(questOne());
    manager.addQuest(twoStepQuest());
    return manager;
}

describe('progress sync', () => {
    let store: MemoryStore;

    beforeEach(() => {
        store = new MemoryStore();
    });

    it('should load nothing from an empty store', async () => {
        const manager = freshManager();
        expect(await loadProgress(manager, store)).toEqual({ ok: true, value: undefined });
        expect(manager.exportCurrentProgress()).toEqual({});
    });

    it('should carry progress across managers', async () => {
        const before = freshManager();
        before.beginQuest('One', 'Alice').resolveObjective('Tree', 'Yep');
        before.beginQuest('Errand', 'Alice').resolveObjective('Fetch', 'Lost');

        expect((await saveProgress(before, store)).ok).toBe(true);

        const after = freshManager();
        expect((await loadProgress(after, store)).ok).toBe(true);
        expect(after.getNumCompletions('One', 'Alice')).toBe(1);
        expect(after.getActiveInstance('Errand', 'Alice')?.getOutcomes()).toEqual({ Fetch: 'Lost' });
        expect(after.exportCurrentProgress()).toEqual(before.exportCurrentProgress());
    });

    it('should stop at the first failed save', async () => {
        const manager = freshManager();
        manager.beginQuest('One', 'Alice').resolveObjective('Tree', 'Yep');
        store.failing.add('saveCurrent');

        const result = await saveProgress(manager, store);

        expect(result.ok).toBe(false);
        expect(store.completed).toEqual({});
    });

    it('should return load failures and leave the manager alone', async () => {
        const manager = freshManager();
        const active = manager.beginQuest('Errand', 'Alice');
        store.failing.add('loadCompleted');

        const result = await loadProgress(manager, store);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.message).toBe('loadCompleted failed');
        }
        expect(manager.getActiveInstance('Errand', 'Alice')).toBe(active);
    });

    it('should turn progress that does not match the definitions into a decode failure', async () => {
        store.completed = { Alice: { Retired: '{"completions":1}' } };
        const manager = freshManager();

        const result = await loadProgress(manager, store);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('decode');
            expect(result.error.message).toBe('Alice/Retired: Quest is not registered');
        }
    });
});
