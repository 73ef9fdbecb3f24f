import type { Quest } from './quest.js';
import type { QuestInstance } from './quest-instance.js';
import type { ObjectiveProgress } from './objective-progress.js';

/**
 * Read side of the quest registry. This is all prerequisite evaluation
 * needs, so tests can hand in a stub.
 */
export interface QuestRegistry {
    getQuest(name: string): Quest | null;
    getNumCompletions(quest: Quest | string, quester: string): number;
    hasCompleted(quest: Quest | string | null, quester: string): boolean;
}

/**
 * What a quest instance reports its lifecycle to.
 */
export interface QuestHost extends QuestRegistry {
    startQuest(instance: QuestInstance): void;
    finishQuest(instance: QuestInstance): void;
    abandonQuest(instance: QuestInstance): void;
    objectiveResolved(progress: ObjectiveProgress): void;
}

export type InstanceStatus = 'active' | 'finished' | 'abandoned';
