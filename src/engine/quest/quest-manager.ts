import { QuesterField } from '../../schema/base-schemas.js';
import type { ProgressData } from '../../schema/quest.js';
import { createLogger } from '../../utils/logger.js';
import { PubSub } from '../pubsub.js';
import {
    DuplicateQuestError,
    IllegalStateError,
    InvalidQuesterError,
    PrerequisitesNotMetError,
    UnknownQuestError
} from './errors.js';
import type { Objective, Outcome } from './objective.js';
import type { ObjectiveProgress } from './objective-progress.js';
import { describePrerequisiteFailure, evaluatePrerequisites, type PrerequisiteCheck } from './prerequisites.js';
import {
    decodeCompletedProgress,
    decodeCurrentProgress,
    encodeCompletedProgress,
    encodeCurrentProgress
} from './progress-codec.js';
import type { Quest } from './quest.js';
import type { QuestInstance } from './quest-instance.js';
import type { QuestHost } from './types.js';

const log = createLogger('QuestManager');

export interface QuestEvents {
    'quest:started': { instance: QuestInstance };
    'objective:resolved': { instance: QuestInstance; objective: Objective; outcome: Outcome };
    'quest:finished': { instance: QuestInstance; completions: number };
    'quest:abandoned': { instance: QuestInstance };
}

/** quester -> quest name -> value */
type PerQuester<T> = Map<string, Map<string, T>>;

function questName(quest: Quest | string): string {
    return typeof quest === 'string' ? quest : quest.name;
}

/**
 * Registry of quest definitions plus the live bookkeeping for every
 * quester: at most one active attempt per (quest, quester) and a count of
 * finished attempts.
 *
 * Access is synchronous and single-threaded. A host that shares one
 * manager between concurrent workers must serialize calls into it.
 */
export class QuestManager implements QuestHost {
    private quests = new Map<string, Quest>();
    private activeInstances: PerQuester<QuestInstance> = new Map();
    private completionCounts: PerQuester<number> = new Map();
    private events = new PubSub<QuestEvents>();

    // ─────────────────────────────────────────────────────────────────────────
    // DEFINITIONS
    // ─────────────────────────────────────────────────────────────────────────

    addQuest(quest: Quest): void {
        if (this.quests.has(quest.name)) {
            throw new DuplicateQuestError(quest.name);
        }
        this.quests.set(quest.name, quest);
        log.debug(`Registered quest "${quest.name}" (${quest.getAmtObjectives()} objectives)`);
    }

    getQuest(name: string): Quest | null {
        return this.quests.get(name) ?? null;
    }

    hasQuest(name: string): boolean {
        return this.quests.has(name);
    }

    getQuests(): Quest[] {
        return Array.from(this.quests.values());
    }

    // ─────────────────────────────────────────────────────────────────────────
    // LIFECYCLE
    // ─────────────────────────────────────────────────────────────────────────

    startQuest(instance: QuestInstance): void {
        const { quest, quester } = instance;
        const checked = QuesterField.safeParse(quester);
        if (!checked.success) {
            throw new InvalidQuesterError(quester, checked.error.issues[0].message);
        }
        if (this.quests.get(quest.name) !== quest) {
            throw new UnknownQuestError(quest.name);
        }
        if (!instance.isActive()) {
            throw new IllegalStateError(`Cannot start an instance that is already ${instance.getStatus()}`);
        }
        if (this.getActiveInstance(quest, quester)) {
            throw new IllegalStateError(`${quester} already has an active attempt at "${quest.name}"`);
        }

        setIn(this.activeInstances, quester, quest.name, instance);
        log.info(`${quester} started "${quest.name}" (attempt ${instance.attemptNumber})`);
        this.events.publish('quest:started', { instance });
    }

    /**
     * Records a completion for the instance's (quest, quester) and stops
     * tracking it. Normally called by the instance once its last objective
     * resolves; calling it earlier completes the attempt as it stands.
     */
    finishQuest(instance: QuestInstance): void {
        this.release(instance, 'finished');

        const completions = this.getNumCompletions(instance.quest, instance.quester) + 1;
        setIn(this.completionCounts, instance.quester, instance.quest.name, completions);

        log.info(`${instance.quester} finished "${instance.quest.name}" (${completions} completions)`);
        this.events.publish('quest:finished', { instance, completions });
    }

    abandonQuest(instance: QuestInstance): void {
        this.release(instance, 'abandoned');
        log.info(`${instance.quester} abandoned "${instance.quest.name}"`);
        this.events.publish('quest:abandoned', { instance });
    }

    objectiveResolved(progress: ObjectiveProgress): void {
        const outcome = progress.getOutcome();
        if (!outcome) return;
        log.debug(
            `${progress.instance.quester} resolved "${progress.objective.name}" of ` +
            `"${progress.instance.quest.name}" with "${outcome.name}"`
        );
        this.events.publish('objective:resolved', {
            instance: progress.instance,
            objective: progress.objective,
            outcome
        });
    }

    /**
     * Whether `quester` could begin the named quest right now.
     */
    canStart(name: string, quester: string): PrerequisiteCheck {
        return this.checkStart(this.requireQuest(name), quester);
    }

    /**
     * Looks up the quest, checks its prerequisites and starts it.
     */
    beginQuest(name: string, quester: string): QuestInstance {
        const quest = this.requireQuest(name);
        const check = this.checkStart(quest, quester);
        if (!check.ok) {
            throw new PrerequisitesNotMetError(name, quester, describePrerequisiteFailure(check));
        }
        return quest.start(quester, this);
    }

    on<K extends keyof QuestEvents>(topic: K, callback: (payload: QuestEvents[K]) => void): () => void {
        return this.events.subscribe(topic, callback);
    }

    // ─────────────────────────────────────────────────────────────────────────
    // QUERIES
    // ─────────────────────────────────────────────────────────────────────────

    getNumCompletions(quest: Quest | string, quester: string): number {
        return this.completionCounts.get(quester)?.get(questName(quest)) ?? 0;
    }

    /**
     * `null` is accepted so prerequisite names that resolve to no quest
     * simply count as not completed.
     */
    hasCompleted(quest: Quest | string | null, quester: string): boolean {
        if (quest === null) return false;
        return this.getNumCompletions(quest, quester) >= 1;
    }

    getActiveInstance(quest: Quest | string, quester: string): QuestInstance | null {
        return this.activeInstances.get(quester)?.get(questName(quest)) ?? null;
    }

    getActiveInstances(quester: string): QuestInstance[] {
        const byQuest = this.activeInstances.get(quester);
        return byQuest ? Array.from(byQuest.values()) : [];
    }

    // ─────────────────────────────────────────────────────────────────────────
    // PERSISTENCE HOOKS
    // ─────────────────────────────────────────────────────────────────────────

    exportCurrentProgress(): ProgressData {
        return toProgressData(this.activeInstances, encodeCurrentProgress);
    }

    exportCompletedProgress(): ProgressData {
        return toProgressData(this.completionCounts, encodeCompletedProgress);
    }

    /**
     * Replaces all active instances and completion counts with the decoded
     * contents of `current` and `completed`. Everything is decoded before
     * anything is replaced, so a ProgressDecodeError leaves the manager as
     * it was.
     */
    importProgress(current: ProgressData, completed: ProgressData): void {
        const counts: PerQuester<number> = new Map();
        for (const [quester, byQuest] of Object.entries(completed)) {
            for (const [name, blob] of Object.entries(byQuest)) {
                setIn(counts, quester, name, decodeCompletedProgress(this, quester, name, blob));
            }
        }

        const instances: PerQuester<QuestInstance> = new Map();
        for (const [quester, byQuest] of Object.entries(current)) {
            for (const [name, blob] of Object.entries(byQuest)) {
                setIn(instances, quester, name, decodeCurrentProgress(this, quester, name, blob));
            }
        }

        for (const byQuest of this.activeInstances.values()) {
            for (const instance of byQuest.values()) {
                instance.markClosed('abandoned');
            }
        }
        this.completionCounts = counts;
        this.activeInstances = instances;
        log.info(`Imported progress for ${new Set([...counts.keys(), ...instances.keys()]).size} questers`);
    }

    private requireQuest(name: string): Quest {
        const quest = this.quests.get(name);
        if (!quest) {
            throw new UnknownQuestError(name);
        }
        return quest;
    }

    private checkStart(quest: Quest, quester: string): PrerequisiteCheck {
        if (this.getActiveInstance(quest, quester)) {
            return { ok: false, reason: 'already_active' };
        }
        return evaluatePrerequisites(quest, quester, this);
    }

    private release(instance: QuestInstance, status: 'finished' | 'abandoned'): void {
        const byQuest = this.activeInstances.get(instance.quester);
        if (!byQuest || byQuest.get(instance.quest.name) !== instance) {
            throw new IllegalStateError(
                `Attempt at "${instance.quest.name}" by ${instance.quester} is not the active one`
            );
        }
        byQuest.delete(instance.quest.name);
        if (byQuest.size === 0) {
            this.activeInstances.delete(instance.quester);
        }
        instance.markClosed(status);
    }
}

function setIn<T>(map: PerQuester<T>, quester: string, name: string, value: T): void {
    let byQuest = map.get(quester);
    if (!byQuest) {
        byQuest = new Map();
        map.set(quester, byQuest);
    }
    byQuest.set(name, value);
}

function toProgressData<T>(map: PerQuester<T>, encode: (value: T) => string): ProgressData {
    return Object.fromEntries(
        Array.from(map, ([quester, byQuest]): [string, Record<string, string>] => [
            quester,
            Object.fromEntries(Array.from(byQuest, ([name, value]): [string, string] => [name, encode(value)]))
        ])
    );
}
