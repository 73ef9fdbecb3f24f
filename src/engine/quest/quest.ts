import { DuplicateObjectiveError, QuestConfigurationError } from './errors.js';
import { Objective } from './objective.js';
import { ObjectiveProgress } from './objective-progress.js';
import { QuestInstance } from './quest-instance.js';
import { evaluatePrerequisites } from './prerequisites.js';
import type { QuestHost, QuestRegistry } from './types.js';

export interface QuestInit {
    name: string;
    description: string;
    beginMessage: string;
    finishMessage: string;
    objectives: readonly Objective[];
    rewards: readonly string[];
    prerequisites: readonly string[];
    /** -1 means unlimited */
    maxCompletions: number;
}

/**
 * The outline of a quest. One Quest exists per configured quest; every
 * attempt at it is a separate {@link QuestInstance}.
 *
 * Constructing a Quest has no side effects. Register it with
 * `QuestManager.addQuest` before starting it.
 */
export class Quest {
    /** Unique, human-readable identifier */
    readonly name: string;
    readonly description: string;
    /** Sent to a quester who has just begun the quest */
    readonly beginMessage: string;
    /** Sent to a quester who has just finished the quest */
    readonly finishMessage: string;
    readonly maxCompletions: number;

    private readonly objectives: readonly Objective[];
    private readonly rewards: readonly string[];
    private readonly prerequisites: readonly string[];

    constructor(init: QuestInit) {
        if (init.objectives.length === 0) {
            throw new QuestConfigurationError(`Quest "${init.name}" has no objectives`);
        }
        const seen = new Set<string>();
        for (const objective of init.objectives) {
            if (seen.has(objective.name)) {
                throw new DuplicateObjectiveError(init.name, objective.name);
            }
            seen.add(objective.name);
        }

        this.name = init.name;
        this.description = init.description;
        this.beginMessage = init.beginMessage;
        this.finishMessage = init.finishMessage;
        this.maxCompletions = init.maxCompletions;
        this.objectives = Object.freeze([...init.objectives]);
        this.rewards = Object.freeze([...init.rewards]);
        this.prerequisites = Object.freeze([...init.prerequisites]);
    }

    getObjectives(): readonly Objective[] {
        return this.objectives;
    }

    /** Opaque identifiers handed to whatever grants rewards */
    getRewards(): readonly string[] {
        return this.rewards;
    }

    /** Names of quests that must be completed first, in evaluation order */
    getPrerequisites(): readonly string[] {
        return this.prerequisites;
    }

    getAmtObjectives(): number {
        return this.objectives.length;
    }

    getObjective(name: string): Objective | null {
        return this.objectives.find(objective => objective.name === name) ?? null;
    }

    /**
     * Position of the named objective, or -1. Progress arrays are aligned
     * with this index.
     */
    getObjectiveIndex(name: string): number {
        return this.objectives.findIndex(objective => objective.name === name);
    }

    satisfiesPrerequisites(quester: string, registry: QuestRegistry): boolean {
        return evaluatePrerequisites(this, quester, registry).ok;
    }

    /**
     * Creates an attempt at this quest for `quester` and registers it with
     * `host`. Throws whatever `host.startQuest` rejects the attempt with.
     * Prerequisites are not checked here; see `QuestManager.beginQuest`.
     */
    start(quester: string, host: QuestHost): QuestInstance {
        const instance = new QuestInstance(this, quester, host.getNumCompletions(this, quester), host);
        host.startQuest(instance);
        return instance;
    }

    /**
     * One fresh progress per objective, in objective order.
     * Only called while `instance` is being constructed.
     */
    populateObjectiveProgresses(instance: QuestInstance): ObjectiveProgress[] {
        return this.objectives.map(objective => new ObjectiveProgress(instance, objective));
    }
}
