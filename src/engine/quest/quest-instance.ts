import { v4 as uuidv4 } from 'uuid';
import { IllegalStateError, UnknownObjectiveError } from './errors.js';
import type { ObjectiveProgress } from './objective-progress.js';
import type { Outcome } from './objective.js';
import type { Quest } from './quest.js';
import type { InstanceStatus, QuestHost } from './types.js';

/**
 * One quester's attempt at one quest.
 *
 * `objectiveProgresses` is aligned with `quest.getObjectives()`. When the
 * last objective resolves the instance reports itself finished to its
 * host, which records the completion and drops it from the active set.
 */
export class QuestInstance {
    readonly id: string;
    readonly objectiveProgresses: readonly ObjectiveProgress[];
    private status: InstanceStatus = 'active';

    constructor(
        readonly quest: Quest,
        readonly quester: string,
        /** Completions of `quest` by `quester` before this attempt */
        readonly attemptNumber: number,
        private readonly host: QuestHost,
        id?: string
    ) {
        this.id = id ?? uuidv4();
        this.objectiveProgresses = Object.freeze(quest.populateObjectiveProgresses(this));
    }

    getStatus(): InstanceStatus {
        return this.status;
    }

    isActive(): boolean {
        return this.status === 'active';
    }

    /** True once every objective has an outcome */
    isFinished(): boolean {
        return this.objectiveProgresses.every(progress => progress.isResolved());
    }

    assertActive(): void {
        if (this.status !== 'active') {
            throw new IllegalStateError(
                `Attempt ${this.attemptNumber} of "${this.quest.name}" by ${this.quester} is ${this.status}`
            );
        }
    }

    getObjectiveProgress(name: string): ObjectiveProgress | null {
        const index = this.quest.getObjectiveIndex(name);
        return index === -1 ? null : this.objectiveProgresses[index];
    }

    beginObjective(name: string): ObjectiveProgress {
        const progress = this.requireProgress(name);
        progress.begin();
        return progress;
    }

    resolveObjective(name: string, outcomeName: string): Outcome {
        return this.requireProgress(name).resolve(outcomeName);
    }

    abandon(): void {
        this.assertActive();
        this.host.abandonQuest(this);
    }

    /** Objective name to outcome name, for every resolved objective */
    getOutcomes(): Record<string, string> {
        const outcomes: Record<string, string> = {};
        for (const progress of this.objectiveProgresses) {
            const outcome = progress.getOutcome();
            if (outcome) {
                outcomes[progress.objective.name] = outcome.name;
            }
        }
        return outcomes;
    }

    /** Called by an ObjectiveProgress of this instance once it resolves */
    objectiveResolved(progress: ObjectiveProgress): void {
        this.host.objectiveResolved(progress);
        if (this.isFinished()) {
            this.host.finishQuest(this);
        }
    }

    /** Called by the host when it stops tracking this instance */
    markClosed(status: Exclude<InstanceStatus, 'active'>): void {
        this.assertActive();
        this.status = status;
    }

    private requireProgress(name: string): ObjectiveProgress {
        const progress = this.getObjectiveProgress(name);
        if (!progress) {
            throw new UnknownObjectiveError(this.quest.name, name);
        }
        return progress;
    }
}
