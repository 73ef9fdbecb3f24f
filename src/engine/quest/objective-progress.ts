import type { ObjectiveState } from '../../schema/quest.js';
import { IllegalStateError, UnknownOutcomeError } from './errors.js';
import type { Objective, Outcome } from './objective.js';
import type { QuestInstance } from './quest-instance.js';

/**
 * One quester's progress on one objective of one quest instance.
 *
 *   pending ──begin()──▶ in_progress ──resolve()──▶ resolved(outcome)
 *      └──────────────────resolve()─────────────────────▲
 *
 * A resolved objective is never reopened.
 */
export class ObjectiveProgress {
    private state: ObjectiveState = 'pending';
    private outcome: Outcome | null = null;

    constructor(
        readonly instance: QuestInstance,
        readonly objective: Objective
    ) { }

    getState(): ObjectiveState {
        return this.state;
    }

    /** The resolving outcome, or null while unresolved */
    getOutcome(): Outcome | null {
        return this.outcome;
    }

    isResolved(): boolean {
        return this.state === 'resolved';
    }

    begin(): void {
        this.instance.assertActive();
        if (this.state === 'resolved') {
            throw new IllegalStateError(
                `Objective "${this.objective.name}" of "${this.instance.quest.name}" is already resolved`
            );
        }
        this.state = 'in_progress';
    }

    resolve(outcomeName: string): Outcome {
        this.instance.assertActive();
        if (this.state === 'resolved') {
            throw new IllegalStateError(
                `Objective "${this.objective.name}" of "${this.instance.quest.name}" is already resolved` +
                ` with "${this.outcome?.name}"`
            );
        }

        const outcome = this.objective.getOutcome(outcomeName);
        if (!outcome) {
            throw new UnknownOutcomeError(this.objective.name, outcomeName);
        }

        this.state = 'resolved';
        this.outcome = outcome;
        this.instance.objectiveResolved(this);
        return outcome;
    }

    /**
     * Puts back a state read from a progress store. No events fire and
     * the instance is not told.
     */
    restore(state: ObjectiveState, outcome: Outcome | null): void {
        if ((state === 'resolved') !== (outcome !== null)) {
            throw new IllegalStateError(`Objective "${this.objective.name}": outcome must be set exactly when resolved`);
        }
        this.state = state;
        this.outcome = outcome;
    }
}
