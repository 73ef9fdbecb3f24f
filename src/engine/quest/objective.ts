import { DuplicateOutcomeError } from './errors.js';

/**
 * One terminal way an objective can resolve, such as "success" or "failure".
 */
export class Outcome {
    constructor(
        readonly name: string,
        readonly description: string,
        /** Tag the game uses to dispatch on this outcome */
        readonly type: string
    ) { }
}

/**
 * A single step of a quest, resolved by exactly one of its outcomes.
 */
export class Objective {
    private readonly outcomes: readonly Outcome[];

    constructor(
        readonly name: string,
        readonly description: string,
        outcomes: readonly Outcome[]
    ) {
        const seen = new Set<string>();
        for (const outcome of outcomes) {
            if (seen.has(outcome.name)) {
                throw new DuplicateOutcomeError(name, outcome.name);
            }
            seen.add(outcome.name);
        }
        this.outcomes = Object.freeze([...outcomes]);
    }

    getOutcomes(): readonly Outcome[] {
        return this.outcomes;
    }

    getOutcome(name: string): Outcome | null {
        return this.outcomes.find(outcome => outcome.name === name) ?? null;
    }
}
