/**
 * Error classes raised by the quest engine.
 *
 * Lookup misses are not errors: `getQuest`, `getObjective` and friends
 * return `null`. Everything here signals a broken configuration or an
 * illegal transition.
 */

/**
 * A quest definition conflicts with itself or with the registry.
 */
export class QuestConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'QuestConfigurationError';
    }
}

export class DuplicateQuestError extends QuestConfigurationError {
    constructor(public readonly questName: string) {
        super(`Quest "${questName}" is already registered`);
        this.name = 'DuplicateQuestError';
    }
}

export class DuplicateObjectiveError extends QuestConfigurationError {
    constructor(public readonly questName: string, public readonly objectiveName: string) {
        super(`Quest "${questName}" declares objective "${objectiveName}" more than once`);
        this.name = 'DuplicateObjectiveError';
    }
}

export class DuplicateOutcomeError extends QuestConfigurationError {
    constructor(public readonly objectiveName: string, public readonly outcomeName: string) {
        super(`Objective "${objectiveName}" declares outcome "${outcomeName}" more than once`);
        this.name = 'DuplicateOutcomeError';
    }
}

/**
 * A state machine transition that is not allowed from the current state.
 */
export class IllegalStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IllegalStateError';
    }
}

export class UnknownQuestError extends Error {
    constructor(public readonly questName: string) {
        super(`No quest named "${questName}" is registered`);
        this.name = 'UnknownQuestError';
    }
}

export class UnknownObjectiveError extends Error {
    constructor(public readonly questName: string, public readonly objectiveName: string) {
        super(`Quest "${questName}" has no objective "${objectiveName}"`);
        this.name = 'UnknownObjectiveError';
    }
}

export class UnknownOutcomeError extends Error {
    constructor(public readonly objectiveName: string, public readonly outcomeName: string) {
        super(`Objective "${objectiveName}" has no outcome "${outcomeName}"`);
        this.name = 'UnknownOutcomeError';
    }
}

export class InvalidQuesterError extends Error {
    constructor(public readonly quester: string, reason: string) {
        super(`Invalid quester id "${quester}": ${reason}`);
        this.name = 'InvalidQuesterError';
    }
}

export class PrerequisitesNotMetError extends Error {
    constructor(
        public readonly questName: string,
        public readonly quester: string,
        detail: string
    ) {
        super(`${quester} cannot start "${questName}": ${detail}`);
        this.name = 'PrerequisitesNotMetError';
    }
}

/**
 * A stored progress blob does not match the registered quest definitions.
 */
export class ProgressDecodeError extends Error {
    constructor(
        message: string,
        public readonly quester?: string,
        public readonly questName?: string
    ) {
        super(message);
        this.name = 'ProgressDecodeError';
    }

    toString(): string {
        let msg = this.message;
        if (this.quester !== undefined && this.questName !== undefined) {
            msg = `${this.quester}/${this.questName}: ${msg}`;
        }
        return msg;
    }
}

export type ProgressStoreErrorKind = 'io' | 'decode';

/**
 * Failure reported by a ProgressStore. Carried inside a StoreResult rather
 * than thrown, so callers can tell it apart from an empty first load.
 */
export class ProgressStoreError extends Error {
    constructor(
        message: string,
        public readonly kind: ProgressStoreErrorKind,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'ProgressStoreError';
    }
}
