import type { Quest } from './quest.js';
import type { QuestRegistry } from './types.js';

export type PrerequisiteCheck =
    | { ok: true }
    | { ok: false; reason: 'max_completions'; completions: number; maxCompletions: number }
    | { ok: false; reason: 'missing_prerequisite'; prerequisite: string }
    | { ok: false; reason: 'already_active' };

/**
 * Checks whether `quester` may embark on `quest`.
 *
 * The completion cap is checked first: a quester is locked out once their
 * completion count is strictly greater than `maxCompletions` (-1 disables
 * the cap). Prerequisites are then checked in declaration order and the
 * first one not completed is reported. A prerequisite naming a quest the
 * registry does not know counts as not completed.
 *
 * Reads the registry only; nothing is captured between calls.
 */
export function evaluatePrerequisites(
    quest: Quest,
    quester: string,
    registry: QuestRegistry
): PrerequisiteCheck {
    const maxCompletions = quest.maxCompletions;
    if (maxCompletions > -1) {
        const completions = registry.getNumCompletions(quest, quester);
        if (completions > maxCompletions) {
            return { ok: false, reason: 'max_completions', completions, maxCompletions };
        }
    }

    for (const prerequisite of quest.getPrerequisites()) {
        if (!registry.hasCompleted(registry.getQuest(prerequisite), quester)) {
            return { ok: false, reason: 'missing_prerequisite', prerequisite };
        }
    }

    return { ok: true };
}

export function describePrerequisiteFailure(check: PrerequisiteCheck): string {
    if (check.ok) return 'prerequisites met';
    switch (check.reason) {
        case 'max_completions':
            return `completed ${check.completions} times, limit is ${check.maxCompletions}`;
        case 'missing_prerequisite':
            return `quest "${check.prerequisite}" has not been completed`;
        case 'already_active':
            return 'an attempt is already in progress';
    }
}
