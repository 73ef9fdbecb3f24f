/**
 * Progress Codec - string blobs stored per (quester, quest)
 *
 * Current attempts:
 *   {"attempt":0,"objectives":[{"state":"resolved","outcome":"Yep"},{"state":"pending"}]}
 * Completed quests:
 *   {"completions":2}
 *
 * `objectives` is aligned with the quest's objective order. Decoding checks
 * every blob against the registered definition.
 */

import { z } from 'zod';
import {
    CompletedProgressBlobSchema,
    CurrentProgressBlobSchema,
    type CurrentProgressBlob,
    type StoredObjective
} from '../../schema/quest.js';
import { ProgressDecodeError } from './errors.js';
import { QuestInstance } from './quest-instance.js';
import type { QuestHost } from './types.js';

export function encodeCurrentProgress(instance: QuestInstance): string {
    const blob: CurrentProgressBlob = {
        attempt: instance.attemptNumber,
        objectives: instance.objectiveProgresses.map((progress): StoredObjective => {
            const outcome = progress.getOutcome();
            if (outcome) {
                return { state: 'resolved', outcome: outcome.name };
            }
            return { state: progress.getState() === 'in_progress' ? 'in_progress' : 'pending' };
        })
    };
    return JSON.stringify(blob);
}

export function encodeCompletedProgress(completions: number): string {
    return JSON.stringify({ completions });
}

function parseBlob<T>(schema: z.ZodType<T>, blob: string, quester: string, questName: string): T {
    let raw: unknown;
    try {
        raw = JSON.parse(blob);
    } catch {
        throw new ProgressDecodeError(`Progress is not valid JSON: ${blob}`, quester, questName);
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ProgressDecodeError(
            `Progress has the wrong shape at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
            quester,
            questName
        );
    }
    return result.data;
}

/**
 * Rebuilds an active instance from its blob. The instance is bound to
 * `host` but not registered with it.
 */
export function decodeCurrentProgress(
    host: QuestHost,
    quester: string,
    questName: string,
    blob: string
): QuestInstance {
    const quest = host.getQuest(questName);
    if (!quest) {
        throw new ProgressDecodeError('Quest is not registered', quester, questName);
    }

    const stored = parseBlob(CurrentProgressBlobSchema, blob, quester, questName);
    if (stored.objectives.length !== quest.getAmtObjectives()) {
        throw new ProgressDecodeError(
            `Expected ${quest.getAmtObjectives()} objectives, found ${stored.objectives.length}`,
            quester,
            questName
        );
    }

    const instance = new QuestInstance(quest, quester, stored.attempt, host);
    stored.objectives.forEach((entry, index) => {
        const progress = instance.objectiveProgresses[index];
        if (entry.state !== 'resolved') {
            progress.restore(entry.state, null);
            return;
        }
        const outcome = progress.objective.getOutcome(entry.outcome);
        if (!outcome) {
            throw new ProgressDecodeError(
                `Objective "${progress.objective.name}" has no outcome "${entry.outcome}"`,
                quester,
                questName
            );
        }
        progress.restore('resolved', outcome);
    });

    if (instance.isFinished()) {
        throw new ProgressDecodeError('Every objective is resolved but the attempt is still current', quester, questName);
    }
    return instance;
}

export function decodeCompletedProgress(
    host: QuestHost,
    quester: string,
    questName: string,
    blob: string
): number {
    if (!host.getQuest(questName)) {
        throw new ProgressDecodeError('Quest is not registered', quester, questName);
    }
    return parseBlob(CompletedProgressBlobSchema, blob, quester, questName).completions;
}
