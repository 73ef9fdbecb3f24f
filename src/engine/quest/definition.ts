import { readFile } from 'fs/promises';
import {
    QuestDefinitionListSchema,
    QuestDefinitionSchema,
    type QuestDefinition,
    type QuestDefinitionInput
} from '../../schema/quest.js';
import { createLogger, getErrorMessage } from '../../utils/logger.js';
import { QuestConfigurationError } from './errors.js';
import { Objective, Outcome } from './objective.js';
import { Quest } from './quest.js';
import type { QuestManager } from './quest-manager.js';

const log = createLogger('Definitions');

/**
 * Builds a Quest from definition data. Defaults are applied to missing
 * fields; duplicate objective or outcome names throw.
 */
export function createQuest(input: QuestDefinitionInput | QuestDefinition): Quest {
    const parsed = QuestDefinitionSchema.safeParse(input);
    if (!parsed.success) {
        throw new QuestConfigurationError(`Invalid quest definition: ${parsed.error.issues[0].message}`);
    }
    const definition = parsed.data;

    return new Quest({
        name: definition.name,
        description: definition.description,
        beginMessage: definition.beginMessage,
        finishMessage: definition.finishMessage,
        objectives: definition.objectives.map(objective => new Objective(
            objective.name,
            objective.description,
            objective.outcomes.map(outcome => new Outcome(outcome.name, outcome.description, outcome.type))
        )),
        rewards: definition.rewards,
        prerequisites: definition.prerequisites,
        maxCompletions: definition.maxCompletions
    });
}

export function parseQuestDefinitions(data: unknown): QuestDefinition[] {
    const parsed = QuestDefinitionListSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new QuestConfigurationError(
            `Invalid quest definitions at ${issue.path.join('.') || '<root>'}: ${issue.message}`
        );
    }
    return parsed.data;
}

/**
 * Builds every definition first, then registers them in order. A
 * definition that fails to build leaves the manager untouched; a duplicate
 * name stops registration at that quest.
 */
export function registerQuests(
    manager: QuestManager,
    definitions: ReadonlyArray<QuestDefinitionInput | QuestDefinition>
): Quest[] {
    const quests = definitions.map(createQuest);
    for (const quest of quests) {
        manager.addQuest(quest);
    }

    for (const quest of quests) {
        const unknown = quest.getPrerequisites().filter(name => !manager.hasQuest(name));
        if (unknown.length > 0) {
            log.warn(`Quest "${quest.name}" requires unregistered quests: ${unknown.join(', ')}`);
        }
    }
    return quests;
}

/**
 * Reads a JSON array of quest definitions from disk.
 */
export async function loadQuestFile(path: string): Promise<QuestDefinition[]> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw new QuestConfigurationError(`Cannot read quest file ${path}: ${getErrorMessage(error)}`);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        throw new QuestConfigurationError(`Quest file ${path} is not valid JSON: ${getErrorMessage(error)}`);
    }
    return parseQuestDefinitions(data);
}
