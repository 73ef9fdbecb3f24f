import { createQuest } from '../../../src/engine/quest/definition.js';
import type { Quest } from '../../../src/engine/quest/quest.js';
import type { QuestDefinitionInput } from '../../../src/schema/quest.js';

/**
 * Quest "One": a single objective "Tree" resolved by "Yep" or "Nope".
 */
export function questOne(overrides: Partial<QuestDefinitionInput> = {}): Quest {
    return createQuest({
        name: 'One',
        description: 'My first quest!',
        beginMessage: 'Off you go',
        finishMessage: 'Well done',
        objectives: [{
            name: 'Tree',
            description: 'The first objective!',
            outcomes: [
                { name: 'Nope', description: 'Left the tree alone', type: 'failure' },
                { name: 'Yep', description: 'Climbed the tree', type: 'success' }
            ]
        }],
        rewards: ['gold:10'],
        ...overrides
    });
}

/**
 * Two objectives, each with a success and a failure outcome.
 */
export function twoStepQuest(name = 'Errand', overrides: Partial<QuestDefinitionInput> = {}): Quest {
    return createQuest({
        name,
        description: 'Fetch and deliver',
        objectives: [
            { name: 'Fetch', outcomes: [{ name: 'Found' }, { name: 'Lost' }] },
            { name: 'Deliver', outcomes: [{ name: 'Delivered' }, { name: 'Late' }] }
        ],
        ...overrides
    });
}
