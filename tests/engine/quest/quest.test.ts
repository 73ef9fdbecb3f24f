import { describe, it, expect } from 'vitest';
import { DuplicateObjectiveError, DuplicateOutcomeError, QuestConfigurationError } from '../../../src/engine/quest/errors.js';
import { Objective, Outcome } from '../../../src/engine/quest/objective.js';
import { Quest } from '../../../src/engine/quest/quest.js';
import { QuestManager } from '../../../src/engine/quest/quest-manager.js';
import { questOne, twoStepQuest } from './helpers.js';

describe('Objective', () => {
    it('should look up outcomes by name', () => {
        const objective = new Objective('Tree', 'Climb it', [
            new Outcome('Yep', 'Climbed', 'success'),
            new Outcome('Nope', 'Did not', 'failure')
        ]);

        expect(objective.getOutcomes()).toHaveLength(2);
        expect(objective.getOutcome('Nope')?.type).toBe('failure');
        expect(objective.getOutcome('Maybe')).toBeNull();
    });

    it('should reject duplicate outcome names', () => {
        expect(() => new Objective('Tree', '', [
            new Outcome('Yep', '', 'success'),
            new Outcome('Yep', '', 'failure')
        ])).toThrow(DuplicateOutcomeError);
    });
});

describe('Quest', () => {
    it('should expose its definition', () => {
        const quest = questOne();

        expect(quest.name).toBe('One');
        expect(quest.description).toBe('My first quest!');
        expect(quest.beginMessage).toBe('Off you go');
        expect(quest.finishMessage).toBe('Well done');
        expect(quest.maxCompletions).toBe(-1);
        expect(quest.getRewards()).toEqual(['gold:10']);
        expect(quest.getPrerequisites()).toEqual([]);
    });

    it('should report as many objectives as it returns', () => {
        for (const quest of [questOne(), twoStepQuest()]) {
            expect(quest.getObjectives().length).toBe(quest.getAmtObjectives());
        }
    });

    it('should hand out read-only arrays', () => {
        const quest = twoStepQuest('Errand', { rewards: ['xp:5'] });

        expect(Object.isFrozen(quest.getObjectives())).toBe(true);
        expect(Object.isFrozen(quest.getRewards())).toBe(true);
        expect(Object.isFrozen(quest.getPrerequisites())).toBe(true);

        const copy = [...quest.getObjectives()];
        copy.pop();
        expect(quest.getObjectives()).toHaveLength(2);
    });

    it('should not be affected by later changes to its inputs', () => {
        const objectives = [new Objective('A', '', [new Outcome('Done', '', 'default')])];
        const rewards = ['gold:1'];
        const quest = new Quest({
            name: 'Snapshot',
            description: '',
            beginMessage: '',
            finishMessage: '',
            objectives,
            rewards,
            prerequisites: [],
            maxCompletions: -1
        });

        objectives.push(new Objective('B', '', []));
        rewards.push('gold:2');

        expect(quest.getAmtObjectives()).toBe(1);
        expect(quest.getRewards()).toEqual(['gold:1']);
    });

    it('should find objectives by name', () => {
        const quest = twoStepQuest();

        expect(quest.getObjective('Deliver')?.name).toBe('Deliver');
        expect(quest.getObjectiveIndex('Deliver')).toBe(1);
        expect(quest.getObjective('Nowhere')).toBeNull();
        expect(quest.getObjectiveIndex('Nowhere')).toBe(-1);
    });

    it('should reject duplicate objective names', () => {
        expect(() => twoStepQuest('Twice', {
            objectives: [{ name: 'Fetch' }, { name: 'Fetch' }]
        })).toThrow(DuplicateObjectiveError);
    });

    it('should refuse to be built without objectives', () => {
        expect(() => new Quest({
            name: 'Empty',
            description: '',
            beginMessage: '',
            finishMessage: '',
            objectives: [],
            rewards: [],
            prerequisites: [],
            maxCompletions: -1
        })).toThrow(new QuestConfigurationError('Quest "Empty" has no objectives'));
    });

    it('should not register itself on construction', () => {
        const manager = new QuestManager();
        questOne();
        expect(manager.getQuest('One')).toBeNull();
    });

    describe('start', () => {
        it('should create one pending progress per objective, in order', () => {
            const manager = new QuestManager();
            const quest = twoStepQuest();
            manager.addQuest(quest);

            const instance = quest.start('alice', manager);

            expect(instance.objectiveProgresses).toHaveLength(quest.getObjectives().length);
            expect(instance.objectiveProgresses.map(p => p.objective.name)).toEqual(['Fetch', 'Deliver']);
            expect(instance.objectiveProgresses.every(p => p.getState() === 'pending')).toBe(true);
        });

        it('should register the instance with the manager', () => {
            const manager = new QuestManager();
            const quest = questOne();
            manager.addQuest(quest);

            const instance = quest.start('alice', manager);

            expect(manager.getActiveInstance(quest, 'alice')).toBe(instance);
            expect(instance.quester).toBe('alice');
            expect(instance.attemptNumber).toBe(0);
        });

        it('should number attempts by prior completions', () => {
            const manager = new QuestManager();
            const quest = questOne();
            manager.addQuest(quest);

            quest.start('alice', manager).resolveObjective('Tree', 'Yep');
            quest.start('alice', manager).resolveObjective('Tree', 'Nope');
            const third = quest.start('alice', manager);

            expect(third.attemptNumber).toBe(2);
        });
    });
});
