import { describe, it, expect, beforeEach } from 'vitest';
import { ProgressDecodeError } from '../../../src/engine/quest/errors.js';
import {
    decodeCompletedProgress,
    decodeCurrentProgress,
    encodeCompletedProgress,
    encodeCurrentProgress
} from '../../../src/engine/quest/progress-codec.js';
import { QuestManager } from '../../../src/engine/quest/quest-manager.js';
import { twoStepQuest } from './helpers.js';

describe('progress codec', () => {
    let manager: QuestManager;

    beforeEach(() => {
        manager = new QuestManager();
        manager.addQuest(twoStepQuest());
    });

    it('should encode objectives in quest order', () => {
        const instance = manager.beginQuest('Errand', 'alice');
        instance.resolveObjective('Deliver', 'Late');

        expect(encodeCurrentProgress(instance))
            .toBe('{"attempt":0,"objectives":[{"state":"pending"},{"state":"resolved","outcome":"Late"}]}');
    });

    it('should decode into an unregistered instance bound to the manager', () => {
        const instance = decodeCurrentProgress(
            manager,
            'bob',
            'Errand',
            '{"attempt":3,"objectives":[{"state":"in_progress"},{"state":"resolved","outcome":"Delivered"}]}'
        );

        expect(instance.quester).toBe('bob');
        expect(instance.attemptNumber).toBe(3);
        expect(instance.objectiveProgresses.map(p => p.getState())).toEqual(['in_progress', 'resolved']);
        expect(instance.getOutcomes()).toEqual({ Deliver: 'Delivered' });
        expect(manager.getActiveInstance('Errand', 'bob')).toBeNull();
    });

    it('should encode and decode completion counts', () => {
        expect(encodeCompletedProgress(4)).toBe('{"completions":4}');
        expect(decodeCompletedProgress(manager, 'alice', 'Errand', '{"completions":4}')).toBe(4);
    });

    describe('rejects', () => {
        const decode = (blob: string) => () => decodeCurrentProgress(manager, 'alice', 'Errand', blob);

        it('text that is not JSON', () => {
            expect(decode('attempt=1')).toThrow(ProgressDecodeError);
        });

        it('blobs of the wrong shape', () => {
            expect(decode('{"attempt":-1,"objectives":[]}'))
                .toThrow('Progress has the wrong shape at attempt');
        });

        it('a resolved objective without an outcome', () => {
            expect(decode('{"attempt":0,"objectives":[{"state":"resolved"},{"state":"pending"}]}'))
                .toThrow(ProgressDecodeError);
        });

        it('an objective count that differs from the quest', () => {
            expect(decode('{"attempt":0,"objectives":[{"state":"pending"}]}'))
                .toThrow('Expected 2 objectives, found 1');
        });

        it('outcomes the objective does not have', () => {
            expect(decode('{"attempt":0,"objectives":[{"state":"resolved","outcome":"Eaten"},{"state":"pending"}]}'))
                .toThrow('Objective "Fetch" has no outcome "Eaten"');
        });

        it('a current attempt with every objective resolved', () => {
            expect(decode(
                '{"attempt":0,"objectives":[{"state":"resolved","outcome":"Found"},{"state":"resolved","outcome":"Late"}]}'
            )).toThrow('Every objective is resolved but the attempt is still current');
        });

        it('zero completions', () => {
            expect(() => decodeCompletedProgress(manager, 'alice', 'Errand', '{"completions":0}'))
                .toThrow(ProgressDecodeError);
        });
    });

    it('should prefix decode errors with quester and quest', () => {
        const error = new ProgressDecodeError('bad', 'alice', 'Errand');
        expect(error.toString()).toBe('alice/Errand: bad');
    });
});
