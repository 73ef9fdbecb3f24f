import { z } from 'zod';
import { NameField, QuesterField } from './base-schemas.js';

// ============================================================================
// DEFINITIONS
// ============================================================================

export const OutcomeDefinitionSchema = z.object({
    name: NameField,
    description: z.string().default(''),
    type: z.string().min(1).default('default')
        .describe('Tag the game uses to dispatch on the outcome')
});

export const ObjectiveDefinitionSchema = z.object({
    name: NameField,
    description: z.string().default(''),
    outcomes: z.array(OutcomeDefinitionSchema).default([])
});

export const QuestDefinitionSchema = z.object({
    name: NameField,
    description: z.string().default(''),
    beginMessage: z.string().default(''),
    finishMessage: z.string().default(''),
    objectives: z.array(ObjectiveDefinitionSchema).min(1, 'A quest needs at least one objective'),
    rewards: z.array(z.string()).default([]), // Opaque reward identifiers
    prerequisites: z.array(NameField).default([]), // Quest names, checked in order
    maxCompletions: z.number().int().min(-1).default(-1) // -1 = unlimited
});

export const QuestDefinitionListSchema = z.array(QuestDefinitionSchema);

export type OutcomeDefinition = z.infer<typeof OutcomeDefinitionSchema>;
export type ObjectiveDefinition = z.infer<typeof ObjectiveDefinitionSchema>;
export type QuestDefinition = z.infer<typeof QuestDefinitionSchema>;
/** Definition as authored, before defaults are applied */
export type QuestDefinitionInput = z.input<typeof QuestDefinitionSchema>;

// ============================================================================
// PROGRESS BLOBS
// ============================================================================

export const ObjectiveStateSchema = z.enum(['pending', 'in_progress', 'resolved']);

export const StoredObjectiveSchema = z.discriminatedUnion('state', [
    z.object({ state: z.literal('pending') }),
    z.object({ state: z.literal('in_progress') }),
    z.object({ state: z.literal('resolved'), outcome: NameField })
]);

export const CurrentProgressBlobSchema = z.object({
    attempt: z.number().int().min(0),
    objectives: z.array(StoredObjectiveSchema)
});

export const CompletedProgressBlobSchema = z.object({
    completions: z.number().int().min(1)
});

/**
 * quester -> quest name -> encoded progress string.
 * Shape shared by the "current" and "completed" documents.
 */
export const ProgressDataSchema = z.record(QuesterField, z.record(NameField, z.string()));

export type ObjectiveState = z.infer<typeof ObjectiveStateSchema>;
export type StoredObjective = z.infer<typeof StoredObjectiveSchema>;
export type CurrentProgressBlob = z.infer<typeof CurrentProgressBlobSchema>;
export type CompletedProgressBlob = z.infer<typeof CompletedProgressBlobSchema>;
export type ProgressData = z.infer<typeof ProgressDataSchema>;
