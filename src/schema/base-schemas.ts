/**
 * Base Schema Definitions - Reusable Zod field patterns
 *
 * USAGE:
 * ```typescript
 * import { NameField, QuesterField } from './base-schemas.js';
 *
 * const MySchema = z.object({
 *   quest: NameField,
 *   quester: QuesterField,
 * });
 * ```
 *
 * @module schema/base-schemas
 */

import { z } from 'zod';

/** Keys that cannot be stored as plain object properties */
const RESERVED_KEYS = new Set(['__proto__']);

/**
 * Human-readable identifier (quest, objective and outcome names)
 */
export const NameField = z.string().min(1, 'Name cannot be empty')
    .refine(name => !RESERVED_KEYS.has(name), name => ({ message: `"${name}" is a reserved name` }));

/**
 * Opaque identifier of the player or entity undertaking a quest
 */
export const QuesterField = z.string().min(1, 'Quester cannot be empty')
    .refine(id => !RESERVED_KEYS.has(id), id => ({ message: `"${id}" is a reserved quester id` }))
    .describe('Player or entity undertaking a quest');
