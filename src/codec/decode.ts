import type { z } from 'zod';
import { parseJson } from '../json/tree.js';
import { type SchemaResult, fail, malformedInput, ok } from '../errors.js';
import type { Level } from '../types/level.js';
import type { Project } from '../types/project.js';
import { levelSchema } from '../schema/level.js';
import { projectSchema } from '../schema/project.js';
import { toSchemaError } from '../schema/primitives.js';

/**
 * Parses `input` when it is text, then runs `schema` over the tree. Either
 * the whole model comes back or the first error does.
 */
function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): SchemaResult<T> {
    let tree = input;
    if (typeof input === 'string') {
        try {
            tree = parseJson(input);
        } catch (error: unknown) {
            return fail(malformedInput(error instanceof Error ? error.message : String(error)));
        }
    }

    const result = schema.safeParse(tree);
    if (!result.success) {
        return fail(toSchemaError(result.error, tree));
    }
    return ok(result.data);
}

/**
 * Decodes a project file.
 *
 * @param input - JSON text, or an already parsed tree (from `parseJson` or `JSON.parse`)
 */
export function decodeProject(input: unknown): SchemaResult<Project> {
    return decodeWith(projectSchema, input);
}

/**
 * Decodes a level file.
 *
 * @param input - JSON text, or an already parsed tree (from `parseJson` or `JSON.parse`)
 */
export function decodeLevel(input: unknown): SchemaResult<Level> {
    return decodeWith(levelSchema, input);
}
