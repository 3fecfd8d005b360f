import { type JsonObject, stringifyJson } from '../json/tree.js';
import { type SchemaResult, SchemaError, fail, ok } from '../errors.js';
import type { Level } from '../types/level.js';
import type { Project } from '../types/project.js';
import { encodeLevelTree } from '../schema/level.js';
import { encodeProjectTree } from '../schema/project.js';

function encodeWith<T>(build: () => T): SchemaResult<T> {
    try {
        return ok(build());
    } catch (error: unknown) {
        if (error instanceof SchemaError) {
            return fail(error);
        }
        throw error;
    }
}

export function encodeProject(project: Project): SchemaResult<JsonObject> {
    return encodeWith(() => encodeProjectTree(project));
}

export function encodeLevel(level: Level): SchemaResult<JsonObject> {
    return encodeWith(() => encodeLevelTree(level));
}

/**
 * Encodes a project to JSON text.
 *
 * @param indent - Indentation passed to the serializer; two spaces by default
 */
export function stringifyProject(project: Project, indent: number | string = 2): SchemaResult<string> {
    return encodeWith(() => stringifyJson(encodeProjectTree(project), indent));
}

/**
 * Encodes a level to JSON text.
 *
 * @param indent - Indentation passed to the serializer; two spaces by default
 */
export function stringifyLevel(level: Level, indent: number | string = 2): SchemaResult<string> {
    return encodeWith(() => stringifyJson(encodeLevelTree(level), indent));
}
