/**
 * Re-types raw custom values against the value templates of a project.
 *
 * Level files store values without their type, so a color reads back as a
 * plain string and a float written as `1` reads back as an integer. Given the
 * matching templates, each value is re-read under its declared definition.
 */

import { type SchemaResult, SchemaError, fail, ok } from './errors.js';
import type { PathSegment } from './json/tree.js';
import { carryFloatForms, toSchemaError } from './schema/primitives.js';
import { encodeValue, typedValueSchema } from './schema/value.js';
import type { Entity, Layer } from './types/layer.js';
import type { Level } from './types/level.js';
import type { Project } from './types/project.js';
import type { CustomValue } from './types/value.js';
import type { ValueTemplate } from './types/value-template.js';
import { entityTemplateByExportID, layerTemplateByExportID } from './unpack.js';

function resolveEntries(values: CustomValue[], templates: ValueTemplate[], path: PathSegment[]): CustomValue[] {
    return values.map((entry) => {
        const template = templates.find((candidate) => candidate.name === entry.name);
        if (template === undefined) return entry;

        const entryPath = [...path, entry.name];
        const raw = encodeValue(entry.value, entryPath);
        const result = typedValueSchema(template.definition).safeParse(raw);
        if (!result.success) {
            throw toSchemaError(result.error, raw, entryPath);
        }
        return { name: entry.name, value: result.data };
    });
}

function attempt<T>(run: () => T): SchemaResult<T> {
    try {
        return ok(run());
    } catch (error: unknown) {
        if (error instanceof SchemaError) return fail(error);
        throw error;
    }
}

/**
 * Re-types `values` against `templates`, matched by name. Values without a
 * template are returned unchanged.
 */
export function resolveValues(values: CustomValue[], templates: ValueTemplate[]): SchemaResult<CustomValue[]> {
    return attempt(() => resolveEntries(values, templates, ['values']));
}

function resolveEntity(entity: Entity, project: Project, path: PathSegment[]): Entity {
    const template = entityTemplateByExportID(project, entity.exportID);
    if (template === undefined || entity.values === undefined) return entity;
    return carryFloatForms(entity, {
        ...entity,
        values: resolveEntries(entity.values, template.values, [...path, 'values']),
    });
}

function resolveLayer(layer: Layer, project: Project, path: PathSegment[]): Layer {
    switch (layer.type) {
        case 'entity':
            return carryFloatForms(layer, {
                ...layer,
                entities: layer.entities.map((entity, i) => resolveEntity(entity, project, [...path, 'entities', i])),
            });
        case 'decal': {
            const template = layerTemplateByExportID(project, layer.exportID);
            if (template?.definition !== 'decal') return layer;
            return carryFloatForms(layer, {
                ...layer,
                decals: layer.decals.map((decal, i) =>
                    decal.values === undefined
                        ? decal
                        : carryFloatForms(decal, {
                              ...decal,
                              values: resolveEntries(decal.values, template.values, [...path, 'decals', i, 'values']),
                          }),
                ),
            });
        }
        default:
            return layer;
    }
}

/**
 * Returns a copy of `level` with its own values, entity values and decal
 * values re-typed against `project`. Entities are matched to their templates
 * by export id, decal layers to their layer templates the same way. Whole
 * floats written as `64.0` in the source keep that form in the copy.
 */
export function resolveLevel(level: Level, project: Project): SchemaResult<Level> {
    return attempt(() =>
        carryFloatForms(level, {
            ...level,
            values: resolveEntries(level.values, project.levelValues, ['values']),
            layers: level.layers.map((layer, i) => resolveLayer(layer, project, ['layers', i])),
        }),
    );
}
