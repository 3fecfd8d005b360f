/**
 * Narrowing helpers for callers that already know which variant to expect,
 * e.g. "layer `tiles` is always a tile layer". A wrong guess comes back as an
 * UnpackMismatch result naming both kinds; nothing throws.
 */

import { type SchemaResult, fail, ok, unpackMismatch } from './errors.js';
import type { Layer, LayerType } from './types/layer.js';
import type { LayerDefinition, LayerTemplate } from './types/layer-template.js';
import type { Level } from './types/level.js';
import type { EntityTemplate, Project, Tileset } from './types/project.js';
import type { Value, ValueType } from './types/value.js';
import type { ValueDefinition, ValueTemplate } from './types/value-template.js';

export type LayerOfType<T extends LayerType> = Extract<Layer, { type: T }>;
export type LayerTemplateOfDefinition<T extends LayerDefinition> = Extract<LayerTemplate, { definition: T }>;
export type ValueOfType<T extends ValueType> = Extract<Value, { type: T }>;
export type ValueTemplateOfDefinition<T extends ValueDefinition> = Extract<ValueTemplate, { definition: T }>;

export function isLayerOfType<T extends LayerType>(layer: Layer, type: T): layer is LayerOfType<T> {
    return layer.type === type;
}

export function isLayerTemplateOfDefinition<T extends LayerDefinition>(
    template: LayerTemplate,
    definition: T,
): template is LayerTemplateOfDefinition<T> {
    return template.definition === definition;
}

export function isValueOfType<T extends ValueType>(value: Value, type: T): value is ValueOfType<T> {
    return value.type === type;
}

export function isValueTemplateOfDefinition<T extends ValueDefinition>(
    template: ValueTemplate,
    definition: T,
): template is ValueTemplateOfDefinition<T> {
    return template.definition === definition;
}

export function unpackLayer<T extends LayerType>(layer: Layer, type: T): SchemaResult<LayerOfType<T>> {
    return isLayerOfType(layer, type) ? ok(layer) : fail(unpackMismatch(type, layer.type));
}

export function unpackLayerTemplate<T extends LayerDefinition>(
    template: LayerTemplate,
    definition: T,
): SchemaResult<LayerTemplateOfDefinition<T>> {
    return isLayerTemplateOfDefinition(template, definition)
        ? ok(template)
        : fail(unpackMismatch(definition, template.definition));
}

export function unpackValue<T extends ValueType>(value: Value, type: T): SchemaResult<ValueOfType<T>> {
    return isValueOfType(value, type) ? ok(value) : fail(unpackMismatch(type, value.type));
}

export function unpackValueTemplate<T extends ValueDefinition>(
    template: ValueTemplate,
    definition: T,
): SchemaResult<ValueTemplateOfDefinition<T>> {
    return isValueTemplateOfDefinition(template, definition)
        ? ok(template)
        : fail(unpackMismatch(definition, template.definition));
}

// ----------------------------------------------------------------------------
// lookups
// ----------------------------------------------------------------------------

export function layerByName(level: Level, name: string): Layer | undefined {
    return level.layers.find((layer) => layer.name === name);
}

export function layerTemplateByName(project: Project, name: string): LayerTemplate | undefined {
    return project.layers.find((layer) => layer.name === name);
}

export function layerTemplateByExportID(project: Project, exportID: string): LayerTemplate | undefined {
    return project.layers.find((layer) => layer.exportID === exportID);
}

export function entityTemplateByExportID(project: Project, exportID: string): EntityTemplate | undefined {
    return project.entities.find((entity) => entity.exportID === exportID);
}

export function tilesetByLabel(project: Project, label: string): Tileset | undefined {
    return project.tilesets.find((tileset) => tileset.label === label);
}
