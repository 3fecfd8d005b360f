/**
 * Core types for value templates.
 *
 * A value template declares a custom field that levels, entities or decals may
 * carry, along with its default. On disk the variant is tagged by the
 * `definition` string, which the model keeps as its discriminant.
 */

export interface ValueTemplateBase {
    /** Field name, matching the key used in a level's `values` object */
    name: string;
    /** Editor display mode. Absent in older projects. */
    display?: number;
}

export interface BooleanValueTemplate extends ValueTemplateBase {
    definition: 'Boolean';
    defaults: boolean;
}

export interface ColorValueTemplate extends ValueTemplateBase {
    definition: 'Color';
    /** Hex color, `#rrggbbaa` */
    defaults: string;
    includeAlpha: boolean;
}

export interface EnumValueTemplate extends ValueTemplateBase {
    definition: 'Enum';
    /** Index into `choices` */
    defaults: number;
    choices: string[];
}

export interface IntegerValueTemplate extends ValueTemplateBase {
    definition: 'Integer';
    defaults: number;
    bounded: boolean;
    min: number;
    max: number;
}

export interface FloatValueTemplate extends ValueTemplateBase {
    definition: 'Float';
    defaults: number;
    bounded: boolean;
    min: number;
    max: number;
}

export interface StringValueTemplate extends ValueTemplateBase {
    definition: 'String';
    defaults: string;
    maxLength: number;
    trimWhitespace: boolean;
}

export interface TextValueTemplate extends ValueTemplateBase {
    definition: 'Text';
    defaults: string;
}

export type ValueTemplate =
    | BooleanValueTemplate
    | ColorValueTemplate
    | EnumValueTemplate
    | IntegerValueTemplate
    | FloatValueTemplate
    | StringValueTemplate
    | TextValueTemplate;

export type ValueDefinition = ValueTemplate['definition'];

export const VALUE_DEFINITIONS: readonly ValueDefinition[] = [
    'Boolean',
    'Color',
    'Enum',
    'Integer',
    'Float',
    'String',
    'Text',
];
