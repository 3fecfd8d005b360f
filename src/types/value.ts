/**
 * Core types for custom values.
 *
 * Levels, entities and decals carry user-declared values. On disk they are a
 * plain `{ name: raw }` object with no type information, so the variant is
 * picked from the JSON shape unless a value template says otherwise
 * (see `resolveValues`).
 */

/**
 * An RGBA color. Each channel is an integer between 0 and 255 (inclusive).
 */
export interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}

export interface BooleanValue {
    type: 'boolean';
    value: boolean;
}

export interface ColorValue {
    type: 'color';
    value: Rgba;
    /** Whether the hex form carries the alpha channel (`#rrggbbaa` vs `#rrggbb`) */
    includeAlpha: boolean;
}

export interface EnumValue {
    type: 'enum';
    value: string;
}

export interface IntegerValue {
    type: 'integer';
    value: number;
}

/**
 * A float. Encoded with a decimal point even when whole (`5.0`).
 */
export interface FloatValue {
    type: 'float';
    value: number;
}

export interface StringValue {
    type: 'string';
    value: string;
}

/** Multi-line text. Same JSON shape as a string. */
export interface TextValue {
    type: 'text';
    value: string;
}

export interface ArrayStringValue {
    type: 'arrayString';
    value: string[];
}

export interface ArrayEnumValue {
    type: 'arrayEnum';
    value: string[];
}

/**
 * A Value is a discriminated union over every custom-field kind.
 */
export type Value =
    | BooleanValue
    | ColorValue
    | EnumValue
    | IntegerValue
    | FloatValue
    | StringValue
    | TextValue
    | ArrayStringValue
    | ArrayEnumValue;

export type ValueType = Value['type'];

/**
 * One named value. Collections are ordered lists of these, in source key order.
 */
export interface CustomValue {
    name: string;
    value: Value;
}

const HEX_COLOR = /^#([0-9a-fA-F]{6})([0-9a-fA-F]{2})?$/;

/**
 * Parses `#rrggbb` or `#rrggbbaa`. Returns null for anything else.
 * A missing alpha channel reads as fully opaque.
 */
export function parseHexColor(text: string): { color: Rgba; includeAlpha: boolean } | null {
    const match = HEX_COLOR.exec(text);
    if (!match) return null;

    const rgb = match[1];
    const alpha: string | undefined = match[2];
    return {
        color: {
            r: parseInt(rgb.slice(0, 2), 16),
            g: parseInt(rgb.slice(2, 4), 16),
            b: parseInt(rgb.slice(4, 6), 16),
            a: alpha === undefined ? 255 : parseInt(alpha, 16),
        },
        includeAlpha: alpha !== undefined,
    };
}

function hexByte(channel: number): string {
    return channel.toString(16).padStart(2, '0');
}

/**
 * Formats a color as lowercase `#rrggbbaa` (or `#rrggbb` without alpha).
 */
export function formatHexColor(color: Rgba, includeAlpha: boolean): string {
    const rgb = `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
    return includeAlpha ? `${rgb}${hexByte(color.a)}` : rgb;
}

/**
 * Returns the value named `name`, or undefined.
 */
export function findValue(values: CustomValue[], name: string): Value | undefined {
    return values.find((entry) => entry.name === name)?.value;
}
