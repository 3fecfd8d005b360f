import { describe, it, expect } from 'vitest';
import { LosslessNumber } from 'lossless-json';
import {
    floatNumber,
    formatPath,
    integerNumber,
    isIntegerLiteral,
    isJsonObject,
    jsonTypeOf,
    parseJson,
    stringifyJson,
    valueAtPath,
} from './tree.js';

describe('parseJson / stringifyJson', () => {
    it('keeps the source text of numbers', () => {
        const tree = parseJson('{"a":5,"b":5.0}');
        expect(valueAtPath(tree, ['a'])).toEqual(new LosslessNumber('5'));
        expect(valueAtPath(tree, ['b'])).toEqual(new LosslessNumber('5.0'));
    });

    it('writes lossless numbers verbatim', () => {
        expect(stringifyJson({ a: new LosslessNumber('5'), b: floatNumber(5), c: 1.5 })).toBe('{"a":5,"b":5.0,"c":1.5}');
    });

    it('throws on malformed text', () => {
        expect(() => parseJson('{"a":')).toThrow();
    });

    it('refuses an object key __proto__, escaped or not', () => {
        expect(() => parseJson('{"values":{"__proto__":1}}')).toThrow("Object key '__proto__' is not supported");
        expect(() => parseJson('{"\\u005f_proto__":1}')).toThrow("Object key '__proto__' is not supported");
    });

    it('accepts __proto__ as a string value', () => {
        expect(valueAtPath(parseJson('{"texture":"__proto__"}'), ['texture'])).toBe('__proto__');
    });

    it('indents on request', () => {
        expect(stringifyJson({ a: [1] }, 2)).toBe('{\n  "a": [\n    1\n  ]\n}');
    });
});

describe('number literals', () => {
    it('isIntegerLiteral looks at the source text', () => {
        expect(isIntegerLiteral(new LosslessNumber('5'))).toBe(true);
        expect(isIntegerLiteral(new LosslessNumber('5.0'))).toBe(false);
        expect(isIntegerLiteral(new LosslessNumber('1e3'))).toBe(false);
        expect(isIntegerLiteral(7)).toBe(true);
        expect(isIntegerLiteral(7.5)).toBe(false);
    });

    it('floatNumber always carries a fraction or exponent', () => {
        expect(floatNumber(5).value).toBe('5.0');
        expect(floatNumber(2.5).value).toBe('2.5');
        expect(floatNumber(-3).value).toBe('-3.0');
        expect(floatNumber(1e21).value).toBe('1e+21');
        expect(floatNumber(-0).value).toBe('-0.0');
        expect(floatNumber(0).value).toBe('0.0');
    });

    it('integerNumber writes digits only', () => {
        expect(integerNumber(42).value).toBe('42');
    });
});

describe('jsonTypeOf', () => {
    it('names JSON types', () => {
        expect(jsonTypeOf(undefined)).toBe('nothing');
        expect(jsonTypeOf(null)).toBe('null');
        expect(jsonTypeOf([])).toBe('array');
        expect(jsonTypeOf(new LosslessNumber('1'))).toBe('number');
        expect(jsonTypeOf({})).toBe('object');
        expect(jsonTypeOf('x')).toBe('string');
        expect(jsonTypeOf(true)).toBe('boolean');
    });
});

describe('paths', () => {
    it('formatPath joins keys and indices', () => {
        expect(formatPath(['layers', 2, 'entities', 0, 'x'])).toBe('layers[2].entities[0].x');
        expect(formatPath([])).toBe('<root>');
        expect(formatPath([1, 'a'])).toBe('[1].a');
    });

    it('valueAtPath walks objects and arrays', () => {
        const root = { layers: [{ name: 'ground' }] };
        expect(valueAtPath(root, ['layers', 0, 'name'])).toBe('ground');
        expect(valueAtPath(root, ['layers', 1, 'name'])).toBeUndefined();
        expect(valueAtPath(root, ['layers', 'name'])).toBeUndefined();
    });

    it('isJsonObject rejects arrays and numbers', () => {
        expect(isJsonObject({})).toBe(true);
        expect(isJsonObject([])).toBe(false);
        expect(isJsonObject(new LosslessNumber('1'))).toBe(false);
        expect(isJsonObject(null)).toBe(false);
    });
});
