import { describe, it, expect } from 'vitest';
import { parseJson } from '../json/tree.js';
import { encodeLayerTemplate, layerTemplateSchema } from './layer-template.js';
import { toSchemaError } from './primitives.js';
import { type LayerTemplate } from '../types/layer-template.js';

function decode(text: string) {
    const tree = parseJson(text);
    const result = layerTemplateSchema.safeParse(tree);
    return { tree, result };
}

function decodeError(text: string) {
    const { tree, result } = decode(text);
    if (result.success) throw new Error('expected the template to be rejected');
    return toSchemaError(result.error, tree);
}

const BASE = '"name":"walls","gridSize":{"x":16,"y":16},"exportID":"layer-walls"';

describe('layerTemplateSchema', () => {
    it('uses the definition tag', () => {
        const { result } = decode(`{"definition":"entity",${BASE},"requiredTags":["a"],"excludedTags":[]}`);
        expect(result.success && result.data).toEqual({
            definition: 'entity',
            name: 'walls',
            gridSize: { x: 16, y: 16 },
            exportID: 'layer-walls',
            requiredTags: ['a'],
            excludedTags: [],
        });
    });

    it('falls back to marker keys without a tag', () => {
        const { result } = decode(`{${BASE},"arrayMode":0,"legend":{"0":"#00000000"}}`);
        expect(result.success && result.data.definition).toBe('grid');
    });

    it('reports several marker sets as ambiguous', () => {
        const err = decodeError(`{${BASE},"legend":{},"folder":"decals"}`);
        expect(err.kind).toBe('AmbiguousVariant');
        expect(err.candidates).toEqual(['grid', 'decal']);
    });

    it('reports a template with no markers as unknown', () => {
        const err = decodeError(`{${BASE}}`);
        expect(err.kind).toBe('UnknownVariant');
        expect(err.message).toBe(
            "Object at '<root>' matches no known variant: no definition tag and no grid, tile, entity or decal fields.",
        );
    });

    it('reports an unsupported tag', () => {
        const err = decodeError(`{"definition":"sprite",${BASE}}`);
        expect(err.kind).toBe('UnknownVariant');
        expect(err.message).toBe("Object at '<root>' matches no known variant: unsupported layer definition 'sprite'.");
    });

    it('rejects an unknown export mode code', () => {
        const err = decodeError(`{"definition":"tile",${BASE},"exportMode":2,"arrayMode":0,"defaultTileset":"t"}`);
        expect(err.kind).toBe('TypeMismatch');
        expect(err.path).toBe('exportMode');
        expect(err.expected).toBe('0 | 1');
        expect(err.actual).toBe('number');
    });

    it('reports a missing field by path', () => {
        const err = decodeError(`{"definition":"tile",${BASE},"exportMode":0,"arrayMode":0}`);
        expect(err.kind).toBe('MissingField');
        expect(err.path).toBe('defaultTileset');
    });

    it('reads value templates of decal layers', () => {
        const { result } = decode(
            `{"definition":"decal",${BASE},"folder":"d","includeImageSequence":false,"scaleable":true,"rotatable":true,` +
                '"values":[{"name":"lit","definition":"Boolean","defaults":true}]}',
        );
        expect(result.success && result.data).toMatchObject({
            definition: 'decal',
            values: [{ name: 'lit', definition: 'Boolean', defaults: true }],
        });
    });
});

describe('encodeLayerTemplate', () => {
    it('writes the definition tag first', () => {
        const template: LayerTemplate = {
            definition: 'tile',
            name: 'ground',
            gridSize: { x: 8, y: 8 },
            exportID: 'layer-ground',
            exportMode: 1,
            arrayMode: 0,
            defaultTileset: 'terrain',
        };
        const out = encodeLayerTemplate(template, ['layers', 0]);
        expect(Object.keys(out)).toEqual([
            'definition',
            'name',
            'gridSize',
            'exportID',
            'exportMode',
            'arrayMode',
            'defaultTileset',
        ]);
        expect(out.exportMode).toBe(1);
    });

    it('rejects a fractional grid size', () => {
        const template: LayerTemplate = {
            definition: 'entity',
            name: 'actors',
            gridSize: { x: 8.5, y: 8 },
            exportID: 'layer-actors',
            requiredTags: [],
            excludedTags: [],
        };
        expect(() => encodeLayerTemplate(template, ['layers', 3])).toThrow(
            "Number at 'layers[3].gridSize.x' is out of the representable range.",
        );
    });
});
