import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { runLevelTool } from './level.js';
import { decodeLevel, decodeProject } from '../codec/decode.js';
import * as errors from '../errors.js';
import * as levelIo from '../io/level-io.js';
import * as projectIo from '../io/project-io.js';
import { type ToolResponse } from './response.js';

vi.mock('../io/level-io.js', () => ({
    loadLevelFile: vi.fn(),
    saveLevelFile: vi.fn(),
}));

vi.mock('../io/project-io.js', () => ({
    loadProjectFile: vi.fn(),
    saveProjectFile: vi.fn(),
}));

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '..', '__fixtures__');

function fixtureLevel() {
    const result = decodeLevel(fs.readFileSync(path.join(FIXTURES, 'levels', 'entrance.json'), 'utf8'));
    if (!result.success) throw result.error;
    return result.data;
}

function fixtureProject() {
    const result = decodeProject(fs.readFileSync(path.join(FIXTURES, 'caverns.ogmo'), 'utf8'));
    if (!result.success) throw result.error;
    return result.data;
}

function payload(result: ToolResponse): unknown {
    expect(result.isError).toBeUndefined();
    return JSON.parse(result.content[0].text);
}

const LEVEL = '/tmp/levels/entrance.json';

describe('level tool', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.mocked(levelIo.loadLevelFile).mockResolvedValue(fixtureLevel());
        vi.mocked(projectIo.loadProjectFile).mockResolvedValue(fixtureProject());
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('info summarizes the level', async () => {
        const result = await runLevelTool({ action: 'info', path: LEVEL });

        expect(payload(result)).toEqual({
            path: path.resolve(LEVEL),
            ogmoVersion: '3.4.0',
            width: 64,
            height: 32,
            offsetX: 0,
            offsetY: 0,
            layers: 4,
            values: 4,
        });
    });

    it('layers counts the content of each layer', async () => {
        const result = await runLevelTool({ action: 'layers', path: LEVEL });

        const layers = payload(result);
        expect(Array.isArray(layers) && layers.map((layer) => [layer.name, layer.type, layer.count])).toEqual([
            ['ground', 'tile', 5],
            ['solids', 'grid', 8],
            ['actors', 'entity', 2],
            ['props', 'decal', 1],
        ]);
    });

    describe('tiles', () => {
        it('lists placed tiles of a tile layer', async () => {
            const result = await runLevelTool({ action: 'tiles', path: LEVEL, layer: 'ground' });

            expect(payload(result)).toEqual({
                layer: 'ground',
                type: 'tile',
                tileset: 'terrain',
                tiles: [
                    { x: 0, y: 0, id: 0 },
                    { x: 1, y: 0, id: 1 },
                    { x: 3, y: 0, id: 3 },
                    { x: 2, y: 1, id: 2 },
                    { x: 3, y: 1, id: 2 },
                ],
            });
        });

        it('lists every cell of a grid layer', async () => {
            const result = await runLevelTool({ action: 'tiles', path: LEVEL, layer: 'solids' });

            const body = payload(result);
            expect(body).toMatchObject({ layer: 'solids', type: 'grid' });
            expect(body).toHaveProperty('cells.0', { x: 0, y: 0, value: '1' });
            expect(body).toHaveProperty('cells.6', { x: 2, y: 1, value: '1' });
        });

        it('rejects an entity layer', async () => {
            const result = await runLevelTool({ action: 'tiles', path: LEVEL, layer: 'actors' });

            expect(result.isError).toBe(true);
            expect(result.content[0].text).toBe(errors.notATileLayer('actors', 'entity').content[0].text);
        });

        it('rejects an unknown layer', async () => {
            const result = await runLevelTool({ action: 'tiles', path: LEVEL, layer: 'walls' });

            expect(result.content[0].text).toBe("Layer 'walls' does not exist in this level.");
        });

        it('requires a layer name', async () => {
            const result = await runLevelTool({ action: 'tiles', path: LEVEL });

            expect(result.isError).toBe(true);
            expect(result.content[0].text).toBe('Invalid argument: level tiles requires a "layer" name.');
        });
    });

    describe('values', () => {
        it('shows untyped values without a project', async () => {
            const result = await runLevelTool({ action: 'values', path: LEVEL });

            expect(payload(result)).toEqual([
                { name: 'title', type: 'string', value: 'Entrance' },
                { name: 'gravity', type: 'float', value: 9.8 },
                { name: 'tint', type: 'string', value: '#80c0ffff' },
                { name: 'music', type: 'string', value: 'tense' },
            ]);
            expect(projectIo.loadProjectFile).not.toHaveBeenCalled();
        });

        it('applies the value templates of a project', async () => {
            const result = await runLevelTool({ action: 'values', path: LEVEL, project_path: '/tmp/caverns.ogmo' });

            expect(payload(result)).toEqual([
                { name: 'title', type: 'string', value: 'Entrance' },
                { name: 'gravity', type: 'float', value: 9.8 },
                { name: 'tint', type: 'color', value: '#80c0ffff' },
                { name: 'music', type: 'enum', value: 'tense' },
            ]);
            expect(projectIo.loadProjectFile).toHaveBeenCalledWith(path.resolve('/tmp/caverns.ogmo'));
        });

        it('returns a missing project as a tool error', async () => {
            vi.mocked(projectIo.loadProjectFile).mockRejectedValue(new Error('Project file not found: /tmp/x.ogmo'));

            const result = await runLevelTool({ action: 'values', path: LEVEL, project_path: '/tmp/x.ogmo' });

            expect(result.isError).toBe(true);
            expect(result.content[0].text).toBe('Project file not found: /tmp/x.ogmo');
        });
    });

    it('validate reports an ambiguous layer', async () => {
        vi.mocked(levelIo.loadLevelFile).mockRejectedValue(errors.ambiguousVariant(['layers', 1], ['grid', 'decals']));

        const result = await runLevelTool({ action: 'validate', path: LEVEL });

        expect(payload(result)).toEqual({
            valid: false,
            kind: 'AmbiguousVariant',
            path: 'layers[1]',
            message: "Object at 'layers[1]' matches more than one variant (grid, decals).",
        });
    });
});
