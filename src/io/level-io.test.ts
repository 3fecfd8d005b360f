import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { loadLevelFile, saveLevelFile } from './level-io.js';
import { type Level } from '../types/level.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '..', '__fixtures__');

describe('level-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ogmo-level-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('save → reload roundtrip preserves the fixture level', async () => {
        const loaded = await loadLevelFile(path.join(FIXTURES, 'levels', 'entrance.json'));
        const outPath = path.join(tempDir, 'levels', 'entrance.json');

        await saveLevelFile(outPath, loaded);
        const reloaded = await loadLevelFile(outPath);

        expect(reloaded).toEqual(loaded);
    });

    it('writes floats with a fraction', async () => {
        const level: Level = {
            width: 16,
            height: 16,
            offsetX: 0,
            offsetY: 0,
            layers: [],
            values: [{ name: 'scale', value: { type: 'float', value: 2 } }],
        };
        const outPath = path.join(tempDir, 'scale.json');

        await saveLevelFile(outPath, level);
        const text = await fs.readFile(outPath, 'utf8');

        expect(text).toContain('"scale": 2.0');
    });

    it('does not write a level that cannot be encoded', async () => {
        const outPath = path.join(tempDir, 'broken.json');
        const level: Level = { width: Number.NaN, height: 16, offsetX: 0, offsetY: 0, layers: [], values: [] };

        await expect(saveLevelFile(outPath, level)).rejects.toThrow("Number at 'width'");
        await expect(fs.access(outPath)).rejects.toThrow();
    });

    it('throws domain error if file not found', async () => {
        const filePath = path.join(tempDir, 'missing.json');
        await expect(loadLevelFile(filePath)).rejects.toThrow(`Level file not found: ${filePath}`);
    });
});
