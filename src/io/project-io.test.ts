import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { loadProjectFile, saveProjectFile } from './project-io.js';
import { SchemaError } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '..', '__fixtures__');

describe('project-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ogmo-project-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads the fixture project', async () => {
        const project = await loadProjectFile(path.join(FIXTURES, 'caverns.ogmo'));
        expect(project.name).toBe('Caverns');
        expect(project.layers).toHaveLength(4);
    });

    it('save → reload roundtrip preserves all data', async () => {
        const loaded = await loadProjectFile(path.join(FIXTURES, 'caverns.ogmo'));
        const outPath = path.join(tempDir, 'nested', 'roundtrip.ogmo');

        await saveProjectFile(outPath, loaded);
        const reloaded = await loadProjectFile(outPath);

        expect(reloaded).toEqual(loaded);
    });

    it('writes two-space indented JSON', async () => {
        const loaded = await loadProjectFile(path.join(FIXTURES, 'caverns.ogmo'));
        const outPath = path.join(tempDir, 'indented.ogmo');

        await saveProjectFile(outPath, loaded);
        const text = await fs.readFile(outPath, 'utf8');

        expect(text.split('\n')[1]).toBe('  "name": "Caverns",');
    });

    it('throws domain error if file not found', async () => {
        const filePath = path.join(tempDir, 'nope.ogmo');
        await expect(loadProjectFile(filePath)).rejects.toThrow(`Project file not found: ${filePath}`);
    });

    it('throws a MalformedInput SchemaError on invalid JSON', async () => {
        const filePath = path.join(tempDir, 'bad.ogmo');
        await fs.writeFile(filePath, 'foo bar');

        const error: unknown = await loadProjectFile(filePath).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(SchemaError);
        expect(error instanceof SchemaError && error.kind).toBe('MalformedInput');
    });

    it('throws a MissingField SchemaError on an incomplete project', async () => {
        const filePath = path.join(tempDir, 'incomplete.ogmo');
        await fs.writeFile(filePath, '{"name": "foo"}');

        await expect(loadProjectFile(filePath)).rejects.toThrow("Missing required field 'levelPaths'.");
    });
});
