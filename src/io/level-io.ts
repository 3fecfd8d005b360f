import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type Level } from '../types/level.js';
import { decodeLevel } from '../codec/decode.js';
import { stringifyLevel } from '../codec/encode.js';
import { isFileNotFound } from './project-io.js';
import * as errors from '../errors.js';

/**
 * Loads a level from a JSON file.
 *
 * @param filePath - Path to the level file
 * @returns The decoded Level
 * @throws SchemaError when the file does not decode, Error when it cannot be read
 */
export async function loadLevelFile(filePath: string): Promise<Level> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isFileNotFound(error)) {
            throw new Error(errors.levelFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    const result = decodeLevel(text);
    if (!result.success) {
        throw result.error;
    }
    return result.data;
}

/**
 * Saves a level, creating the parent directory when needed.
 */
export async function saveLevelFile(filePath: string, level: Level): Promise<void> {
    const result = stringifyLevel(level);
    if (!result.success) {
        throw result.error;
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, result.data, 'utf8');
}
