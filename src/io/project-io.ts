import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type Project } from '../types/project.js';
import { decodeProject } from '../codec/decode.js';
import { stringifyProject } from '../codec/encode.js';
import * as errors from '../errors.js';

export function isFileNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads a project from a `.ogmo` file.
 *
 * @param filePath - Path to the project file
 * @returns The decoded Project
 * @throws SchemaError when the file does not decode, Error when it cannot be read
 */
export async function loadProjectFile(filePath: string): Promise<Project> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isFileNotFound(error)) {
            throw new Error(errors.projectFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    const result = decodeProject(text);
    if (!result.success) {
        throw result.error;
    }
    return result.data;
}

/**
 * Saves a project, creating the parent directory when needed.
 *
 * @param filePath - Path to the project file
 * @param project - The Project to encode
 */
export async function saveProjectFile(filePath: string, project: Project): Promise<void> {
    const result = stringifyProject(project);
    if (!result.success) {
        throw result.error;
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, result.data, 'utf8');
}
