export { loadProjectFile, saveProjectFile } from './project-io.js';
export { loadLevelFile, saveLevelFile } from './level-io.js';
