export * from './types/vec2.js';
export * from './types/value.js';
export * from './types/value-template.js';
export * from './types/layer-template.js';
export * from './types/layer.js';
export * from './types/project.js';
export * from './types/level.js';

export {
    type SchemaErrorKind,
    type SchemaErrorDetails,
    type SchemaResult,
    SchemaError,
} from './errors.js';
export {
    type JsonNumber,
    type JsonValue,
    type JsonObject,
    type PathSegment,
    parseJson,
    stringifyJson,
    formatPath,
} from './json/tree.js';

export { decodeProject, decodeLevel } from './codec/decode.js';
export { encodeProject, encodeLevel, stringifyProject, stringifyLevel } from './codec/encode.js';
export * from './unpack.js';
export * from './tiles.js';
export { resolveValues, resolveLevel } from './resolve.js';
export { carryFloatForms } from './schema/primitives.js';
export * from './io/index.js';
export { createServer } from './create-server.js';
