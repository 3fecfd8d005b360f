import type { Layer } from './layer.js';
import type { CustomValue } from './value.js';

/**
 * The complete structure of a level file.
 */
export interface Level {
    /** Editor version that wrote the file. Absent in files from early 3.x builds. */
    ogmoVersion?: string;
    width: number;
    height: number;
    /** Offsets place chunked levels relative to each other */
    offsetX: number;
    offsetY: number;
    /** Layers in render order */
    layers: Layer[];
    /** Level values. Empty when the file declares none. */
    values: CustomValue[];
}
