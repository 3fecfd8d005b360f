/**
 * An X and Y pair. Used for sizes, origins, grid positions and entity nodes.
 */
export interface Vec2 {
    x: number;
    y: number;
}
