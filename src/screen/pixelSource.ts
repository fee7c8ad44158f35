export type PixelValue = 0 | 1;

/**
 * Read-only view of a monochrome framebuffer whose size is fixed for its lifetime.
 */
export interface PixelSource {
    readonly width: number;
    readonly height: number;
    getPixel(x: number, y: number): PixelValue;
}
