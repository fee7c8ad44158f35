import { ConfigurationMismatchError } from '../gpu/errors';
import { BYTES_PER_PIXEL } from '../gpu/textureConfig';
import type { PixelSource } from '../screen/pixelSource';

const SET_PIXEL = 255;
const UNSET_PIXEL = 0;
const OPAQUE = 255;

/**
 * Turns a monochrome framebuffer into white on black RGBA bytes. The output buffer is
 * allocated once and overwritten on every call to convert.
 */
export class FrameConverter {
    public readonly data: Uint8Array;

    constructor(
        public readonly width: number,
        public readonly height: number,
    ) {
        this.data = new Uint8Array(width * height * BYTES_PER_PIXEL);
    }

    convert(source: PixelSource): Uint8Array {
        if (source.width !== this.width || source.height !== this.height) {
            throw new ConfigurationMismatchError(
                `Pixel source is ${source.width}x${source.height}, expected ${this.width}x${this.height}`,
            );
        }

        const rowBytes = this.width * BYTES_PER_PIXEL;

        for (let y = 0; y < this.height; y++) {
            const rowOffset = y * rowBytes;

            for (let x = 0; x < this.width; x++) {
                const value = source.getPixel(x, y) ? SET_PIXEL : UNSET_PIXEL;
                const offset = rowOffset + x * BYTES_PER_PIXEL;

                this.data[offset] = value;
                this.data[offset + 1] = value;
                this.data[offset + 2] = value;
                this.data[offset + 3] = OPAQUE;
            }
        }

        return this.data;
    }
}

export function convertToRgba(source: PixelSource): Uint8Array {
    return new FrameConverter(source.width, source.height).convert(source);
}
