import { alignTo } from '../byteUtil';
import { ConfigurationMismatchError } from './errors';
import { BYTES_PER_PIXEL } from './textureConfig';

/**
 * WebGPU requires bytesPerRow of a buffer to texture copy to be a multiple of this.
 */
export const COPY_BYTES_PER_ROW_ALIGNMENT = 256;

export interface CopyLayout {
    readonly unpaddedBytesPerRow: number;
    readonly bytesPerRow: number;
    readonly rowsPerImage: number;
    /** Size of the staging buffer in bytes. */
    readonly size: number;
}

export function computeCopyLayout(
    image: Uint8Array,
    width: number,
    height: number,
    alignment = COPY_BYTES_PER_ROW_ALIGNMENT,
): CopyLayout {
    const expectedLength = width * height * BYTES_PER_PIXEL;

    if (height <= 0 || image.length !== expectedLength) {
        throw new ConfigurationMismatchError(
            `Image of ${image.length} bytes does not match ${width}x${height} RGBA (${expectedLength} bytes)`,
        );
    }

    const unpaddedBytesPerRow = image.length / height;
    const bytesPerRow = alignTo(unpaddedBytesPerRow, alignment);

    return {
        unpaddedBytesPerRow,
        bytesPerRow,
        rowsPerImage: height,
        size: bytesPerRow * height,
    };
}

/**
 * Lays the rows of a tightly packed image out at the padded row pitch.
 */
export function padRows(image: Uint8Array, layout: CopyLayout): Uint8Array {
    if (layout.bytesPerRow === layout.unpaddedBytesPerRow) {
        return image;
    }

    const padded = new Uint8Array(layout.size);

    for (let row = 0; row < layout.rowsPerImage; row++) {
        const start = row * layout.unpaddedBytesPerRow;
        padded.set(
            image.subarray(start, start + layout.unpaddedBytesPerRow),
            row * layout.bytesPerRow,
        );
    }

    return padded;
}
