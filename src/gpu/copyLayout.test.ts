import { describe, expect, it } from 'vitest';
import { computeCopyLayout, padRows } from './copyLayout';
import { ConfigurationMismatchError } from './errors';

describe('computeCopyLayout', () => {
    it('does not pad rows that are already aligned', () => {
        const layout = computeCopyLayout(new Uint8Array(64 * 32 * 4), 64, 32);

        expect(layout).toEqual({
            unpaddedBytesPerRow: 256,
            bytesPerRow: 256,
            rowsPerImage: 32,
            size: 256 * 32,
        });
    });

    it('pads a 1x1 image to a single aligned row', () => {
        const layout = computeCopyLayout(new Uint8Array(4), 1, 1);

        expect(layout.unpaddedBytesPerRow).toBe(4);
        expect(layout.bytesPerRow).toBe(256);
        expect(layout.size).toBe(256);
    });

    it('pads 160 pixel rows to 768 bytes', () => {
        const layout = computeCopyLayout(new Uint8Array(160 * 144 * 4), 160, 144);

        expect(layout.unpaddedBytesPerRow).toBe(640);
        expect(layout.bytesPerRow).toBe(768);
        expect(layout.size).toBe(768 * 144);
    });

    it('accepts a custom alignment', () => {
        const layout = computeCopyLayout(new Uint8Array(4), 1, 1, 4);

        expect(layout.bytesPerRow).toBe(4);
    });

    it('rejects images that do not match the given size', () => {
        expect(() => computeCopyLayout(new Uint8Array(12), 2, 2)).toThrow(
            ConfigurationMismatchError,
        );
    });
});

describe('padRows', () => {
    it('returns the same buffer when no padding is needed', () => {
        const image = new Uint8Array(8);
        const layout = computeCopyLayout(image, 2, 1, 4);

        expect(padRows(image, layout)).toBe(image);
    });

    it('moves every row to its padded offset', () => {
        const image = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);
        const layout = computeCopyLayout(image, 1, 2, 8);

        expect(Array.from(padRows(image, layout))).toEqual([
            1, 2, 3, 4, 0, 0, 0, 0, 5, 6, 7, 8, 0, 0, 0, 0,
        ]);
    });
});
