import { expect, it } from 'vitest';
import { resolveDisplayOptions } from './config';
import { Rgba } from './display/rgba';

it('fills in defaults', () => {
    const options = resolveDisplayOptions();

    expect(options.scale).toBe(9);
    expect(options.tint.toArray()).toEqual([0.19, 0.66, 0.38, 1]);
    expect(options.label).toBe('emulator-screen');
});

it('keeps given values', () => {
    const tint = new Rgba(1, 1, 1, 1);

    const options = resolveDisplayOptions({ scale: 2.5, tint, label: 'lcd' });

    expect(options).toEqual({ scale: 2.5, tint, label: 'lcd' });
});

it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects the scale %s',
    scale => {
        expect(() => resolveDisplayOptions({ scale })).toThrow(RangeError);
    },
);
