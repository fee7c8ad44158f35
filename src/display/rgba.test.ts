import { expect, it } from 'vitest';
import { Rgba } from './rgba';

it('lists its channels in RGBA order', () => {
    expect(new Rgba(0.19, 0.66, 0.38, 1).toArray()).toEqual([
        0.19, 0.66, 0.38, 1,
    ]);
});

it('normalizes byte colors', () => {
    expect(Rgba.fromBytes([255, 0, 51, 255]).toArray()).toEqual([
        1, 0, 0.2, 1,
    ]);
});
