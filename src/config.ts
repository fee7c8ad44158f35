import { Rgba } from './display/rgba';

export const DEFAULT_SCALE = 9;
export const DEFAULT_TINT: readonly [number, number, number, number] = [
    0.19, 0.66, 0.38, 1.0,
];
export const DEFAULT_TEXTURE_LABEL = 'emulator-screen';

export interface DisplayOptions {
    /** On-screen pixels per emulated pixel. */
    scale: number;
    tint: Rgba;
    label: string;
    /** Expected screen size; a pixel source of any other size is rejected. */
    width?: number;
    height?: number;
}

export function resolveDisplayOptions(
    options: Partial<DisplayOptions> = {},
): DisplayOptions {
    const scale = options.scale ?? DEFAULT_SCALE;
    assertValidScale(scale);

    return {
        scale,
        tint: options.tint ?? new Rgba(...DEFAULT_TINT),
        label: options.label ?? DEFAULT_TEXTURE_LABEL,
        width: options.width,
        height: options.height,
    };
}

export function assertValidScale(scale: number) {
    if (!Number.isFinite(scale) || scale <= 0) {
        throw new RangeError(`Invalid display scale ${scale}`);
    }
}
