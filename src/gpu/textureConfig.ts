import type { DisplayTextureFormat, TextureDescriptor } from './device';
import { TextureUsage } from './usage';

export const BYTES_PER_PIXEL = 4;

/**
 * Everything a display texture is created with. None of it changes after creation;
 * a different size means destroying the texture and creating a new one.
 */
export interface TextureConfig {
    readonly label?: string;
    readonly width: number;
    readonly height: number;
    readonly format: DisplayTextureFormat;
    readonly mipLevelCount: 1;
    readonly sampleCount: 1;
    readonly dimension: '2d';
    readonly usage: number;
}

export function createDisplayTextureConfig(
    width: number,
    height: number,
    label?: string,
): TextureConfig {
    if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
        throw new RangeError(`Invalid texture size ${width}x${height}`);
    }

    return {
        label,
        width,
        height,
        format: 'rgba8unorm',
        mipLevelCount: 1,
        sampleCount: 1,
        dimension: '2d',
        usage: TextureUsage.TEXTURE_BINDING | TextureUsage.COPY_DST,
    };
}

export function toTextureDescriptor(config: TextureConfig): TextureDescriptor {
    return {
        label: config.label,
        size: {
            width: config.width,
            height: config.height,
            depthOrArrayLayers: 1,
        },
        mipLevelCount: config.mipLevelCount,
        sampleCount: config.sampleCount,
        dimension: config.dimension,
        format: config.format,
        usage: config.usage,
    };
}

function isPositiveInteger(value: number) {
    return Number.isInteger(value) && value > 0;
}
