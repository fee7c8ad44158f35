import type { TextureConfig } from './textureConfig';
import type { TextureHandle } from './texturePool';

/**
 * What the display needs from a graphics API. One implementation per API, picked at startup.
 */
export interface GpuBackend {
    createTexture(config: TextureConfig): TextureHandle;
    uploadRegion(
        handle: TextureHandle,
        image: Uint8Array,
        width: number,
        height: number,
    ): void;
    destroyTexture(handle: TextureHandle): void;
    hasTexture(handle: TextureHandle): boolean;
}
