import type { GpuTexture, TextureDevice } from './device';
import { InvalidHandleError, ResourceAllocationError } from './errors';
import type { GpuBackend } from './gpuBackend';
import { toTextureDescriptor, type TextureConfig } from './textureConfig';
import {
    formatHandle,
    TexturePool,
    type TextureHandle,
} from './texturePool';
import { uploadImage } from './uploadPipeline';

export class WebGpuBackend implements GpuBackend {
    private readonly textures = new TexturePool<GpuTexture>();
    private lostReason?: string;

    constructor(private readonly device: TextureDevice) {}

    get isDeviceLost() {
        return this.lostReason !== undefined;
    }

    get textureCount() {
        return this.textures.size;
    }

    /**
     * Called when the device's lost promise resolves. Textures of a lost device are gone,
     * so every later create or upload fails.
     */
    markDeviceLost(reason: string) {
        this.lostReason = reason;
    }

    createTexture(config: TextureConfig): TextureHandle {
        this.assertDeviceAvailable();

        let texture: GpuTexture;

        try {
            texture = this.device.createTexture(toTextureDescriptor(config));
        } catch (error) {
            throw new ResourceAllocationError(
                `Failed to allocate a ${config.width}x${config.height} ${config.format} texture`,
                { cause: error },
            );
        }

        return this.textures.insert(texture);
    }

    uploadRegion(
        handle: TextureHandle,
        image: Uint8Array,
        width: number,
        height: number,
    ) {
        const texture = this.resolve(handle);
        this.assertDeviceAvailable();

        uploadImage(this.device, texture, image, width, height);
    }

    destroyTexture(handle: TextureHandle) {
        const texture = this.resolve(handle);
        this.textures.remove(handle);
        texture.destroy();
    }

    hasTexture(handle: TextureHandle) {
        return this.textures.has(handle);
    }

    private resolve(handle: TextureHandle): GpuTexture {
        const texture = this.textures.get(handle);

        if (!texture) {
            throw new InvalidHandleError(
                `Texture ${formatHandle(handle)} does not exist`,
            );
        }

        return texture;
    }

    private assertDeviceAvailable() {
        if (this.lostReason !== undefined) {
            throw new ResourceAllocationError(
                `GPU device lost: ${this.lostReason}`,
            );
        }
    }
}
