import { computeCopyLayout, padRows } from './copyLayout';
import type { GpuStagingBuffer, GpuTexture, TextureDevice } from './device';
import { ConfigurationMismatchError, ResourceAllocationError } from './errors';
import { BufferUsage } from './usage';

/**
 * Creates a copy source buffer holding bytes, runs use with it and destroys it on every
 * exit path. A destroyed buffer stays alive until work already submitted with it is done.
 */
export function withStagingBuffer<T>(
    device: TextureDevice,
    bytes: Uint8Array,
    use: (buffer: GpuStagingBuffer) => T,
): T {
    let buffer: GpuStagingBuffer;

    try {
        buffer = device.createBuffer({
            label: 'screen-staging',
            size: bytes.byteLength,
            usage: BufferUsage.COPY_SRC,
            mappedAtCreation: true,
        });
    } catch (error) {
        throw new ResourceAllocationError(
            `Failed to allocate a ${bytes.byteLength} byte staging buffer`,
            { cause: error },
        );
    }

    try {
        new Uint8Array(buffer.getMappedRange()).set(bytes);
        buffer.unmap();
        return use(buffer);
    } finally {
        buffer.destroy();
    }
}

/**
 * Copies a tightly packed RGBA image into the whole of mip level 0 of texture and
 * submits the copy. Returns once the submission call returns.
 */
export function uploadImage(
    device: TextureDevice,
    texture: GpuTexture,
    image: Uint8Array,
    width: number,
    height: number,
) {
    if (texture.width !== width || texture.height !== height) {
        throw new ConfigurationMismatchError(
            `Cannot upload a ${width}x${height} image into a ${texture.width}x${texture.height} texture`,
        );
    }

    const layout = computeCopyLayout(image, width, height);

    withStagingBuffer(device, padRows(image, layout), buffer => {
        const encoder = device.createCommandEncoder({ label: 'screen-upload' });

        encoder.copyBufferToTexture(
            {
                buffer,
                offset: 0,
                bytesPerRow: layout.bytesPerRow,
                rowsPerImage: layout.rowsPerImage,
            },
            {
                texture,
                mipLevel: 0,
                origin: { x: 0, y: 0, z: 0 },
            },
            {
                width,
                height,
                depthOrArrayLayers: 1,
            },
        );

        device.queue.submit([encoder.finish()]);
    });
}
