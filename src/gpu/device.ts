/**
 * The part of a WebGPU device the texture upload needs. A real `GPUDevice` satisfies
 * these interfaces, and so does the in-process fake the tests use.
 */

export type DisplayTextureFormat = 'rgba8unorm';

export interface GpuTexture {
    readonly width: number;
    readonly height: number;
    readonly format: GPUTextureFormat;
    destroy(): void;
}

export interface GpuStagingBuffer {
    readonly size: number;
    getMappedRange(offset?: number, size?: number): ArrayBuffer;
    unmap(): void;
    destroy(): void;
}

export interface GpuCommandBuffer {
    readonly label: string;
}

export interface TextureDescriptor {
    label?: string;
    size: { width: number; height: number; depthOrArrayLayers: number };
    mipLevelCount: number;
    sampleCount: number;
    dimension: '2d';
    format: DisplayTextureFormat;
    usage: number;
}

export interface StagingBufferDescriptor {
    label?: string;
    size: number;
    usage: number;
    mappedAtCreation: boolean;
}

export interface BufferCopySource {
    buffer: GpuStagingBuffer;
    offset?: number;
    bytesPerRow?: number;
    rowsPerImage?: number;
}

export interface TextureCopyDestination {
    texture: GpuTexture;
    mipLevel?: number;
    origin?: GPUOrigin3D;
}

export interface CopyExtent {
    width: number;
    height: number;
    depthOrArrayLayers: number;
}

export interface GpuCopyEncoder {
    copyBufferToTexture(
        source: BufferCopySource,
        destination: TextureCopyDestination,
        copySize: CopyExtent,
    ): void;
    finish(descriptor?: { label?: string }): GpuCommandBuffer;
}

export interface GpuQueue {
    submit(commandBuffers: Iterable<GpuCommandBuffer>): void;
}

export interface TextureDevice {
    readonly queue: GpuQueue;
    createTexture(descriptor: TextureDescriptor): GpuTexture;
    createBuffer(descriptor: StagingBufferDescriptor): GpuStagingBuffer;
    createCommandEncoder(descriptor?: { label?: string }): GpuCopyEncoder;
}
