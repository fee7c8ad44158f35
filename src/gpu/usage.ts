// The WebGPU globals only exist where WebGPU does; the fallbacks are the values it defines.
const hasBufferUsage = typeof GPUBufferUsage !== 'undefined';
const hasTextureUsage = typeof GPUTextureUsage !== 'undefined';

export const BufferUsage = {
    COPY_SRC: hasBufferUsage ? GPUBufferUsage.COPY_SRC : 0x0004,
};

export const TextureUsage = {
    COPY_DST: hasTextureUsage ? GPUTextureUsage.COPY_DST : 0x02,
    TEXTURE_BINDING: hasTextureUsage ? GPUTextureUsage.TEXTURE_BINDING : 0x04,
};
