import {
    assertValidScale,
    resolveDisplayOptions,
    type DisplayOptions,
} from '../config';
import { ConfigurationMismatchError, DisplayHaltedError } from '../gpu/errors';
import type { GpuBackend } from '../gpu/gpuBackend';
import {
    createDisplayTextureConfig,
    type TextureConfig,
} from '../gpu/textureConfig';
import { formatHandle, type TextureHandle } from '../gpu/texturePool';
import type { Logger } from '../logger';
import type { PixelSource } from '../screen/pixelSource';
import { FrameConverter } from './frameConverter';
import type { Rgba } from './rgba';

export interface DrawParams {
    texture: TextureHandle;
    size: [number, number];
    tint: [number, number, number, number];
}

/**
 * Keeps a GPU texture in sync with an emulator's screen. The texture is created once
 * and overwritten on every update.
 */
export class EmulatorDisplay {
    public tint: Rgba;
    private _scale: number;
    private _texture: TextureHandle;
    private haltReason?: unknown;
    private readonly config: TextureConfig;
    private readonly converter: FrameConverter;

    constructor(
        private readonly backend: GpuBackend,
        source: PixelSource,
        private readonly logger: Logger,
        options: Partial<DisplayOptions> = {},
    ) {
        const resolved = resolveDisplayOptions(options);
        this.tint = resolved.tint;
        this._scale = resolved.scale;
        this.config = createDisplayTextureConfig(
            resolved.width ?? source.width,
            resolved.height ?? source.height,
            resolved.label,
        );
        this.assertMatchesTexture(source);
        this.converter = new FrameConverter(this.width, this.height);
        this._texture = this.createTexture();
    }

    get width() {
        return this.config.width;
    }

    get height() {
        return this.config.height;
    }

    get texture() {
        return this._texture;
    }

    get isHalted() {
        return this.haltReason !== undefined;
    }

    get scale() {
        return this._scale;
    }

    set scale(value: number) {
        assertValidScale(value);
        this._scale = value;
    }

    /**
     * Converts the current frame and copies it into the texture. A source of the wrong
     * size is rejected up front; any other failure halts the display until recover is called.
     */
    update(source: PixelSource) {
        if (this.haltReason !== undefined) {
            throw new DisplayHaltedError(
                'Display is halted after a failed update',
                { cause: this.haltReason },
            );
        }

        this.assertMatchesTexture(source);

        try {
            const image = this.converter.convert(source);
            this.backend.uploadRegion(
                this._texture,
                image,
                this.width,
                this.height,
            );
        } catch (error) {
            this.haltReason = error;
            throw error;
        }
    }

    /**
     * Replaces the texture with a new one and clears the halted state.
     */
    recover() {
        if (this.backend.hasTexture(this._texture)) {
            this.backend.destroyTexture(this._texture);
        }

        this._texture = this.createTexture();
        this.haltReason = undefined;
    }

    drawSize(): [number, number] {
        return [this.width * this._scale, this.height * this._scale];
    }

    drawParams(): DrawParams {
        return {
            texture: this._texture,
            size: this.drawSize(),
            tint: this.tint.toArray(),
        };
    }

    destroy() {
        this.backend.destroyTexture(this._texture);
        this.logger.log(
            `Destroyed ${this.width}x${this.height} texture ${formatHandle(this._texture)}`,
        );
    }

    private createTexture() {
        const handle = this.backend.createTexture(this.config);
        this.logger.log(
            `Created ${this.width}x${this.height} ${this.config.format} texture ${formatHandle(handle)}`,
        );
        return handle;
    }

    private assertMatchesTexture(source: PixelSource) {
        if (source.width !== this.width || source.height !== this.height) {
            throw new ConfigurationMismatchError(
                `Pixel source is ${source.width}x${source.height}, texture is ${this.width}x${this.height}`,
            );
        }
    }
}
