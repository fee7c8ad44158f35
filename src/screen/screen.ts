import { getBit } from '../byteUtil';
import type { PixelSource, PixelValue } from './pixelSource';

const SPRITE_WIDTH = 8;

export class Screen implements PixelSource {
    static readonly WIDTH = 64;
    static readonly HEIGHT = 32;

    private readonly pixels: Uint8Array;

    constructor(
        public readonly width = Screen.WIDTH,
        public readonly height = Screen.HEIGHT,
    ) {
        if (!Number.isInteger(width) || !Number.isInteger(height)) {
            throw new RangeError(`Invalid screen size ${width}x${height}`);
        }

        if (width <= 0 || height <= 0) {
            throw new RangeError(`Invalid screen size ${width}x${height}`);
        }

        this.pixels = new Uint8Array(width * height);
    }

    getPixel(x: number, y: number): PixelValue {
        return this.pixels[this.indexOf(x, y)] ? 1 : 0;
    }

    setPixel(x: number, y: number, value: PixelValue) {
        this.pixels[this.indexOf(x, y)] = value;
    }

    clear() {
        this.pixels.fill(0);
    }

    /**
     * XORs an 8 pixel wide sprite onto the screen, wrapping around the edges.
     * Returns true if any set pixel was turned off.
     */
    drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
        let collision = false;

        for (let row = 0; row < rows.length; row++) {
            const screenY = (y + row) % this.height;

            for (let column = 0; column < SPRITE_WIDTH; column++) {
                if (!getBit(rows[row], SPRITE_WIDTH - 1 - column)) {
                    continue;
                }

                const index = this.indexOf((x + column) % this.width, screenY);

                if (this.pixels[index]) {
                    collision = true;
                }

                this.pixels[index] ^= 1;
            }
        }

        return collision;
    }

    private indexOf(x: number, y: number) {
        if (
            !Number.isInteger(x) ||
            !Number.isInteger(y) ||
            x < 0 ||
            x >= this.width ||
            y < 0 ||
            y >= this.height
        ) {
            throw new Error(`Invalid pixel coordinate (${x}, ${y})`);
        }

        return y * this.width + x;
    }
}
