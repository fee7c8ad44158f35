/**
 * Normalized RGBA color multiplied into the texture when it is drawn. Values are not
 * clamped; [0, 1] is the usual range.
 */
export class Rgba {
    constructor(
        public r: number,
        public g: number,
        public b: number,
        public a: number,
    ) {}

    toArray(): [number, number, number, number] {
        return [this.r, this.g, this.b, this.a];
    }

    static fromBytes(color: readonly [number, number, number, number]) {
        return new Rgba(
            color[0] / 255,
            color[1] / 255,
            color[2] / 255,
            color[3] / 255,
        );
    }
}
