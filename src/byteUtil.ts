export function getBit(value: number, bitIndex: number) {
    return (value >> bitIndex) & 1;
}

/**
 * Rounds value up to the next multiple of alignment.
 */
export function alignTo(value: number, alignment: number) {
    return Math.ceil(value / alignment) * alignment;
}
