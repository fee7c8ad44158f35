/**
 * Index into a {@link TexturePool}. The generation makes a handle go stale once its
 * slot is freed, even if the slot is reused for another texture later.
 */
export interface TextureHandle {
    readonly index: number;
    readonly generation: number;
}

export function formatHandle(handle: TextureHandle) {
    return `${handle.index}:${handle.generation}`;
}

interface Slot<T> {
    generation: number;
    value: T | undefined;
}

export class TexturePool<T> {
    private readonly slots: Slot<T>[] = [];
    private readonly freeIndices: number[] = [];
    private count = 0;

    get size() {
        return this.count;
    }

    insert(value: T): TextureHandle {
        const freeIndex = this.freeIndices.pop();
        this.count++;

        if (freeIndex !== undefined) {
            const slot = this.slots[freeIndex];
            slot.value = value;
            return { index: freeIndex, generation: slot.generation };
        }

        this.slots.push({ generation: 0, value });
        return { index: this.slots.length - 1, generation: 0 };
    }

    get(handle: TextureHandle): T | undefined {
        const slot = this.slots[handle.index];

        if (!slot || slot.generation !== handle.generation) {
            return undefined;
        }

        return slot.value;
    }

    has(handle: TextureHandle) {
        return this.get(handle) !== undefined;
    }

    remove(handle: TextureHandle): T | undefined {
        const value = this.get(handle);

        if (value === undefined) {
            return undefined;
        }

        const slot = this.slots[handle.index];
        slot.value = undefined;
        slot.generation++;
        this.freeIndices.push(handle.index);
        this.count--;

        return value;
    }
}
