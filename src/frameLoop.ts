import type { Logger } from './logger';

export type FrameCallback = (now: number) => void;
export type FrameScheduler = (callback: FrameCallback) => void;

/**
 * Runs step once per scheduled frame with the milliseconds elapsed since the previous
 * frame. An error thrown by step halts the loop; it stays halted until reset.
 */
export class FrameLoop {
    private isRunning = false;
    private framePending = false;
    private haltError?: unknown;
    private lastTime?: number;

    onHalt?: (error: unknown) => void;

    constructor(
        private readonly step: (deltaTimeMs: number) => void,
        private readonly schedule: FrameScheduler,
        private readonly logger: Logger,
    ) {}

    get running() {
        return this.isRunning;
    }

    get halted() {
        return this.haltError !== undefined;
    }

    start() {
        if (this.halted) {
            throw new Error('Frame loop is halted, reset it before starting');
        }

        if (this.isRunning) {
            return;
        }

        this.isRunning = true;
        this.lastTime = undefined;

        // A tick queued before pause or reset is still pending and picks up again.
        if (!this.framePending) {
            this.scheduleFrame();
        }
    }

    pause() {
        this.isRunning = false;
    }

    reset() {
        this.haltError = undefined;
        this.isRunning = false;
    }

    private scheduleFrame() {
        this.framePending = true;
        this.schedule(this.tick);
    }

    private tick = (now: number) => {
        this.framePending = false;

        if (!this.isRunning) {
            return;
        }

        const deltaTimeMs = this.lastTime === undefined ? 0 : now - this.lastTime;
        this.lastTime = now;

        try {
            this.step(deltaTimeMs);
        } catch (error) {
            this.isRunning = false;
            this.haltError = error;
            this.logger.error('Rendering halted', error);
            this.onHalt?.(error);
            return;
        }

        this.scheduleFrame();
    };
}
