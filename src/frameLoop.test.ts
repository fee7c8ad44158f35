import { beforeEach, describe, expect, it, vi } from 'vitest';
import { type FrameCallback, FrameLoop } from './frameLoop';
import { Logger } from './logger';

class ManualScheduler {
    private pending: FrameCallback[] = [];

    schedule = (callback: FrameCallback) => {
        this.pending.push(callback);
    };

    get pendingCount() {
        return this.pending.length;
    }

    runFrame(now: number) {
        const callbacks = this.pending;
        this.pending = [];
        callbacks.forEach(callback => callback(now));
    }
}

let scheduler: ManualScheduler;
let logger: Logger;

beforeEach(() => {
    scheduler = new ManualScheduler();
    logger = new Logger();
});

it('passes the time since the previous frame to step', () => {
    const step = vi.fn();
    const loop = new FrameLoop(step, scheduler.schedule, logger);

    loop.start();
    scheduler.runFrame(100);
    scheduler.runFrame(116);
    scheduler.runFrame(150);

    expect(step.mock.calls).toEqual([[0], [16], [34]]);
});

it('schedules a single frame even when started twice', () => {
    const loop = new FrameLoop(vi.fn(), scheduler.schedule, logger);

    loop.start();
    loop.start();

    expect(scheduler.pendingCount).toBe(1);
});

it('stops stepping when paused', () => {
    const step = vi.fn();
    const loop = new FrameLoop(step, scheduler.schedule, logger);

    loop.start();
    loop.pause();
    scheduler.runFrame(16);

    expect(step).not.toHaveBeenCalled();
    expect(loop.running).toBe(false);
    expect(scheduler.pendingCount).toBe(0);
});

describe('when a frame throws', () => {
    function failingLoop() {
        const error = new Error('device lost');
        const loop = new FrameLoop(
            () => {
                throw error;
            },
            scheduler.schedule,
            logger,
        );
        return { loop, error };
    }

    it('halts and reports the error', () => {
        const { loop, error } = failingLoop();
        const onHalt = vi.fn();
        loop.onHalt = onHalt;

        loop.start();
        scheduler.runFrame(0);

        expect(loop.halted).toBe(true);
        expect(loop.running).toBe(false);
        expect(onHalt).toHaveBeenCalledWith(error);
        expect(scheduler.pendingCount).toBe(0);
        expect(logger.lines).toEqual([
            '[error] Rendering halted: Error: device lost',
        ]);
    });

    it('does not restart until reset', () => {
        const { loop } = failingLoop();
        loop.start();
        scheduler.runFrame(0);

        expect(() => loop.start()).toThrow('Frame loop is halted');

        loop.reset();
        loop.start();
        expect(scheduler.pendingCount).toBe(1);
    });
});

describe('when restarted before the pending frame runs', () => {
    it('keeps a single frame chain after reset', () => {
        const step = vi.fn();
        const loop = new FrameLoop(step, scheduler.schedule, logger);

        loop.start();
        scheduler.runFrame(0);
        loop.reset();
        loop.start();
        scheduler.runFrame(16);
        scheduler.runFrame(32);

        expect(step).toHaveBeenCalledTimes(3);
        expect(scheduler.pendingCount).toBe(1);
    });

    it('keeps a single frame chain after pause and resume', () => {
        const step = vi.fn();
        const loop = new FrameLoop(step, scheduler.schedule, logger);

        loop.start();
        loop.pause();
        loop.start();
        scheduler.runFrame(0);
        scheduler.runFrame(16);

        expect(step.mock.calls).toEqual([[0], [16]]);
        expect(scheduler.pendingCount).toBe(1);
    });
});
