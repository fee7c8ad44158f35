import { EmulatorDisplay } from './display/emulatorDisplay';
import { Rgba } from './display/rgba';
import { FrameLoop } from './frameLoop';
import { WebGpuBackend } from './gpu/webgpuBackend';
import { Logger } from './logger';
import { Screen } from './screen/screen';
import './style.css';

const DEMO_SPRITE = [0x3c, 0x42, 0xa5, 0x81, 0xa5, 0x99, 0x42, 0x3c];
const DEMO_STEP_MS = 100;

const logContainer = document.querySelector<HTMLDivElement>('#logs');
const scaleInput = document.querySelector<HTMLInputElement>('#scaleInput');
const tintInput = document.querySelector<HTMLInputElement>('#tintInput');
const pauseButton = document.querySelector<HTMLButtonElement>('#pauseButton');
const recoverButton =
    document.querySelector<HTMLButtonElement>('#recoverButton');

const logger = new Logger(50, (level, text) => {
    console[level](text);
    updateLog();
});

function updateLog() {
    if (logContainer) {
        logContainer.textContent = logger.lines.join('\n');
    }
}

function parseHexColor(value: string) {
    return Rgba.fromBytes([
        parseInt(value.slice(1, 3), 16),
        parseInt(value.slice(3, 5), 16),
        parseInt(value.slice(5, 7), 16),
        255,
    ]);
}

async function start() {
    const adapter = await navigator.gpu?.requestAdapter();

    if (!adapter) {
        logger.error('WebGPU is not available');
        return;
    }

    const device = await adapter.requestDevice();
    const backend = new WebGpuBackend(device);

    void device.lost.then(info => {
        backend.markDeviceLost(info.message);
        logger.error(`GPU device lost (${info.reason})`);
    });

    device.onuncapturederror = event => {
        logger.error('Uncaptured GPU error', event.error.message);
    };

    const screen = new Screen();
    const display = new EmulatorDisplay(backend, screen, logger);
    logger.log(`Draw size ${display.drawSize().join('x')}`);

    let spriteX = 0;
    let elapsedMs = 0;

    const loop = new FrameLoop(
        deltaTimeMs => {
            elapsedMs += deltaTimeMs;

            while (elapsedMs >= DEMO_STEP_MS) {
                elapsedMs -= DEMO_STEP_MS;
                spriteX = (spriteX + 1) % screen.width;
                screen.clear();
                screen.drawSprite(spriteX, 12, DEMO_SPRITE);
            }

            display.update(screen);
        },
        callback => requestAnimationFrame(callback),
        logger,
    );

    loop.onHalt = () => {
        if (pauseButton) {
            pauseButton.textContent = 'Halted';
        }
    };

    scaleInput?.addEventListener('change', () => {
        try {
            display.scale = Number(scaleInput.value);
            logger.log(`Draw size ${display.drawSize().join('x')}`);
        } catch (error) {
            logger.error('Invalid scale', error);
        }
    });

    tintInput?.addEventListener('input', () => {
        display.tint = parseHexColor(tintInput.value);
    });

    pauseButton?.addEventListener('click', () => {
        if (loop.running) {
            loop.pause();
            pauseButton.textContent = 'Resume';
        } else if (!loop.halted) {
            loop.start();
            pauseButton.textContent = 'Pause';
        }
    });

    recoverButton?.addEventListener('click', () => {
        try {
            display.recover();
            loop.reset();
            loop.start();

            if (pauseButton) {
                pauseButton.textContent = 'Pause';
            }
        } catch (error) {
            logger.error('Recovery failed', error);
        }
    });

    window.addEventListener('beforeunload', () => {
        if (backend.hasTexture(display.texture)) {
            display.destroy();
        }
    });

    loop.start();
}

start().catch(error => logger.error('Failed to start the display', error));
