export class DisplayError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Framebuffer, image and texture sizes disagree. Raised before any GPU command is recorded.
 */
export class ConfigurationMismatchError extends DisplayError {}

/**
 * A texture or staging buffer could not be allocated, or the device is gone.
 */
export class ResourceAllocationError extends DisplayError {}

/**
 * The texture handle was never created or has already been destroyed.
 */
export class InvalidHandleError extends DisplayError {}

/**
 * A previous frame failed and the display has not been recovered since.
 */
export class DisplayHaltedError extends DisplayError {}
