export type LogLevel = 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, text: string) => void;

export class Logger {
    public readonly lines: string[] = [];

    constructor(
        public maxLines = 20,
        private sink?: LogSink,
    ) {}

    log(text: string, level: LogLevel = 'info') {
        this.lines.push(`[${level}] ${text}`);

        if (this.lines.length > this.maxLines) {
            this.lines.splice(0, this.lines.length - this.maxLines);
        }

        this.sink?.(level, text);
    }

    warn(text: string) {
        this.log(text, 'warn');
    }

    error(text: string, error?: unknown) {
        if (error instanceof Error) {
            this.log(`${text}: ${error.name}: ${error.message}`, 'error');
        } else if (error !== undefined) {
            this.log(`${text}: ${String(error)}`, 'error');
        } else {
            this.log(text, 'error');
        }
    }
}
