export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

/** A message, or a function building it that only runs when the level is on. */
export type LogMessage = string | (() => string);

export class Logger {
    private readonly level: LogLevel;
    private readonly prefix: string;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env, scope?: string) {
        // MEMWIRE_LOG wins over the generic LOG_LEVEL
        const envLevel = env.MEMWIRE_LOG?.toUpperCase() || env.LOG_LEVEL?.toUpperCase() || 'ERROR';
        this.level = Logger.parseLevel(envLevel);
        this.prefix = scope ? `[memwire:${scope}]` : '[memwire]';
    }

    static parseLevel(lvl: string): LogLevel {
        switch (lvl) {
            case 'TRACE':
            case 'DEBUG': return LogLevel.DEBUG;
            case 'INFO': return LogLevel.INFO;
            case 'WARN': return LogLevel.WARN;
            case 'ERROR': return LogLevel.ERROR;
            case 'OFF': return LogLevel.NONE;
            default: return LogLevel.ERROR;
        }
    }

    /** Same level, tagged with the component that logs: `[memwire:conn]`. */
    child(scope: string): Logger {
        return new Logger(this.env, scope);
    }

    debug(msg: LogMessage, ...args: unknown[]) {
        if (this.level <= LogLevel.DEBUG) {
            console.debug(`\x1b[36m${this.prefix} [DEBUG]\x1b[0m ${render(msg)}`, ...args);
        }
    }

    info(msg: LogMessage, ...args: unknown[]) {
        if (this.level <= LogLevel.INFO) {
            console.log(`\x1b[32m${this.prefix} [INFO]\x1b[0m ${render(msg)}`, ...args);
        }
    }

    warn(msg: LogMessage, ...args: unknown[]) {
        if (this.level <= LogLevel.WARN) {
            console.warn(`\x1b[33m${this.prefix} [WARN]\x1b[0m ${render(msg)}`, ...args);
        }
    }

    error(msg: LogMessage, ...args: unknown[]) {
        if (this.level <= LogLevel.ERROR) {
            console.error(`\x1b[31m${this.prefix} [ERROR]\x1b[0m ${render(msg)}`, ...args);
        }
    }
}

function render(msg: LogMessage): string {
    return typeof msg === 'function' ? msg() : msg;
}

export const logger = new Logger();
