export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR'
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
    if (!value) return fallback;
    const upper = value.toUpperCase();
    return LEVEL_ORDER.find(level => level === upper) ?? fallback;
}

export class Logger {
    private static instance: Logger;
    private logLevel: LogLevel = LogLevel.INFO;
    private scope?: string;

    private constructor(scope?: string) {
        this.scope = scope;
    }

    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    /**
     * Child logger sharing the root level, prefixing messages with `[scope]`.
     * Setting the level on a child sets the root level.
     */
    static forScope(scope: string): Logger {
        return new Logger(scope);
    }

    setLogLevel(level: LogLevel): void {
        if (this.scope) {
            Logger.getInstance().setLogLevel(level);
            return;
        }
        this.logLevel = level;
    }

    getLogLevel(): LogLevel {
        return this.scope ? Logger.getInstance().getLogLevel() : this.logLevel;
    }

    debug(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            this.log(LogLevel.DEBUG, message, data);
        }
    }

    info(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.INFO)) {
            this.log(LogLevel.INFO, message, data);
        }
    }

    warn(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.WARN)) {
            this.log(LogLevel.WARN, message, data);
        }
    }

    error(message: string, error?: unknown): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            this.log(LogLevel.ERROR, message, error);
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.getLogLevel());
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
        const prefix = this.scope ? `[${this.scope}] ` : '';
        const logMessage = `[${timestamp}] [${level}] ${prefix}${message}`;

        switch (level) {
            case LogLevel.DEBUG:
            case LogLevel.INFO:
                console.log(logMessage, data ?? '');
                break;
            case LogLevel.WARN:
                console.warn(logMessage, data ?? '');
                break;
            case LogLevel.ERROR:
                console.error(logMessage, data ?? '');
                break;
        }
    }
}
