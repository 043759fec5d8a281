export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string, err?: unknown) => void;

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, err?: unknown): void;
    child(scope: string): Logger;
}

export interface LoggerOptions {
    debug?: boolean;
    sink?: LogSink;
}

const consoleSink: LogSink = (level, line, err) => {
    if (level === 'error') {
        if (err === undefined) console.error(line);
        else console.error(line, err);
    } else if (level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
};

/** `<ISO timestamp> - <scope> - <LEVEL> - <message>`; debug lines only when debug is on. */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const sink = options.sink ?? consoleSink;
    const debugEnabled = options.debug ?? false;

    const write = (level: LogLevel, message: string, err?: unknown) => {
        const line = `${new Date().toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`;
        sink(level, line, err);
    };

    return {
        debug: (message) => { if (debugEnabled) write('debug', message); },
        info: (message) => write('info', message),
        warn: (message) => write('warn', message),
        error: (message, err) => write('error', message, err),
        child: (childScope) => createLogger(`${scope}.${childScope}`, options),
    };
}

export const silentLogger: Logger = createLogger('silent', { sink: () => undefined });
