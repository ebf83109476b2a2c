export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    readonly level: LogLevel;
    readonly subsystem: string;
    readonly message: string;
    readonly timestamp: number;
    readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = (method: LogLevel): ((...parts: unknown[]) => void) => {
    const { console } = globalThis;
    const candidate: ((...parts: unknown[]) => void) | undefined = console[method];
    return (candidate ?? console.log).bind(console);
};

export const defaultLogWriter: LogWriter = (entry) => {
    const sink = bindConsole(entry.level);
    const line = `${toIsoTimestamp(entry.timestamp)} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
        sink(line, entry.context);
        return;
    }

    sink(line);
};

/** Writer that swallows everything; used by headless runs that print JSON to stdout. */
export const silentLogWriter: LogWriter = () => undefined;

export interface Logger {
    readonly debug: (message: string, context?: Record<string, unknown>) => void;
    readonly info: (message: string, context?: Record<string, unknown>) => void;
    readonly warn: (message: string, context?: Record<string, unknown>) => void;
    readonly error: (message: string, context?: Record<string, unknown>) => void;
    readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
    readonly writer?: LogWriter;
    readonly now?: NowFn;
    readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

const resolveDefaultLevel = (): LogLevel => {
    const candidate = typeof process !== 'undefined' ? process.env?.ORBITAL_LOG_LEVEL : undefined;
    if (candidate === 'debug' || candidate === 'info' || candidate === 'warn' || candidate === 'error') {
        return candidate;
    }
    return 'info';
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
    const writer = options.writer ?? defaultLogWriter;
    const now = options.now ?? Date.now;
    const minLevel = options.minLevel ?? resolveDefaultLevel();
    const normalized = sanitizeSubsystem(subsystem);

    const emitter = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
            return;
        }
        writer({
            level,
            subsystem: normalized,
            message,
            context,
            timestamp: now(),
        });
    };

    const child: Logger['child'] = (suffix) =>
        createLogger(`${normalized}:${sanitizeSubsystem(suffix)}`, { writer, now, minLevel });

    return {
        debug: emitter('debug'),
        info: emitter('info'),
        warn: emitter('warn'),
        error: emitter('error'),
        child,
    };
};

export const rootLogger = createLogger('sim');
