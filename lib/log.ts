//
// Logging goes to the console, levels below the configured one become
// no-ops so we don't pay for formatting packet dumps we never show
//
export const logLevels = ['debug', 'info', 'warning', 'error', 'critical'] as const;
export type LogLevel = (typeof logLevels)[number];

type LogFunction = (...args: unknown[]) => void;

export interface Log {
    debug: LogFunction;
    info: LogFunction;
    warn: LogFunction;
    error: LogFunction;
}

const noop: LogFunction = () => {};

export function isLogLevel(level: string): level is LogLevel {
    return logLevels.some((l) => l === level);
}

export function createLog(level: LogLevel): Log {
    const threshold = logLevels.indexOf(level);
    const enabled = (l: LogLevel) => logLevels.indexOf(l) >= threshold;

    return {
        debug: enabled('debug') ? console.debug.bind(console) : noop,
        info: enabled('info') ? console.log.bind(console) : noop,
        warn: enabled('warning') ? console.warn.bind(console) : noop,
        // critical still wants to know about errors
        error: console.error.bind(console)
    };
}

// For tests and anything that hasn't been handed a log
export const silentLog: Log = {debug: noop, info: noop, warn: noop, error: noop};
