/**
 * Scoped diagnostic output.
 *
 * All diagnostics go to stderr as `[scope] message` lines so stdout stays free
 * for anything a caller may want to pipe.
 */

export interface LogSink {
    write(chunk: string): unknown;
}

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export function createLogger(scope: string, sink: LogSink = process.stderr): Logger {
    const line = (prefix: string, message: string) => {
        sink.write(`[${scope}] ${prefix}${message}\n`);
    };
    return {
        info: (message) => line('', message),
        warn: (message) => line('warning: ', message),
        error: (message) => line('error: ', message),
    };
}
