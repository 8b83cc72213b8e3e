/**
 * Diagnostics sink handed to every build step through the BuildContext.
 */
export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface ConsoleLoggerOptions {
    debug?: boolean;
    prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const prefix = options.prefix ? `${options.prefix} ` : '';
    return {
        debug: (message) => {
            if (options.debug) console.debug(`${prefix}${message}`);
        },
        info: (message) => console.log(`${prefix}${message}`),
        warn: (message) => console.warn(`${prefix}${message}`),
        error: (message) => console.error(`${prefix}${message}`)
    };
}

export const consoleLogger: Logger = createConsoleLogger({
    debug: process.env['BUILDPILOT_DEBUG'] === 'true'
});
