export interface Logger {
    debug(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
}

export const silentLogger: Logger = {
    debug() { },
    warn() { },
    error() { }
};

export function consoleLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        debug(message) {
            console.debug(prefix, message);
        },
        warn(message) {
            console.warn(prefix, message);
        },
        error(message, error) {
            if (error === undefined) {
                console.error(prefix, message);
            } else {
                console.error(prefix, message, error);
            }
        }
    };
}
