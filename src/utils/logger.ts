import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Process-wide logger. The CLI configures it once via `initLogger()`;
 * library code asks for it lazily so that configuration takes effect.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger. JSON lines when `jsonLogs` is set,
 * otherwise pretty output on stderr through pino-pretty.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance, creating an info-level one on first use.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}

/**
 * Child logger tagged with the emitting component.
 */
export function getComponentLogger(component: string): pino.Logger {
    return getLogger().child({ component });
}
