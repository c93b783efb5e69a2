import pino from 'pino';
import { loadSettings } from './settings';

let logger: pino.Logger | undefined;

export function createLogger(level = 'info', pretty = false): pino.Logger {
    if (logger) return logger;

    logger = pretty
        ? pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        })
        : pino({ level });

    return logger;
}

export function getLogger(): pino.Logger {
    if (logger) return logger;
    const settings = loadSettings();
    return createLogger(settings.logLevel, settings.prettyLogs);
}
