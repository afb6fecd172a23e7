import pino from 'pino';
import { logLevel } from './env';

import { getItemLabel } from './context';

const pinoLogger = pino({
    level: logLevel,
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogFn = (msg: string | object, text?: string) => void;

export type Logger = Record<Level, LogFn>;

function wrapLogMethod(level: Level): LogFn {
    return (msg: string | object, text?: string) => {
        const itemLabel = getItemLabel();
        if (typeof msg === 'string') {
            pinoLogger[level](itemLabel ? `[${itemLabel}] ${msg}` : msg);
        } else {
            pinoLogger[level](itemLabel ? { ...msg, item: itemLabel } : msg, text);
        }
    };
}

const logger: Logger = {
    trace: wrapLogMethod('trace'),
    debug: wrapLogMethod('debug'),
    info: wrapLogMethod('info'),
    warn: wrapLogMethod('warn'),
    error: wrapLogMethod('error'),
    fatal: wrapLogMethod('fatal'),
};

export default logger;
