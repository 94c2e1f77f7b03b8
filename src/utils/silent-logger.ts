/**
 * Stderr Logger - Logger configured to write only to stderr
 *
 * stdout belongs to the MCP protocol when the switchboard runs as `serve`, so
 * every diagnostic line goes to stderr. When the ink operator console owns the
 * terminal (CONSOLE_MODE=true) all output is swallowed instead.
 */

import winston from 'winston';
import _ from 'lodash';

type LogFields = Record<string, unknown>;

/**
 * Structured logger surface used throughout the codebase:
 * `logger.info({ serverName }, 'message')` or `logger.info('message')`.
 */
export interface Logger {
    debug(infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): Logger
    info(infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): Logger
    warn(infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): Logger
    error(infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): Logger
    log(level: string, infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): Logger
}

/**
 * No-op logger used while the operator console is rendering
 */
class SilentLogger implements Logger {
    debug(..._args: unknown[]): Logger {
        return this;
    }

    info(..._args: unknown[]): Logger {
        return this;
    }

    warn(..._args: unknown[]): Logger {
        return this;
    }

    error(..._args: unknown[]): Logger {
        return this;
    }

    log(..._args: unknown[]): Logger {
        return this;
    }
}

/**
 * Create a winston logger that writes ALL output to stderr
 */
function createStderrLogger(): Logger {
    const winstonLogger = winston.createLogger({
        level:  process.env.LOG_LEVEL ?? 'info',
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'debug'],
            }),
        ],
    });

    const write = (level: string, infoObjectOrMessage: LogFields | string, messageOrMeta?: string, ...meta: unknown[]): void => {
        if(_.isString(infoObjectOrMessage)) {
            winstonLogger.log(level, infoObjectOrMessage, messageOrMeta, ...meta);
        } else {
            winstonLogger.log(level, messageOrMeta ?? '', infoObjectOrMessage);
        }
    };

    const stderrLogger: Logger = {
        debug(infoObjectOrMessage, messageOrMeta, ...meta) {
            write('debug', infoObjectOrMessage, messageOrMeta, ...meta);
            return stderrLogger;
        },
        info(infoObjectOrMessage, messageOrMeta, ...meta) {
            write('info', infoObjectOrMessage, messageOrMeta, ...meta);
            return stderrLogger;
        },
        warn(infoObjectOrMessage, messageOrMeta, ...meta) {
            write('warn', infoObjectOrMessage, messageOrMeta, ...meta);
            return stderrLogger;
        },
        error(infoObjectOrMessage, messageOrMeta, ...meta) {
            write('error', infoObjectOrMessage, messageOrMeta, ...meta);
            return stderrLogger;
        },
        log(level, infoObjectOrMessage, messageOrMeta, ...meta) {
            write(level, infoObjectOrMessage, messageOrMeta, ...meta);
            return stderrLogger;
        },
    };

    return stderrLogger;
}

// Created once at module load
const silentLogger: Logger = new SilentLogger();
const stderrLogger: Logger = createStderrLogger();

/**
 * Picks the logger for the current environment. Called on every log call so
 * that CONSOLE_MODE toggled after module load is honoured.
 */
function getLogger(): Logger {
    return process.env.CONSOLE_MODE === 'true' ? silentLogger : stderrLogger;
}

/**
 * Logger whose every method resolves the concrete logger at call time
 */
function createLazyLogger(): Logger {
    const lazy: Logger = {
        debug: (...args) => {
            getLogger().debug(...args);
            return lazy;
        },
        info: (...args) => {
            getLogger().info(...args);
            return lazy;
        },
        warn: (...args) => {
            getLogger().warn(...args);
            return lazy;
        },
        error: (...args) => {
            getLogger().error(...args);
            return lazy;
        },
        log: (...args) => {
            getLogger().log(...args);
            return lazy;
        },
    };
    return lazy;
}

// The recommended logger throughout the codebase
export const dynamicLogger: Logger = createLazyLogger();

export { stderrLogger };
