// src/infrastructure/logger/index.ts
import winston from 'winston';
import { AppConfig } from '../../config';

export const LOGGER_TOKEN = Symbol.for('AppLogger');

type LoggerOptions = Pick<AppConfig, 'nodeEnv' | 'logLevel'>;

/**
 * Creates the application logger. Timestamped text in development,
 * JSON in production. Everything goes to stderr so that a printed
 * ledger on stdout stays clean.
 */
export const createAppLogger = (options: LoggerOptions): winston.Logger => {
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }), // Log stack traces
        options.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message} ${info.stack ? `\n${info.stack}` : ''}`)
    );

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: options.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: options.logLevel,
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        }),
    ];

    const logger = winston.createLogger({
        level: options.logLevel,
        format: logFormat,
        transports: transports,
        exitOnError: false,
    });

    logger.debug(`Logger initialized in ${options.nodeEnv} mode (Level: ${options.logLevel}).`);
    return logger;
};

/** A logger that discards everything; used by tests. */
export const createSilentLogger = (): winston.Logger => winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
});
