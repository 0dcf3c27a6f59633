import winston from 'winston';
import { LOG_LEVEL, LOG_FILENAME } from './config';

const colors = {
    cyan: '\u001b[36m',
    end: '\u001b[0m',
};

const timestampFormat = (color = false): winston.Logform.Format => {
    return winston.format(function (info: winston.Logform.TransformableInfo) {
        const timestamp = `[${new Date().toISOString()}]`;
        info.level = color
            ? `${colors.cyan}${timestamp}${colors.end} ${info.level}`
            : `${timestamp} ${info.level}`;
        return info;
    })();
};

const logMsgFormat = (): winston.Logform.Format => {
    return winston.format(function (info: winston.Logform.TransformableInfo) {
        const message = JSON.stringify(info.message);
        if (message.startsWith('"') && message.endsWith('"')) {
            info.message = message.slice(1, -1);
        }
        return info;
    })();
};

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            timestampFormat(true),
            logMsgFormat(),
            winston.format.simple(),
        ),
    }),
];

if (LOG_FILENAME) {
    transports.push(
        new winston.transports.File({
            filename: LOG_FILENAME,
            format: winston.format.combine(
                timestampFormat(),
                logMsgFormat(),
                winston.format.simple(),
            ),
        }),
    );
}

const logger = winston.createLogger({
    level: LOG_LEVEL,
    transports,
});

const tagged = (tag: string) => {
    const prefix = `[${tag}]`;
    return {
        error: (message: string) => logger.error(`${prefix} ${message}`),
        warn: (message: string) => logger.warn(`${prefix} ${message}`),
        info: (message: string) => logger.info(`${prefix} ${message}`),
        verbose: (message: string) => logger.verbose(`${prefix} ${message}`),
        debug: (message: string) => logger.debug(`${prefix} ${message}`),
    };
};

export default logger;
export { tagged };
