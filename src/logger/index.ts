import { createLogger, format, transports } from 'winston';

const IS_TEST_ENV = !!process.env.JEST_WORKER_ID;

/**
 * File logging is opt-in: set LOG_FILE_DIR to also write every run into a timestamped file there.
 */
const logFileDir = IS_TEST_ENV ? undefined : process.env.LOG_FILE_DIR;

export const logger = createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: format.combine(
        format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
        }),
        format.errors({ stack: true }),
        format.splat(),
        format.printf(({ timestamp, level, message, stack }) => {
            return `${timestamp} [${level.toUpperCase()}]: ${stack || message}`;
        }),
    ),
    transports: [
        new transports.Console(),
        ...(logFileDir ? [new transports.File({ dirname: logFileDir, filename: `${getTimestamp()}.log` })] : []),
    ],
});

// yyyy-mm-dd-hh-mm-ss
function getTimestamp(): string {
    const now = new Date();

    const pad = (num: number) => String(num).padStart(2, '0');

    return (
        `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
        `-${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`
    );
}
