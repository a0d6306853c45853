import { Logger } from 'winston';

export interface GameContext {
    game: string;
}

const LOG_LEVELS = ['info', 'error', 'warn', 'debug', 'verbose', 'silly'];

/**
 * Child logger whose string messages start with a prefix built from the context,
 * e.g. `[Some Game] resolved 3 options`. The context is also attached as metadata.
 */
export const createPrefixedLogger = <T extends object>(
    parentLogger: Logger,
    context: T,
    buildPrefix: (context: T) => string,
): Logger => {
    const child = parentLogger.child(context);
    const prefix = buildPrefix(context);

    return new Proxy(child, {
        get(target, prop, receiver) {
            if (typeof prop === 'string' && LOG_LEVELS.includes(prop)) {
                const method: unknown = Reflect.get(target, prop, receiver);
                if (typeof method !== 'function') {
                    return method;
                }

                return (message: unknown, ...args: unknown[]) =>
                    method.call(target, typeof message === 'string' ? `${prefix}${message}` : message, ...args);
            }

            // logger.log('info', 'msg')
            if (prop === 'log') {
                return (level: string, message: unknown, ...args: unknown[]) =>
                    target.log(level, typeof message === 'string' ? `${prefix}${message}` : String(message), ...args);
            }

            return Reflect.get(target, prop, receiver);
        },
    });
};

export const createGameLogger = (parentLogger: Logger, game: string): Logger =>
    createPrefixedLogger<GameContext>(parentLogger, { game }, c => `[${c.game}] `);
