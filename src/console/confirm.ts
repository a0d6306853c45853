import readline from 'readline';

import { SizeThresholdExceeded } from '@src/enumeration/errors';

/**
 * Asks on the terminal whether a game above the size threshold should still be generated.
 * Anything but y/yes, including a closed stdin, declines.
 */
export function confirmOnTerminal(
    exceeded: SizeThresholdExceeded,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
    const rl = readline.createInterface({ input, output });

    return new Promise<boolean>(resolve => {
        let answered = false;

        rl.on('close', () => {
            if (!answered) {
                resolve(false);
            }
        });

        rl.question(`${exceeded.message}. Continue? [y/N] `, answer => {
            answered = true;
            resolve(isYes(answer));
            rl.close();
        });
    });
}

export function isYes(answer: string): boolean {
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

export const confirmAlways = async (): Promise<boolean> => true;
