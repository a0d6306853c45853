import os from 'os';

import TransportStream from 'winston-transport';

const MESSAGE = Symbol.for('message');

const defaultMaxListeners = 30;

interface ArrayTransportOptions extends TransportStream.TransportStreamOptions {
    array?: string[];
    eol?: string;
    /**
     * Keeps only the last `limit` lines.
     */
    limit?: number;
    maxListeners?: number;
}

/**
 * Collects the formatted log lines in memory, used to assert on logs in tests.
 */
export default class ArrayTransport extends TransportStream {
    readonly array: string[];
    private readonly eol: string;
    private readonly limit?: number;

    constructor(options: ArrayTransportOptions = {}) {
        super(options);

        this.array = options.array ?? [];
        this.eol = options.eol ?? os.EOL;
        this.limit = options.limit;
        this.setMaxListeners(options.maxListeners ?? defaultMaxListeners);
    }

    log(info: Record<string | symbol, unknown>, callback: () => void): void {
        setImmediate(() => {
            this.emit('logged', info);
        });

        const formatted = info[MESSAGE];
        const line = typeof formatted === 'string' ? formatted : String(info.message);

        this.array.push(line.endsWith(this.eol) ? line.slice(0, -this.eol.length) : line);
        if (this.limit && this.array.length > this.limit) {
            this.array.shift();
        }

        callback();
    }
}
