import { logger } from '../../../src/logger';
import ArrayTransport from '../../../src/logger/transports/ArrayTransport';
import { flushLogs, sanitizeLogs } from '../../__utils/logs';

describe('logger', () => {
    let logs: string[] = [];

    beforeEach(() => {
        logs = [];
        logger.level = 'info';
        logger.clear().add(new ArrayTransport({ array: logs }));
    });

    it('should format lines with a timestamp and the upper case level', async () => {
        logger.info('Wrote %d documents to %s', 24, 'Gem_Quest.yaml');
        await flushLogs();

        expect(logs).toHaveLength(1);
        expect(logs[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[INFO\]: Wrote 24 documents to Gem_Quest.yaml$/);
        expect(sanitizeLogs(logs)).toEqual(['[INFO]: Wrote 24 documents to Gem_Quest.yaml']);
    });

    it('should print the stack of errors', async () => {
        logger.error(new Error('boom'));
        await flushLogs();

        expect(sanitizeLogs(logs)[0].startsWith('[ERROR]: Error: boom\n    at ')).toBe(true);
    });
});

describe('ArrayTransport', () => {
    it('should keep only the last lines when limited', async () => {
        const logs: string[] = [];
        logger.clear().add(new ArrayTransport({ array: logs, limit: 2 }));

        logger.info('first');
        logger.info('second');
        logger.info('third');
        await flushLogs();

        expect(sanitizeLogs(logs)).toEqual(['[INFO]: second', '[INFO]: third']);
    });
});
