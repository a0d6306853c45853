import { buildDocument } from '../../../src/enumeration/buildDocument';
import { formGameJob } from '../../__utils/schemas';

describe('buildDocument', () => {
    it('should fill every non-enumerated option with its default', () => {
        const job = formGameJob({ metadata: { author: 'tester' } });

        expect(buildDocument(job, { goal: 'escape' }, 3)).toEqual({
            name: 'Test Game3',
            description: 'Test Game3',
            game: 'Test Game',
            metadata: { author: 'tester' },
            options: {
                goal: 'escape',
                difficulty: 'normal',
                item_count: 5,
                deathlink: false,
                seed_name: 'test-seed',
            },
        });
    });

    it('should list the options in declaration order whatever the combination order', () => {
        const document = buildDocument(formGameJob(), { deathlink: true, goal: 'escape' }, 1);

        expect(Object.keys(document.options)).toEqual(['goal', 'difficulty', 'item_count', 'deathlink', 'seed_name']);
        expect(document.options.deathlink).toBe(true);
    });

    it('should apply the maximum fallback to the remaining options', () => {
        const document = buildDocument(formGameJob({ behavior: 'maximum' }), { difficulty: 'easy' }, 1);

        expect(document.options).toEqual({
            goal: 'escape',
            difficulty: 'easy',
            item_count: 10,
            deathlink: true,
            seed_name: 'test-seed',
        });
    });

    it('should draw random fallbacks from the given rng', () => {
        const document = buildDocument(formGameJob({ behavior: 'random' }), {}, 1, () => 0);

        expect(document.options).toEqual({
            goal: 'beat_boss',
            difficulty: 'easy',
            item_count: 0,
            deathlink: true,
            seed_name: 'test-seed',
        });
    });

    it('should not share the metadata object between documents', () => {
        const job = formGameJob({ metadata: { author: 'tester' } });

        const first = buildDocument(job, {}, 1);
        const second = buildDocument(job, {}, 2);

        expect(first.metadata).toEqual(second.metadata);
        expect(first.metadata).not.toBe(second.metadata);
        expect(second.name).toBe('Test Game2');
    });
});
