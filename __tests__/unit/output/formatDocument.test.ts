import { GameDocument } from '../../../src/enumeration/types';
import { formatDocument, gameFileName, toHostDocument } from '../../../src/output/formatDocument';

const document: GameDocument = {
    name: 'Gem Quest1',
    description: 'Gem Quest1',
    game: 'Gem Quest',
    metadata: { author: 'tester' },
    options: {
        goal: 'beat_boss',
        item_count: 0,
        deathlink: false,
    },
};

describe('toHostDocument', () => {
    it('should put the header first, the metadata next and the options under the game name', () => {
        const host = toHostDocument(document);

        expect(Object.keys(host)).toEqual(['name', 'description', 'game', 'author', 'Gem Quest']);
        expect(host['Gem Quest']).toEqual(document.options);
    });

    it('should not let metadata replace the header or the options', () => {
        const host = toHostDocument({
            ...document,
            metadata: { name: 'other', game: 'Other Game', 'Gem Quest': 'nothing', requires: { version: '0.5.0' } },
        });

        expect(host).toEqual({
            name: 'Gem Quest1',
            description: 'Gem Quest1',
            game: 'Gem Quest',
            requires: { version: '0.5.0' },
            'Gem Quest': document.options,
        });
    });
});

describe('formatDocument', () => {
    it('should write a YAML document closed by a separator', () => {
        expect(formatDocument(document)).toBe(
            [
                'name: Gem Quest1',
                'description: Gem Quest1',
                'game: Gem Quest',
                'author: tester',
                'Gem Quest:',
                '  goal: beat_boss',
                '  item_count: 0',
                '  deathlink: false',
                '---',
                '',
            ].join('\n'),
        );
    });
});

describe('gameFileName', () => {
    it.each([
        ['Gem Quest', 'Gem_Quest'],
        ['  Star   Runner ', 'Star_Runner'],
        ['Half/Life: 2', 'Half_Life__2'],
        ['Solo', 'Solo'],
    ])('should turn %p into %p', (game, expected) => {
        expect(gameFileName(game)).toBe(expected);
    });
});
