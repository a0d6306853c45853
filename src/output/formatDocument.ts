import { stringify } from 'yaml';

import { GameDocument } from '@src/enumeration/types';

export const DOCUMENT_SEPARATOR = '---\n';

const RESERVED_KEYS = ['name', 'description', 'game'];

/**
 * Lays a document out the way the host application reads it:
 * name, description and game first, then the metadata, then the options under the game's name.
 */
export function toHostDocument(document: GameDocument): Record<string, unknown> {
    const host: Record<string, unknown> = {
        name: document.name,
        description: document.description,
        game: document.game,
    };

    for (const [key, value] of Object.entries(document.metadata)) {
        if (!RESERVED_KEYS.includes(key) && key !== document.game) {
            host[key] = value;
        }
    }

    host[document.game] = document.options;

    return host;
}

export function formatDocument(document: GameDocument): string {
    return stringify(toHostDocument(document)) + DOCUMENT_SEPARATOR;
}

/**
 * "A Link to the Past" -> "A_Link_to_the_Past"
 */
export function gameFileName(game: string): string {
    return game
        .trim()
        .split(/\s+/)
        .join('_')
        .replace(/[\\/:*?"<>|]/g, '_');
}
