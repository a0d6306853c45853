import { GameDocument } from '@src/enumeration/types';

import DocumentSink from './DocumentSink';

export default class MemoryDocumentSink implements DocumentSink {
    readonly documents: Map<string, GameDocument[]> = new Map();
    private current: GameDocument[] | null = null;

    open(game: string): string {
        this.current = [];
        this.documents.set(game, this.current);

        return `memory://${game}`;
    }

    write(document: GameDocument): void {
        if (!this.current) {
            throw new Error('MemoryDocumentSink.write called before open');
        }
        this.current.push(document);
    }

    close(): void {
        this.current = null;
    }
}
