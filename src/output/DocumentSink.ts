import { GameDocument } from '@src/enumeration/types';

/**
 * Receives the documents of one game at a time: `open`, any number of `write`, then `close`.
 */
export default interface DocumentSink {
    /**
     * @returns where the documents of this game end up
     */
    open(game: string): string;
    write(document: GameDocument): void;
    close(): void;
}
