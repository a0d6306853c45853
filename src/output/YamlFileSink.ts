import fs from 'fs';
import path from 'path';

import { GameDocument } from '@src/enumeration/types';

import DocumentSink from './DocumentSink';
import { formatDocument, gameFileName } from './formatDocument';

/**
 * Streams every document of a game into `<dir>/<game>.yaml`, one YAML document each.
 *
 * Games whose names map to the same file name (`A B` and `A_B`) get numbered files
 * (`A_B.yaml`, `A_B_2.yaml`) so no game of the same sink replaces another one's output.
 */
export default class YamlFileSink implements DocumentSink {
    private fd: number | null = null;
    private readonly openedPaths = new Set<string>();

    constructor(private readonly dir: string) {}

    open(game: string): string {
        if (!fs.existsSync(this.dir)) {
            fs.mkdirSync(this.dir, { recursive: true });
        }

        const filePath = this.nextFreePath(gameFileName(game));
        this.fd = fs.openSync(filePath, 'w');
        this.openedPaths.add(filePath);

        return filePath;
    }

    write(document: GameDocument): void {
        if (this.fd === null) {
            throw new Error('YamlFileSink.write called before open');
        }
        fs.writeSync(this.fd, formatDocument(document));
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }

    private nextFreePath(baseName: string): string {
        let filePath = path.join(this.dir, `${baseName}.yaml`);

        for (let n = 2; this.openedPaths.has(filePath); n++) {
            filePath = path.join(this.dir, `${baseName}_${n}.yaml`);
        }

        return filePath;
    }
}
