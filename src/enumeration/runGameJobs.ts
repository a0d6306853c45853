import { Logger } from 'winston';

import { GameJobEntry } from '@src/config/config-parser';
import { logger as defaultLogger } from '@src/logger';
import { createGameLogger } from '@src/logger/createPrefixedLogger';
import DocumentSink from '@src/output/DocumentSink';
import { RandomSource } from '@src/utils/data/data';

import { buildDocument } from './buildDocument';
import { enumerateCombinations } from './combinationGenerator';
import { DEFAULT_SIZE_THRESHOLD, checkSize, countCombinations } from './countCombinations';
import { EnumerationError, SinkError, SizeThresholdExceeded } from './errors';
import { resolveGameOptions } from './resolveGameOptions';
import { GameJob, ResolvedOptionSets } from './types';

/**
 * Resolves to true when the operator accepts generating more documents than the threshold.
 */
export type ConfirmLargeGame = (exceeded: SizeThresholdExceeded) => Promise<boolean>;

export interface RunGameJobsOptions {
    sink: DocumentSink;
    confirm: ConfirmLargeGame;
    threshold?: number;
    /**
     * Only resolve and count, nothing is written.
     */
    dryRun?: boolean;
    logger?: Logger;
    rng?: RandomSource;
}

export type GeneratedGame = {
    game: string;
    documents: number;
    /**
     * null on dry runs
     */
    destination: string | null;
};

export type SkippedGame = {
    game: string;
    total: number;
    threshold: number;
};

export type FailedGame = {
    game: string;
    option?: string;
    error: EnumerationError;
};

export type RunSummary = {
    generated: GeneratedGame[];
    skipped: SkippedGame[];
    failed: FailedGame[];
};

type GameOutcome =
    | {
          status: 'generated';
          generated: GeneratedGame;
      }
    | {
          status: 'skipped';
          skipped: SkippedGame;
      };

/**
 * Processes the games one after another. A game failing with an {@link EnumerationError},
 * including a {@link SinkError} from the output, is logged and recorded in the summary
 * while the remaining games still run.
 */
export async function runGameJobs(entries: GameJobEntry[], options: RunGameJobsOptions): Promise<RunSummary> {
    const logger = options.logger ?? defaultLogger;
    const summary: RunSummary = {
        generated: [],
        skipped: [],
        failed: [],
    };

    for (const entry of entries) {
        const gameLogger = createGameLogger(logger, entry.game);

        try {
            if ('error' in entry) {
                throw entry.error;
            }

            const outcome = await runGameJob(entry.job, options, gameLogger);
            if (outcome.status === 'generated') {
                summary.generated.push(outcome.generated);
            } else {
                summary.skipped.push(outcome.skipped);
            }
        } catch (e) {
            if (!(e instanceof EnumerationError)) {
                throw e;
            }
            if (e.game === undefined) {
                e.game = entry.game;
            }

            gameLogger.error('%s', e.toString());
            summary.failed.push({ game: entry.game, option: e.option, error: e });
        }
    }

    logger.info(
        'Processed %d games: %d generated, %d skipped, %d failed',
        entries.length,
        summary.generated.length,
        summary.skipped.length,
        summary.failed.length,
    );

    return summary;
}

async function runGameJob(job: GameJob, options: RunGameJobsOptions, logger: Logger): Promise<GameOutcome> {
    const sets = resolveGameOptions(job);
    for (const [name, values] of sets) {
        logger.debug('Option %s resolved to %o', name, values);
    }

    const total = countCombinations(sets);
    logger.info(
        '%d combinations from %d enumerated options, others filled by %s',
        total,
        sets.size,
        job.behavior,
    );

    if (options.dryRun) {
        return {
            status: 'generated',
            generated: { game: job.game, documents: total, destination: null },
        };
    }

    const threshold = options.threshold ?? DEFAULT_SIZE_THRESHOLD;
    const verdict = checkSize(total, threshold, job.game);
    if (verdict.action === 'abort') {
        logger.warn('%s', verdict.exceeded.message);

        if (!(await options.confirm(verdict.exceeded))) {
            logger.warn('Skipped, generation was declined');

            return {
                status: 'skipped',
                skipped: { game: job.game, total, threshold },
            };
        }
    }

    const { destination, written } = writeDocuments(job, sets, options, logger);

    logger.info('Wrote %d documents to %s', written, destination);

    return {
        status: 'generated',
        generated: { game: job.game, documents: written, destination },
    };
}

/**
 * Streams every combination into the sink. Sink failures become a {@link SinkError} of this game.
 */
function writeDocuments(
    job: GameJob,
    sets: ResolvedOptionSets,
    options: RunGameJobsOptions,
    logger: Logger,
): { destination: string; written: number } {
    const { sink } = options;

    let destination: string;
    try {
        destination = sink.open(job.game);
    } catch (e) {
        throw new SinkError(`Could not open the output: ${errorMessage(e)}`, { game: job.game, cause: e });
    }

    let written = 0;
    let completed = false;
    try {
        for (const combination of enumerateCombinations(sets)) {
            const document = buildDocument(job, combination, written + 1, options.rng);

            try {
                sink.write(document);
            } catch (e) {
                throw new SinkError(`Could not write ${document.name}: ${errorMessage(e)}`, {
                    game: job.game,
                    cause: e,
                });
            }
            written++;
        }
        completed = true;
    } finally {
        closeSink(job, sink, completed, logger);
    }

    return { destination, written };
}

/**
 * After a failed write the write error is the one reported, a close failure is only logged.
 */
function closeSink(job: GameJob, sink: DocumentSink, completed: boolean, logger: Logger): void {
    try {
        sink.close();
    } catch (e) {
        if (completed) {
            throw new SinkError(`Could not close the output: ${errorMessage(e)}`, { game: job.game, cause: e });
        }
        logger.warn('Could not close the output: %s', errorMessage(e));
    }
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
