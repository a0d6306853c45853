#!/usr/bin/env node
import '@src/loadEnv';

import { Command } from 'commander';
import { z } from 'zod';

import { formatZodError, loadGameJobs } from '@src/config/config-parser';
import { confirmAlways, confirmOnTerminal } from '@src/console/confirm';
import { DEFAULT_SIZE_THRESHOLD } from '@src/enumeration/countCombinations';
import { ConfigError } from '@src/enumeration/errors';
import { ConfirmLargeGame, RunSummary, runGameJobs } from '@src/enumeration/runGameJobs';
import { fallbackBehaviorSchema } from '@src/enumeration/types';
import { logger } from '@src/logger';
import YamlFileSink from '@src/output/YamlFileSink';

const listSchema = z
    .string()
    .optional()
    .transform(v =>
        v
            ?.split(',')
            .map(item => item.trim())
            .filter(item => item !== ''),
    );

const argsSchema = z.object({
    config: z.string(),
    schemas: z.string(),
    dir: z.string(),
    game: listSchema,
    ignore: listSchema,
    others: fallbackBehaviorSchema.optional(),
    splits: z.coerce.number().int().nonnegative().optional(),
    threshold: z.coerce.number().int().nonnegative(),
    yes: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    verbose: z.boolean().default(false),
});

export type EnumerateOptionsArgs = z.infer<typeof argsSchema>;

export type EnumerateOptionsProgramDeps = {
    confirm?: ConfirmLargeGame;
    onComplete?: (summary: RunSummary) => void;
};

export function createEnumerateOptionsProgram(deps: EnumerateOptionsProgramDeps = {}): Command {
    const program = new Command();

    program
        .name('enumerate-options')
        .description(
            'Writes one YAML document for every combination of the configured options of each game, ' +
                'into one file per game.',
        )
        .version('0.1.0')
        .requiredOption('-c, --config <path>', 'YAML file with one enumeration config per game')
        .requiredOption('--schemas <path>', 'YAML file with the declared option schemas of every game')
        .option('-d, --dir <path>', 'output directory for the generated files', '.')
        .option('-g, --game <names>', 'comma separated games to process, all configured games by default')
        .option('-i, --ignore <names>', 'comma separated options left out of every document')
        .option('--others <behavior>', 'fill non-enumerated options with: default | random | minimum | maximum')
        .option('-s, --splits <n>', 'split count for range options requested with "all"')
        .option('--threshold <n>', 'document count above which confirmation is required', `${DEFAULT_SIZE_THRESHOLD}`)
        .option('-y, --yes', 'generate games above the threshold without asking')
        .option('--dry-run', 'only resolve the options and report the document counts')
        .option('-v, --verbose', 'log every resolved option')
        .action(async opts => {
            const summary = await enumerateOptions(parseArgs(opts), deps.confirm);
            deps.onComplete?.(summary);
        });

    return program;
}

if (require.main === module) {
    createEnumerateOptionsProgram({
        onComplete: summary => {
            if (summary.failed.length > 0) {
                process.exitCode = 1;
            }
        },
    })
        .parseAsync(process.argv)
        .catch(e => {
            logger.error(e instanceof ConfigError ? e.toString() : e);
            process.exitCode = 1;
        });
}

export function parseArgs(opts: unknown): EnumerateOptionsArgs {
    const parsed = argsSchema.safeParse(opts);
    if (!parsed.success) {
        throw new ConfigError(`Invalid arguments: ${formatZodError(parsed.error)}`);
    }

    return parsed.data;
}

export async function enumerateOptions(
    args: EnumerateOptionsArgs,
    confirm: ConfirmLargeGame = confirmOnTerminal,
): Promise<RunSummary> {
    if (args.verbose) {
        logger.level = 'debug';
    }
    logger.debug('Running with args %o', args);

    const { entries, missing } = loadGameJobs(args.config, args.schemas, {
        games: args.game,
        ignore: args.ignore,
        others: args.others,
        splits: args.splits,
    });

    for (const game of missing) {
        logger.warn('Game %s is not in the configuration %s', game, args.config);
    }

    return runGameJobs(entries, {
        sink: new YamlFileSink(args.dir),
        confirm: args.yes ? confirmAlways : confirm,
        threshold: args.threshold,
        dryRun: args.dryRun,
        logger: logger,
    });
}
