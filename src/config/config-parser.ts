import fs from 'fs';

import { parseAllDocuments } from 'yaml';
import { z } from 'zod';

import { ConfigError, EnumerationError, InvalidSpecError, SchemaLookupError } from '@src/enumeration/errors';
import { DEFAULT_SPLITS } from '@src/enumeration/sampleSplits';
import { GameJob, OptionSchemaSet } from '@src/enumeration/types';

import { GameConfig, GameJobOverrides, SchemaCatalog, gameConfigSchema, gameSchemaDocumentSchema } from './types';

export type GameConfigResult =
    | {
          game: string;
          config: GameConfig;
      }
    | {
          game: string;
          error: EnumerationError;
      };

export type GameJobEntry =
    | {
          game: string;
          job: GameJob;
      }
    | {
          game: string;
          error: EnumerationError;
      };

export type LoadedGameJobs = {
    entries: GameJobEntry[];
    /**
     * Games asked for on the command line that the configuration does not contain.
     */
    missing: string[];
};

export function loadGameJobs(configPath: string, schemasPath: string, overrides: GameJobOverrides = {}): LoadedGameJobs {
    const configs = parseEnumerationConfig(readTextFile(configPath), configPath);
    const catalog = parseSchemaCatalog(readTextFile(schemasPath), schemasPath);

    return createGameJobs(configs, catalog, overrides);
}

/**
 * Parses a YAML stream with one game configuration per document.
 * A document that fails validation only fails its own game. A document without a usable
 * game name, or with broken YAML, fails under the label `document <n>`.
 */
export function parseEnumerationConfig(text: string, source: string): GameConfigResult[] {
    const seen = new Set<string>();

    return parseYamlStream(text).map((document): GameConfigResult => {
        const label = `document ${document.index}`;

        if ('error' in document) {
            return {
                game: label,
                error: new InvalidSpecError(`${source}: YAML error in ${label}: ${document.error}`, { game: label }),
            };
        }

        const raw = document.value;
        const game = isRecord(raw) && typeof raw.game === 'string' && raw.game !== '' ? raw.game : undefined;
        if (game === undefined) {
            return {
                game: label,
                error: new InvalidSpecError(`${source}: ${label} has no "game" name`, { game: label }),
            };
        }

        if (seen.has(game)) {
            return { game, error: new InvalidSpecError('The game is configured more than once', { game }) };
        }
        seen.add(game);

        const parsed = gameConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const [issue] = parsed.error.issues;
            const option = issue.path[0] === 'options' && issue.path.length > 1 ? String(issue.path[1]) : undefined;

            return { game, error: new InvalidSpecError(formatZodError(parsed.error), { game, option }) };
        }

        return { game, config: parsed.data };
    });
}

/**
 * Parses a YAML stream with the declared option schemas of one game per document.
 */
export function parseSchemaCatalog(text: string, source: string): SchemaCatalog {
    const catalog = new Map<string, OptionSchemaSet>();

    for (const document of parseYamlStream(text)) {
        if ('error' in document) {
            throw new ConfigError(`${source}: YAML error in schema document ${document.index}: ${document.error}`);
        }

        const parsed = gameSchemaDocumentSchema.safeParse(document.value);
        if (!parsed.success) {
            throw new ConfigError(
                `${source}: schema document ${document.index} is invalid: ${formatZodError(parsed.error)}`,
            );
        }

        const { game, options } = parsed.data;
        if (catalog.has(game)) {
            throw new ConfigError(`${source}: game "${game}" is declared more than once`);
        }
        catalog.set(game, new Map(Object.entries(options)));
    }

    return catalog;
}

/**
 * Precedence is CLI overrides > configuration file > defaults.
 */
export function createGameJobs(
    configs: GameConfigResult[],
    catalog: SchemaCatalog,
    overrides: GameJobOverrides = {},
): LoadedGameJobs {
    const requested = overrides.games;
    const selected = requested ? configs.filter(c => requested.includes(c.game)) : configs;

    return {
        entries: selected.map(result => ('error' in result ? result : createGameJob(result.config, catalog, overrides))),
        missing: requested ? requested.filter(game => !configs.some(c => c.game === game)) : [],
    };
}

function createGameJob(config: GameConfig, catalog: SchemaCatalog, overrides: GameJobOverrides): GameJobEntry {
    const game = config.game;
    const declared = catalog.get(game);
    if (!declared) {
        return { game, error: new SchemaLookupError('No option schema is declared for this game', { game }) };
    }

    const ignored = new Set([...config.ignore, ...(overrides.ignore ?? [])]);

    return {
        game,
        job: {
            game,
            schemas: new Map([...declared].filter(([name]) => !ignored.has(name))),
            specs: new Map(Object.entries(config.options).filter(([name]) => !ignored.has(name))),
            behavior: overrides.others ?? config.others,
            splits: overrides.splits ?? config.splits ?? DEFAULT_SPLITS,
            metadata: config.metadata,
        },
    };
}

type YamlStreamDocument =
    | {
          index: number;
          value: unknown;
      }
    | {
          index: number;
          error: string;
      };

/**
 * Splits a YAML stream into its documents, numbered from 1. Broken documents are reported
 * one by one so the valid ones around them stay usable.
 */
function parseYamlStream(text: string): YamlStreamDocument[] {
    const documents: YamlStreamDocument[] = [];
    let index = 0;

    for (const document of parseAllDocuments(text)) {
        index++;
        if (document.errors.length > 0) {
            documents.push({ index, error: document.errors[0].message });
            continue;
        }

        const value: unknown = document.toJS();
        // a trailing `---` leaves an empty document behind
        if (value !== null && value !== undefined) {
            documents.push({ index, value });
        }
    }

    return documents;
}

function readTextFile(filePath: string): string {
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`File not found: ${filePath}`);
    }

    return fs.readFileSync(filePath).toString();
}

export function formatZodError(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
