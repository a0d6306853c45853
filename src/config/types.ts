import { z } from 'zod';

import {
    FallbackBehavior,
    OptionSchemaSet,
    OptionSpec,
    fallbackBehaviorSchema,
    optionSchemaSchema,
    optionValueSchema,
} from '@src/enumeration/types';

/**
 * `all`, a list of values, a split count, or a single value standing for a one-element list.
 */
export const optionSpecSchema = z
    .union([z.array(optionValueSchema), optionValueSchema])
    .transform((value): OptionSpec => {
        if (Array.isArray(value)) {
            return { kind: 'explicit', values: value };
        }
        if (value === 'all') {
            return { kind: 'all' };
        }
        if (typeof value === 'number') {
            return { kind: 'splits', count: value };
        }

        return { kind: 'explicit', values: [value] };
    });

export const gameConfigSchema = z.object({
    game: z.string().min(1),
    options: z
        .record(z.string(), optionSpecSchema)
        .nullish()
        .transform(v => v ?? {}),
    others: fallbackBehaviorSchema.default('default'),
    splits: z.number().int().nonnegative().optional(),
    ignore: z.array(z.string()).default([]),
    metadata: z.record(z.string(), z.unknown()).default({}),
});

export type GameConfig = z.infer<typeof gameConfigSchema>;

export const gameSchemaDocumentSchema = z.object({
    game: z.string().min(1),
    options: z.record(z.string(), optionSchemaSchema),
});

/**
 * Declared option schemas per game name.
 */
export type SchemaCatalog = ReadonlyMap<string, OptionSchemaSet>;

/**
 * CLI values, they take precedence over the configuration file.
 */
export type GameJobOverrides = {
    games?: string[];
    ignore?: string[];
    others?: FallbackBehavior;
    splits?: number;
};
