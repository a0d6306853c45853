import { z } from 'zod';

export const optionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type OptionValue = z.infer<typeof optionValueSchema>;

const toggleOptionSchema = z.object({
    type: z.literal('toggle'),
    default: z.boolean().default(false),
});

const choiceOptionSchema = z.object({
    type: z.literal('choice'),
    choices: z.array(z.string()).nonempty(),
    /**
     * The first declared choice when omitted.
     */
    default: z.string().optional(),
});

const rangeOptionSchema = z.object({
    type: z.literal('range'),
    min: z.number().finite(),
    max: z.number().finite(),
    /**
     * The range minimum when omitted.
     */
    default: z.number().finite().optional(),
    integer: z.boolean().default(true),
});

const namedRangeOptionSchema = rangeOptionSchema.extend({
    type: z.literal('named_range'),
    special: z.record(z.string(), z.number().finite()).default({}),
});

const textOptionSchema = z.object({
    type: z.literal('text'),
    default: z.string().default(''),
});

export const optionSchemaSchema = z
    .discriminatedUnion('type', [
        toggleOptionSchema,
        choiceOptionSchema,
        rangeOptionSchema,
        namedRangeOptionSchema,
        textOptionSchema,
    ])
    .superRefine((schema, ctx) => {
        if (schema.type === 'choice') {
            if (new Set(schema.choices).size !== schema.choices.length) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['choices'], message: 'choices must be unique' });
            }
            if (schema.default !== undefined && !schema.choices.includes(schema.default)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['default'],
                    message: `default "${schema.default}" is not one of the declared choices`,
                });
            }
        }

        if (schema.type === 'range' || schema.type === 'named_range') {
            if (schema.min > schema.max) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['min'],
                    message: `min ${schema.min} is greater than max ${schema.max}`,
                });
            }
            if (schema.integer && (!Number.isInteger(schema.min) || !Number.isInteger(schema.max))) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['integer'],
                    message: 'integer ranges need integer bounds',
                });
            }
            const specials = schema.type === 'named_range' ? Object.values(schema.special) : [];
            if (
                schema.default !== undefined &&
                (schema.default < schema.min || schema.default > schema.max) &&
                !specials.includes(schema.default)
            ) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['default'],
                    message: `default ${schema.default} is outside [${schema.min}, ${schema.max}]`,
                });
            }
        }
    });

export type OptionSchema = z.infer<typeof optionSchemaSchema>;
export type ToggleOptionSchema = z.infer<typeof toggleOptionSchema>;
export type ChoiceOptionSchema = z.infer<typeof choiceOptionSchema>;
export type RangeOptionSchema = z.infer<typeof rangeOptionSchema> | z.infer<typeof namedRangeOptionSchema>;

/**
 * Declared options of one game, iterated in declaration order.
 */
export type OptionSchemaSet = ReadonlyMap<string, OptionSchema>;

export type OptionSpec =
    | {
          kind: 'all';
      }
    | {
          kind: 'explicit';
          values: OptionValue[];
      }
    | {
          kind: 'splits';
          count: number;
      };

/**
 * Ordered candidate values of one option, never empty and without duplicates.
 */
export type ResolvedOptionSet = readonly OptionValue[];

export type ResolvedOptionSets = ReadonlyMap<string, ResolvedOptionSet>;

export type Combination = Readonly<Record<string, OptionValue>>;

export const fallbackBehaviors = ['default', 'random', 'minimum', 'maximum'] as const;

export const fallbackBehaviorSchema = z.enum(fallbackBehaviors);

export type FallbackBehavior = z.infer<typeof fallbackBehaviorSchema>;

export interface GameJob {
    game: string;
    schemas: OptionSchemaSet;
    specs: ReadonlyMap<string, OptionSpec>;
    behavior: FallbackBehavior;
    /**
     * Split count used for range options requested with "all".
     */
    splits: number;
    metadata: Readonly<Record<string, unknown>>;
}

export interface GameDocument {
    name: string;
    description: string;
    game: string;
    metadata: Readonly<Record<string, unknown>>;
    options: Readonly<Record<string, OptionValue>>;
}
