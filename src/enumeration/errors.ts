export type EnumerationErrorContext = {
    game?: string;
    option?: string;
    cause?: unknown;
};

/**
 * Base class for the errors that abort a single game.
 * Sibling games keep running when one of these is raised.
 */
export class EnumerationError extends Error {
    public game?: string;
    public option?: string;

    constructor(message: string, context: EnumerationErrorContext = {}) {
        super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
        this.name = 'EnumerationError';
        this.game = context.game;
        this.option = context.option;
    }

    toString(): string {
        const location = [
            this.game !== undefined ? `game "${this.game}"` : null,
            this.option !== undefined ? `option "${this.option}"` : null,
        ].filter(Boolean);

        return location.length > 0
            ? `${this.name} (${location.join(', ')}): ${this.message}`
            : `${this.name}: ${this.message}`;
    }
}

/**
 * The option spec references a value, count or range the option schema does not allow.
 */
export class InvalidSpecError extends EnumerationError {
    constructor(message: string, context: EnumerationErrorContext = {}) {
        super(message, context);
        this.name = 'InvalidSpecError';
    }
}

/**
 * A configured option (or game) has no declared schema.
 */
export class SchemaLookupError extends EnumerationError {
    constructor(message: string, context: EnumerationErrorContext = {}) {
        super(message, context);
        this.name = 'SchemaLookupError';
    }
}

/**
 * The output sink could not store the documents of a game, the original error is kept as `cause`.
 */
export class SinkError extends EnumerationError {
    constructor(message: string, context: EnumerationErrorContext = {}) {
        super(message, context);
        this.name = 'SinkError';
    }
}

/**
 * The configuration or schema file cannot be used at all, the whole run stops.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Advisory raised by the size guard. It is handed to the operator for a yes/no decision and never thrown.
 */
export class SizeThresholdExceeded {
    readonly name = 'SizeThresholdExceeded';

    constructor(
        public readonly total: number,
        public readonly threshold: number,
        public readonly game?: string,
    ) {}

    get message(): string {
        const subject = this.game !== undefined ? `Game "${this.game}"` : 'Enumeration';

        return `${subject} would generate ${this.total} documents, more than the threshold of ${this.threshold}`;
    }
}
