import type { CollisionViolation } from './validator.js';

export type ExpeditionErrorCode =
    | 'SCOPE_EMPTY'
    | 'INSUFFICIENT_POOL'
    | 'COLLISION_EXHAUSTED'
    | 'DATASET_INVALID'
    | 'INVALID_LENGTH'
    | 'INVALID_STRICTNESS'
    | 'INVALID_REQUEST';

/**
 * Base class for every failure the selector reports.
 * Subclasses carry structured details so callers can widen the scope,
 * raise the attempt budget or give up.
 */
export abstract class ExpeditionError extends Error {
    abstract readonly code: ExpeditionErrorCode;

    abstract details(): Record<string, unknown>;

    toJSON(): Record<string, unknown> {
        return {
            kind: this.name,
            code: this.code,
            message: this.message,
            ...this.details()
        };
    }
}

export class ScopeError extends ExpeditionError {
    readonly code = 'SCOPE_EMPTY';

    constructor(
        message: string,
        public readonly unknownWaves: readonly string[] = [],
        public readonly unknownBoxes: readonly string[] = []
    ) {
        super(message);
        this.name = 'ScopeError';
    }

    details(): Record<string, unknown> {
        return {
            unknownWaves: [...this.unknownWaves],
            unknownBoxes: [...this.unknownBoxes]
        };
    }
}

export interface PoolShortfall {
    category: string;
    required: number;
    available: number;
    wave: string | null;
}

export class InsufficientPoolError extends ExpeditionError {
    readonly code = 'INSUFFICIENT_POOL';

    constructor(public readonly shortfall: PoolShortfall) {
        const where = shortfall.wave ? ` for setting wave "${shortfall.wave}"` : '';
        super(
            `Not enough ${shortfall.category}${where}: need ${shortfall.required}, have ${shortfall.available}`
        );
        this.name = 'InsufficientPoolError';
    }

    details(): Record<string, unknown> {
        return { ...this.shortfall };
    }
}

export class CollisionExhaustedError extends ExpeditionError {
    readonly code = 'COLLISION_EXHAUSTED';

    constructor(
        public readonly attempts: number,
        public readonly violations: readonly CollisionViolation[]
    ) {
        super(`No collision-free packet after ${attempts} attempt(s)`);
        this.name = 'CollisionExhaustedError';
    }

    details(): Record<string, unknown> {
        return {
            attempts: this.attempts,
            violations: this.violations.map(v => ({ ...v, names: [...v.names] }))
        };
    }
}

export class DatasetValidationError extends ExpeditionError {
    readonly code = 'DATASET_INVALID';

    constructor(
        public readonly dataset: string,
        public readonly key: string | null,
        public readonly issues: readonly string[]
    ) {
        const where = key === null ? dataset : `${dataset}["${key}"]`;
        super(`Invalid dataset ${where}: ${issues.join('; ')}`);
        this.name = 'DatasetValidationError';
    }

    details(): Record<string, unknown> {
        return { dataset: this.dataset, key: this.key, issues: [...this.issues] };
    }
}

abstract class InvalidChoiceError extends ExpeditionError {
    constructor(
        field: string,
        public readonly input: string,
        public readonly validValues: readonly string[],
        public readonly suggestions: readonly string[]
    ) {
        const hint = suggestions.length > 0 ? ` Did you mean "${suggestions[0]}"?` : '';
        super(`Unknown ${field} "${input}". Valid values: ${validValues.join(', ')}.${hint}`);
    }

    details(): Record<string, unknown> {
        return {
            input: this.input,
            validValues: [...this.validValues],
            suggestions: [...this.suggestions]
        };
    }
}

export class InvalidLengthError extends InvalidChoiceError {
    readonly code = 'INVALID_LENGTH';

    constructor(input: string, validValues: readonly string[], suggestions: readonly string[]) {
        super('expedition length', input, validValues, suggestions);
        this.name = 'InvalidLengthError';
    }
}

export class InvalidStrictnessError extends InvalidChoiceError {
    readonly code = 'INVALID_STRICTNESS';

    constructor(input: string, validValues: readonly string[], suggestions: readonly string[]) {
        super('strictness', input, validValues, suggestions);
        this.name = 'InvalidStrictnessError';
    }
}

export class InvalidRequestError extends ExpeditionError {
    readonly code = 'INVALID_REQUEST';

    constructor(public readonly field: string, message: string) {
        super(message);
        this.name = 'InvalidRequestError';
    }

    details(): Record<string, unknown> {
        return { field: this.field };
    }
}

export function isExpeditionError(error: unknown): error is ExpeditionError {
    return error instanceof ExpeditionError;
}
