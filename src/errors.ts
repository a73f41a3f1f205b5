// src/errors.ts

/**
 * Thrown by the store when a write would break a unique constraint.
 * The enclosing transaction is rolled back before the error reaches the caller.
 */
export class UniqueConstraintError extends Error {
    readonly constraint: string;
    readonly key: string;

    constructor(constraint: string, key: string) {
        super(`Unique constraint "${constraint}" violated for key ${key}`);
        this.name = 'UniqueConstraintError';
        this.constraint = constraint;
        this.key = key;
    }
}

/**
 * Unexpected failure while committing a unit of work.
 * State is unchanged when this is thrown.
 */
export class TransactionFailedError extends Error {
    readonly operation: string;

    constructor(operation: string, cause: unknown) {
        super(`Transaction failed during ${operation}`, { cause });
        this.name = 'TransactionFailedError';
        this.operation = operation;
    }
}

export class ConfigValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}
