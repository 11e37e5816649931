// src/errors.ts

export interface FieldIssue {
    field: string;
    message: string;
}

/**
 * Raised when desk input fails validation
 *
 * Never raised by the queue engine itself.
 */
export class ValidationError extends Error {
    readonly issues: FieldIssue[];

    constructor(message: string, issues: FieldIssue[]) {
        super(message);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}
