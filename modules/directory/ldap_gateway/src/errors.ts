/**
 * Student Provisioning - Directory Errors
 */

import { ResultCodeError } from 'ldapts';

export type DirectoryErrorReason =
    /** Could not reach or bind to the directory */
    | 'connection'
    /** The directory rejected an operation */
    | 'protocol'
    /** An entry matched the identifier but carries no username */
    | 'missing-attribute'
    /** The sambaDomain counter entry is missing or not numeric */
    | 'malformed-counter'
    /** Every username candidate is taken; usually a directory problem, not a common name */
    | 'no-available-username'
    /** Lost every compare-and-swap on the id counters */
    | 'allocation-exhausted'
    /** The entry was created by a concurrent registration */
    | 'account-creation-conflict';

const RETRYABLE_REASONS: ReadonlySet<DirectoryErrorReason> = new Set([
    'allocation-exhausted',
    'account-creation-conflict',
]);

export class DirectoryError extends Error {
    readonly reason: DirectoryErrorReason;

    constructor(reason: DirectoryErrorReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DirectoryError';
        this.reason = reason;
    }

    /** Whether resubmitting the same registration may succeed */
    get retryable(): boolean {
        return RETRYABLE_REASONS.has(this.reason);
    }

    /**
     * Wrap an error thrown by the LDAP client. Result codes mean the server
     * answered; anything else is treated as a connection problem.
     */
    static fromClientError(error: unknown, operation: string): DirectoryError {
        if (error instanceof DirectoryError) {
            return error;
        }
        if (error instanceof ResultCodeError) {
            return new DirectoryError('protocol', `Directory rejected ${operation} (code ${error.code})`, { cause: error });
        }
        return new DirectoryError('connection', `Directory unavailable during ${operation}`, { cause: error });
    }
}
