/**
 * Student Provisioning - Registration Error
 *
 * The single error type surfaced by the registration workflow. The
 * `failure` field is a closed tagged union: callers switch on
 * `failure.code` and TypeScript narrows the payload.
 */

import type { RegistrationField } from './registration-error-codes';
import { RegistrationErrors } from './registration-error-codes';
import {
    ErrorMessages,
    alreadyRegisteredMessage,
    invalidFieldMessage,
    nameMismatchMessage,
    otherProgramMessage,
} from './error-messages';

// =============================================================================
// Failure Variants
// =============================================================================

export type RegistrationFailure =
    | { code: typeof RegistrationErrors.INVALID_FIELD; field: RegistrationField; value: string }
    | { code: typeof RegistrationErrors.WEAK_SECRET }
    | { code: typeof RegistrationErrors.DOCUMENT_INVALID }
    | { code: typeof RegistrationErrors.OTHER_PROGRAM; program: string }
    | { code: typeof RegistrationErrors.ALREADY_REGISTERED; username: string }
    | { code: typeof RegistrationErrors.NAME_MISMATCH; reported: string; official: string }
    | { code: typeof RegistrationErrors.PORTAL_FAILURE }
    | { code: typeof RegistrationErrors.DIRECTORY_FAILURE; retryable: boolean }
    | { code: typeof RegistrationErrors.CANCELLED };

function messageFor(failure: RegistrationFailure): string {
    switch (failure.code) {
        case RegistrationErrors.INVALID_FIELD:
            return invalidFieldMessage(failure.field, failure.value);
        case RegistrationErrors.WEAK_SECRET:
            return ErrorMessages.WEAK_SECRET;
        case RegistrationErrors.DOCUMENT_INVALID:
            return ErrorMessages.DOCUMENT_INVALID;
        case RegistrationErrors.OTHER_PROGRAM:
            return otherProgramMessage(failure.program);
        case RegistrationErrors.ALREADY_REGISTERED:
            return alreadyRegisteredMessage(failure.username);
        case RegistrationErrors.NAME_MISMATCH:
            return nameMismatchMessage(failure.reported, failure.official);
        case RegistrationErrors.PORTAL_FAILURE:
            return ErrorMessages.PORTAL_FAILURE;
        case RegistrationErrors.DIRECTORY_FAILURE:
            return failure.retryable ? ErrorMessages.DIRECTORY_RETRY : ErrorMessages.DIRECTORY_FAILURE;
        case RegistrationErrors.CANCELLED:
            return ErrorMessages.CANCELLED;
    }
}

// =============================================================================
// Error Class
// =============================================================================

export class RegistrationError extends Error {
    readonly failure: RegistrationFailure;

    constructor(failure: RegistrationFailure, options?: { cause?: unknown }) {
        super(messageFor(failure), options);
        this.name = 'RegistrationError';
        this.failure = failure;
    }

    get code(): RegistrationFailure['code'] {
        return this.failure.code;
    }

    /** Only transient directory contention is worth retrying as-is. */
    get retryable(): boolean {
        return this.failure.code === RegistrationErrors.DIRECTORY_FAILURE && this.failure.retryable;
    }

    static invalidField(field: RegistrationField, value: string): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.INVALID_FIELD, field, value });
    }

    static weakSecret(): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.WEAK_SECRET });
    }

    static documentInvalid(): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.DOCUMENT_INVALID });
    }

    static otherProgram(program: string): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.OTHER_PROGRAM, program });
    }

    static alreadyRegistered(username: string): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.ALREADY_REGISTERED, username });
    }

    static nameMismatch(reported: string, official: string): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.NAME_MISMATCH, reported, official });
    }

    static portalFailure(cause: unknown): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.PORTAL_FAILURE }, { cause });
    }

    static directoryFailure(cause: unknown, retryable: boolean): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.DIRECTORY_FAILURE, retryable }, { cause });
    }

    static cancelled(cause?: unknown): RegistrationError {
        return new RegistrationError({ code: RegistrationErrors.CANCELLED }, { cause });
    }
}
