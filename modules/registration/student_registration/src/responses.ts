/**
 * Student Provisioning - Registration Responses
 *
 * Maps the registration taxonomy onto HTTP statuses:
 * - 422: malformed field, weak password, name mismatch
 * - 403: document not authenticated, student of another program
 * - 409: identifier already registered
 * - 503: directory contention, the same request may be retried
 * - 500: portal, directory or cancellation
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import type { RegistrationErrorCode } from '@provisioner/shared';
import { HttpStatus, RegistrationError, RegistrationErrors, error } from '@provisioner/shared';

const STATUS_BY_CODE: Record<RegistrationErrorCode, number> = {
    [RegistrationErrors.INVALID_FIELD]: HttpStatus.UNPROCESSABLE_ENTITY,
    [RegistrationErrors.WEAK_SECRET]: HttpStatus.UNPROCESSABLE_ENTITY,
    [RegistrationErrors.NAME_MISMATCH]: HttpStatus.UNPROCESSABLE_ENTITY,
    [RegistrationErrors.DOCUMENT_INVALID]: HttpStatus.FORBIDDEN,
    [RegistrationErrors.OTHER_PROGRAM]: HttpStatus.FORBIDDEN,
    [RegistrationErrors.ALREADY_REGISTERED]: HttpStatus.CONFLICT,
    [RegistrationErrors.PORTAL_FAILURE]: HttpStatus.INTERNAL_SERVER_ERROR,
    [RegistrationErrors.DIRECTORY_FAILURE]: HttpStatus.INTERNAL_SERVER_ERROR,
    [RegistrationErrors.CANCELLED]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusFor(failure: RegistrationError): number {
    return failure.retryable ? HttpStatus.SERVICE_UNAVAILABLE : STATUS_BY_CODE[failure.code];
}

export function registrationErrorResponse(failure: RegistrationError): APIGatewayProxyStructuredResultV2 {
    return error(statusFor(failure), failure.code, failure.message, { retryable: failure.retryable });
}
