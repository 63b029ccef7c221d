/**
 * Student Provisioning - Registration Error Codes
 *
 * Machine-readable codes for every way a registration can fail.
 * Each code maps 1:1 to one entry of the error taxonomy and to one
 * HTTP status in the front end.
 */

export const RegistrationErrors = {
    /** A submitted field is malformed */
    INVALID_FIELD: 'invalid_field',
    /** Password does not meet the policy */
    WEAK_SECRET: 'weak_secret',
    /** The portal could not authenticate the enrollment document */
    DOCUMENT_INVALID: 'document_invalid',
    /** Authenticated, but the student belongs to another program */
    OTHER_PROGRAM: 'other_program',
    /** The enrollment identifier already has an account */
    ALREADY_REGISTERED: 'already_registered',
    /** Reported name differs from the portal's record */
    NAME_MISMATCH: 'name_mismatch',
    /** The portal failed or answered in an unexpected format */
    PORTAL_FAILURE: 'portal_failure',
    /** The directory failed (connection, data integrity, contention) */
    DIRECTORY_FAILURE: 'directory_failure',
    /** The registration was cancelled before completion */
    CANCELLED: 'cancelled',
} as const;

export type RegistrationErrorCode = typeof RegistrationErrors[keyof typeof RegistrationErrors];

/**
 * Names of the fields validated before any external call.
 */
export const RegistrationFields = {
    IDENTIFIER: 'identifier',
    DATE: 'date',
    TIME: 'time',
    SIGNATURE_CODE: 'signatureCode',
    NAME: 'name',
    EMAIL: 'email',
    PHONE: 'phone',
    USERNAME: 'username',
} as const;

export type RegistrationField = typeof RegistrationFields[keyof typeof RegistrationFields];
