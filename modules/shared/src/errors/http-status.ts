/**
 * Student Provisioning - HTTP Status Codes
 *
 * Status codes used by the registration front end.
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Account created */
    CREATED: 201,
    /** Malformed JSON body */
    BAD_REQUEST: 400,
    /** Document rejected or student from another program */
    FORBIDDEN: 403,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Identifier already provisioned */
    CONFLICT: 409,
    /** Well-formed request with invalid field values */
    UNPROCESSABLE_ENTITY: 422,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
    /** Transient directory contention, the caller may retry */
    SERVICE_UNAVAILABLE: 503,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
