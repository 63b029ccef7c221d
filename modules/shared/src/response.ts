/**
 * Student Provisioning - HTTP Response Helpers
 *
 * Consistent JSON responses for the Lambda front end.
 *
 * Every response:
 * - is `application/json`
 * - carries `Cache-Control: no-store` (bodies may echo personal data)
 * - carries the security headers below
 *
 * Note: HTTP API Gateway v2 does not support response header manipulation
 * at the gateway level, so headers are set on each Lambda response.
 *
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { HttpStatus } from './errors';

// =============================================================================
// Response Headers
// =============================================================================

const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * @example
 * ```typescript
 * return success({ username: 'joaocps' }, HttpStatus.CREATED);
 * ```
 */
export function success<T>(body: T, statusCode: number = HttpStatus.OK): APIGatewayProxyStructuredResultV2 {
    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

export function created<T>(body: T): APIGatewayProxyStructuredResultV2 {
    return success(body, HttpStatus.CREATED);
}

// =============================================================================
// Error Responses
// =============================================================================

export interface ErrorBody {
    error: string;
    error_description?: string;
    /** Present when the same request may succeed if sent again */
    retryable?: boolean;
}

/**
 * @example
 * ```typescript
 * return error(409, 'already_registered', 'O cadastro já existe');
 * ```
 */
export function error(
    statusCode: number,
    errorCode: string,
    description?: string,
    options: { retryable?: boolean } = {}
): APIGatewayProxyStructuredResultV2 {
    const body: ErrorBody = {
        error: errorCode,
    };

    if (description) {
        body.error_description = description;
    }

    if (options.retryable) {
        body.retryable = true;
    }

    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

export function invalidRequest(description: string): APIGatewayProxyStructuredResultV2 {
    return error(HttpStatus.BAD_REQUEST, 'invalid_request', description);
}

export function methodNotAllowed(allowed: string): APIGatewayProxyStructuredResultV2 {
    const response = error(HttpStatus.METHOD_NOT_ALLOWED, 'method_not_allowed', `Use ${allowed}`);
    return {
        ...response,
        headers: { ...response.headers, Allow: allowed },
    };
}

export function serverError(description?: string): APIGatewayProxyStructuredResultV2 {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, 'server_error', description || 'An unexpected error occurred');
}
