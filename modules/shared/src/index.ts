/**
 * Student Provisioning - Shared Utilities
 *
 * Central export for the modules used by every provisioning package.
 *
 * Modules:
 * - Audit Logger: structured JSON logging (audit and operational)
 * - Response Helpers: JSON responses for the Lambda front end
 * - Validation: name canonicalization and field normalization
 * - Crypto: legacy NT and salted SHA-1 password hashes
 * - Secret: wipeable, redact-on-print password holder
 * - Retry: jittered exponential backoff
 * - Errors: registration error taxonomy and messages
 */

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createLogger,
    errorDetails,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

export type { AuditActor, AuditAction } from '../../shared_types/audit';

// =============================================================================
// HTTP Response Helpers
// =============================================================================

export {
    success,
    created,
    error,
    invalidRequest,
    methodNotAllowed,
    serverError,
} from './response';

export type { ErrorBody } from './response';

// =============================================================================
// Configuration
// =============================================================================

export { requireEnv, optionalEnv, optionalNumericEnv } from './config';

// =============================================================================
// Constants
// =============================================================================

export {
    NAME_PARTICLES,
    MAX_NAME_TOKENS,
    MIN_NAME_TOKENS,
    MAX_USERNAME_LENGTH,
    PASSWORD_POLICY,
} from './constants';

export type { PasswordPolicy } from './constants';

// =============================================================================
// Secrets and Crypto
// =============================================================================

export { Secret, wipeBuffers } from './secret';

export {
    legacyHash,
    saltedHash,
    generateSaltedHash,
    verifySaltedHash,
} from './crypto';

// =============================================================================
// Retry
// =============================================================================

export { calculateDelay, sleep, DEFAULT_RETRY_CONFIG } from './retry';

export type { RetryConfig } from './retry';

// =============================================================================
// Validation
// =============================================================================

export * from './validation';

// =============================================================================
// Errors
// =============================================================================

export * from './errors';
