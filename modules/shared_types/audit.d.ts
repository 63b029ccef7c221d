/**
 * Student Provisioning - Audit Schema
 *
 * Structured audit log interfaces.
 * All audit events are JSON-formatted, one entry per line.
 *
 * This file defines the contract for the AuditLogger utility class.
 */

// =============================================================================
// Audit Actions
// =============================================================================

/**
 * Every auditable action in the provisioning flow.
 */
export type AuditAction =
    | 'REGISTRATION_REQUESTED'
    | 'REGISTRATION_REJECTED'
    | 'USER_PROVISIONED'
    | 'USER_PROVISIONED_MANUALLY'
    | 'ID_ALLOCATION_CONFLICT';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * The entity performing the audited action.
 * Students are identified by their enrollment identifier.
 */
export type AuditActor =
    | { type: 'STUDENT'; identifier: string }
    | { type: 'OPERATOR'; name?: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * Structured audit log entry.
 *
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2025-03-10T14:02:11.000Z',
 *   requestId: 'req-7f3a',
 *   action: 'USER_PROVISIONED',
 *   ip: '10.0.0.8',
 *   actor: { type: 'STUDENT', identifier: '123456789' },
 *   details: { username: 'joaocps', uidNumber: '10421' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', so audit entries can be filtered from the other levels. */
    level: 'AUDIT';

    /** ISO 8601 timestamp (UTC). */
    timestamp: string;

    /**
     * Request ID for tracing.
     * Optional when using AuditLogger - filled from context.
     */
    requestId?: string;

    action: AuditAction;

    /**
     * Source IP address of the request.
     * Optional when using AuditLogger - filled from context.
     */
    ip?: string;

    actor: AuditActor;

    /** Action-specific metadata. Never carries secrets. */
    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

/** Details for USER_PROVISIONED and USER_PROVISIONED_MANUALLY */
export interface UserProvisionedDetails {
    username: string;
    uidNumber: string;
    rid: string;
}

/** Details for REGISTRATION_REJECTED */
export interface RegistrationRejectedDetails {
    /** Error code from the registration taxonomy */
    code: string;
    /** Whether the caller may retry the whole registration */
    retryable: boolean;
}

// =============================================================================
// Audit Logger Interface (Contract for Implementation)
// =============================================================================

export interface AuditLogger {
    /**
     * Log an audit event.
     * requestId and ip are optional - they will be filled from context if not provided.
     */
    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void;
}
