/**
 * Student Provisioning - Audit Logger
 *
 * Structured JSON logging, one entry per line on stdout.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * Design Principles:
 * - Every account-changing action produces an audit entry
 * - Request context (requestId, IP) is captured for traceability
 * - Plaintext passwords and derived hashes never appear in any entry
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditActor,
    AuditLogEntry,
    AuditLogger as IAuditLogger,
    RegistrationRejectedDetails,
    UserProvisionedDetails,
} from '../../shared_types/audit';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    log(
        entry: Omit<AuditLogEntry, 'level' | 'timestamp'>
    ): void {
        const logEntry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    registrationRequested(actor: AuditActor): void {
        this.log({
            action: 'REGISTRATION_REQUESTED',
            actor,
            details: {},
        });
    }

    registrationRejected(actor: AuditActor, details: RegistrationRejectedDetails): void {
        this.log({
            action: 'REGISTRATION_REJECTED',
            actor,
            details: { ...details },
        });
    }

    userProvisioned(actor: AuditActor, details: UserProvisionedDetails): void {
        this.log({
            action: actor.type === 'OPERATOR' ? 'USER_PROVISIONED_MANUALLY' : 'USER_PROVISIONED',
            actor,
            details: { ...details },
        });
    }

    /**
     * A compare-and-swap on the ID counters lost a race.
     */
    idAllocationConflict(details: { attempt: number; uidNumber: string; rid: string }): void {
        this.log({
            action: 'ID_ALLOCATION_CONFLICT',
            actor: { type: 'SYSTEM', process: 'id-allocator' },
            details,
        });
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.registrationRequested({ type: 'STUDENT', identifier: '123456789' });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    // HTTP API v2 headers are lowercase
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const ip = forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';

    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    return new AuditLogger({ requestId, ip });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId);
}

/**
 * Describe an unknown thrown value for a log line.
 */
export function errorDetails(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { message: String(error) };
}
