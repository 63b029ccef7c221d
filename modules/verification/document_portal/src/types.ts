/**
 * Student Provisioning - Document Portal Types
 */

import type { Logger } from '@provisioner/shared';

// =============================================================================
// Environment Configuration
// =============================================================================

export interface PortalEnvConfig {
    /** Page holding the authentication form (GET) */
    formUrl: string;
    /** Form action (POST) */
    submitUrl: string;
    /** Program whose students are entitled to an account, compared exactly */
    targetProgram: string;
    /** Budget for the whole GET + POST exchange */
    timeoutMs: number;
}

// =============================================================================
// HTTP Port
// =============================================================================

/**
 * The parts of a fetch Response the verifier reads.
 */
export interface PortalResponse {
    ok: boolean;
    status: number;
    headers: { getSetCookie(): string[] };
    text(): Promise<string>;
}

export interface PortalRequestInit {
    method: 'GET' | 'POST';
    headers: Record<string, string>;
    body?: string;
    signal: AbortSignal;
}

/** Global `fetch` satisfies this; tests supply a scripted portal */
export type PortalFetch = (url: string, init: PortalRequestInit) => Promise<PortalResponse>;

// =============================================================================
// Queries and Outcomes
// =============================================================================

/**
 * Fields printed on the "regularly enrolled" document, already normalized.
 */
export interface DocumentQuery {
    identifier: string;
    /** `dd/mm/yyyy` */
    date: string;
    /** `HH:MM` */
    time: string;
    signatureCode: string;
}

export type VerificationOutcome =
    | { type: 'MatchedEnrolledStudent'; officialName: string }
    | { type: 'MatchedOtherProgram'; officialName: string; programName: string }
    | { type: 'DocumentUnrecognized' };

export interface PortalOperationContext {
    signal?: AbortSignal;
    logger?: Logger;
}
