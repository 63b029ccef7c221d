/**
 * Student Provisioning - Registration Types
 */

import type { AccountHolder, AuditLogger, CanonicalName, Logger } from '@provisioner/shared';
import type {
    DirectoryLookupOutcome,
    DirectoryOperationContext,
    ProvisionedAccount,
} from '@provisioner/ldap-gateway';
import type { DocumentQuery, PortalOperationContext, VerificationOutcome } from '@provisioner/document-portal';

// =============================================================================
// Ports
// =============================================================================

/** Implemented by DocumentVerifier */
export interface DocumentVerifierPort {
    verifyDocument(query: DocumentQuery, context?: PortalOperationContext): Promise<VerificationOutcome>;
}

/** Implemented by DirectoryGateway */
export interface DirectoryPort {
    probeRegistration(
        identifier: string,
        name: CanonicalName,
        context?: DirectoryOperationContext
    ): Promise<DirectoryLookupOutcome>;
    provisionAccount(
        username: string,
        holder: AccountHolder,
        context?: DirectoryOperationContext
    ): Promise<ProvisionedAccount>;
}

export interface RegistrationDependencies {
    verifier: DocumentVerifierPort;
    directory: DirectoryPort;
    logger?: Logger;
    audit?: AuditLogger;
}

// =============================================================================
// Workflow
// =============================================================================

export type RegistrationState =
    | 'Validating'
    | 'AwaitingExternalChecks'
    | 'Reconciling'
    | 'Provisioning'
    | 'Done'
    | 'Failed';

export interface RegistrationOptions {
    /** Aborting cancels both external checks; a cancelled attempt is never reconciled */
    signal?: AbortSignal;
    onTransition?: (state: RegistrationState) => void;
}

export type RegistrationResult = ProvisionedAccount;
