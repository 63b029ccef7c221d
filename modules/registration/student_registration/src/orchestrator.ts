/**
 * Student Provisioning - Registration Orchestrator
 *
 * Self-service registration of a student account:
 *
 * 1. Validating: normalize every field, first failure wins
 * 2. AwaitingExternalChecks: the portal check and the directory probe run
 *    concurrently; both settle before anything is decided
 * 3. Reconciling: fold both outcomes into a single decision
 * 4. Provisioning: reserve ids and create the entry (not cancellable)
 * 5. Done, or Failed with a RegistrationError
 *
 * The password is wiped when the workflow ends, whatever the outcome.
 */

import type { AuditActor, RegistrationRequest } from '@provisioner/shared';
import {
    RegistrationError,
    canonicalNamesEqual,
    canonicalize,
    errorDetails,
    parseRegistrationRequest,
} from '@provisioner/shared';
import type { DirectoryLookupOutcome } from '@provisioner/ldap-gateway';
import type { VerificationOutcome } from '@provisioner/document-portal';
import type { RegistrationPayload } from '../../../shared_types/registration';
import { toRegistrationError } from './failures';
import type {
    RegistrationDependencies,
    RegistrationOptions,
    RegistrationResult,
    RegistrationState,
} from './types';

// =============================================================================
// Reconciliation
// =============================================================================

/**
 * Decide a registration from the two settled checks.
 *
 * Precedence, first match wins:
 * 1. directory probe failed
 * 2. identifier already registered (whatever the portal said)
 * 3. portal check failed
 * 4. document not recognized
 * 5. student of another program
 * 6. reported name differs from the portal's
 *
 * @returns The username to provision
 * @throws The failing branch's error, or a RegistrationError
 */
export function reconcile(
    request: Pick<RegistrationRequest, 'name' | 'canonicalName'>,
    portal: PromiseSettledResult<VerificationOutcome>,
    directory: PromiseSettledResult<DirectoryLookupOutcome>
): string {
    if (directory.status === 'rejected') {
        throw directory.reason;
    }
    if (directory.value.type === 'AlreadyRegistered') {
        throw RegistrationError.alreadyRegistered(directory.value.username);
    }

    if (portal.status === 'rejected') {
        throw portal.reason;
    }

    const outcome = portal.value;
    switch (outcome.type) {
        case 'DocumentUnrecognized':
            throw RegistrationError.documentInvalid();
        case 'MatchedOtherProgram':
            throw RegistrationError.otherProgram(outcome.programName);
        case 'MatchedEnrolledStudent': {
            const official = canonicalize(outcome.officialName);
            if (!official.valid || !canonicalNamesEqual(request.canonicalName, official.name)) {
                throw RegistrationError.nameMismatch(request.name, outcome.officialName);
            }
            return directory.value.username;
        }
    }
}

// =============================================================================
// Workflow
// =============================================================================

/**
 * Register a student from a raw payload.
 *
 * @throws RegistrationError for every failure in the taxonomy; any other
 *         error is a bug and propagates unchanged
 *
 * @example
 * ```typescript
 * const account = await registerStudent(payload, { verifier, directory, logger, audit });
 * account.username; // 'joaocps'
 * ```
 */
export async function registerStudent(
    payload: RegistrationPayload,
    deps: RegistrationDependencies,
    options: RegistrationOptions = {}
): Promise<RegistrationResult> {
    const { verifier, directory, logger, audit } = deps;
    const { signal, onTransition } = options;

    let state: RegistrationState = 'Validating';
    const transition = (next: RegistrationState): void => {
        logger?.debug('Registration state change', { from: state, to: next });
        state = next;
        onTransition?.(next);
    };

    let actor: AuditActor = { type: 'ANONYMOUS' };
    let cancellable = true;
    let request: RegistrationRequest | undefined;

    onTransition?.(state);
    try {
        request = parseRegistrationRequest(payload);
        actor = { type: 'STUDENT', identifier: request.identifier };
        audit?.registrationRequested(actor);
        signal?.throwIfAborted();

        transition('AwaitingExternalChecks');
        const context = { signal, logger };
        const [portal, probe] = await Promise.allSettled([
            verifier.verifyDocument(
                {
                    identifier: request.identifier,
                    date: request.date,
                    time: request.time,
                    signatureCode: request.signatureCode,
                },
                context
            ),
            directory.probeRegistration(request.identifier, request.canonicalName, context),
        ]);
        signal?.throwIfAborted();

        transition('Reconciling');
        const username = reconcile(request, portal, probe);

        // Past this point the attempt is committed and no longer cancellable
        cancellable = false;
        transition('Provisioning');
        const account = await directory.provisionAccount(username, request, { logger, audit });
        audit?.userProvisioned(actor, { username: account.username, uidNumber: account.uidNumber, rid: account.rid });
        logger?.info('Student registered', { username: account.username });

        transition('Done');
        return account;
    } catch (error) {
        const failure = toRegistrationError(error, cancellable ? signal : undefined);
        transition('Failed');

        if (failure instanceof RegistrationError) {
            audit?.registrationRejected(actor, { code: failure.code, retryable: failure.retryable });
            logger?.info('Registration rejected', {
                code: failure.code,
                ...(failure.cause !== undefined && { cause: errorDetails(failure.cause) }),
            });
        }
        throw failure;
    } finally {
        request?.secret.wipe();
    }
}
