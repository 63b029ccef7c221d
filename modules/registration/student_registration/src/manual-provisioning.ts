/**
 * Student Provisioning - Manual Provisioning
 *
 * Lets an operator create an account for students the self-service flow
 * cannot handle (lost document, unusual name). There is no document
 * check and no username search: the operator picks the username.
 */

import type { AuditActor, ManualProvisioningRequest } from '@provisioner/shared';
import { RegistrationError, parseManualProvisioningRequest } from '@provisioner/shared';
import type { ManualProvisioningPayload } from '../../../shared_types/registration';
import { toRegistrationError } from './failures';
import type { RegistrationDependencies, RegistrationResult } from './types';

export interface ManualProvisioningOptions {
    /** Recorded as the audit actor */
    operator?: string;
}

/**
 * @throws RegistrationError - INVALID_FIELD, WEAK_SECRET or DIRECTORY_FAILURE
 */
export async function provisionWithoutDocument(
    payload: ManualProvisioningPayload,
    deps: Pick<RegistrationDependencies, 'directory' | 'logger' | 'audit'>,
    options: ManualProvisioningOptions = {}
): Promise<RegistrationResult> {
    const { directory, logger, audit } = deps;
    const actor: AuditActor = { type: 'OPERATOR', name: options.operator };
    let request: ManualProvisioningRequest | undefined;

    try {
        request = parseManualProvisioningRequest(payload);

        const account = await directory.provisionAccount(request.username, request, { logger, audit });
        audit?.userProvisioned(actor, { username: account.username, uidNumber: account.uidNumber, rid: account.rid });
        logger?.info('Account provisioned manually', { username: account.username });
        return account;
    } catch (error) {
        const failure = toRegistrationError(error);
        if (failure instanceof RegistrationError) {
            audit?.registrationRejected(actor, { code: failure.code, retryable: failure.retryable });
        }
        throw failure;
    } finally {
        request?.secret.wipe();
    }
}
