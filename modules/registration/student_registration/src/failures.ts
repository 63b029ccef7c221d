/**
 * Student Provisioning - Failure Mapping
 *
 * Folds component errors into the registration taxonomy. Errors outside
 * the taxonomy are returned unchanged so the front end can treat them as
 * bugs.
 */

import { RegistrationError } from '@provisioner/shared';
import { DirectoryError } from '@provisioner/ldap-gateway';
import { isPortalError } from '@provisioner/document-portal';

export function toRegistrationError(error: unknown, signal?: AbortSignal): unknown {
    if (error instanceof RegistrationError) {
        return error;
    }
    if (signal?.aborted) {
        return RegistrationError.cancelled(error);
    }
    if (error instanceof DirectoryError) {
        return RegistrationError.directoryFailure(error, error.retryable);
    }
    if (isPortalError(error)) {
        return RegistrationError.portalFailure(error);
    }
    return error;
}
