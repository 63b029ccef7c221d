/**
 * Student Provisioning - Request Parsing
 *
 * Turns an untrusted inbound payload into a validated request. Fields are
 * checked in a fixed order and the first failure is thrown, so a student
 * fixing their form sees one error at a time, top to bottom.
 */

import type { ManualProvisioningPayload, RegistrationPayload } from '../../../shared_types/registration';
import type { RegistrationField } from '../errors';
import { RegistrationError, RegistrationFields } from '../errors';
import { Secret } from '../secret';
import { normalizeEmail } from './email';
import {
    normalizeDate,
    normalizeIdentifier,
    normalizeName,
    normalizePhone,
    normalizeSignatureCode,
    normalizeTime,
    normalizeUsername,
} from './fields';
import type { CanonicalName } from './name';
import { mustCanonicalize } from './name';
import { isStrongSecret } from './password-policy';

// =============================================================================
// Types
// =============================================================================

/**
 * Validated personal data of the future account owner.
 */
export interface AccountHolder {
    identifier: string;
    /** Capitalized display form, accents kept */
    name: string;
    canonicalName: CanonicalName;
    email: string;
    phone: string;
    /** Wiped by whoever finishes the workflow */
    secret: Secret;
}

export interface RegistrationRequest extends AccountHolder {
    /** `dd/mm/yyyy` */
    date: string;
    /** `HH:MM` */
    time: string;
    signatureCode: string;
}

export interface ManualProvisioningRequest extends AccountHolder {
    username: string;
}

// =============================================================================
// Parsing
// =============================================================================

function requireField(
    field: RegistrationField,
    raw: string,
    normalize: (raw: string) => string | null
): string {
    const normalized = normalize(raw);
    if (normalized === null) {
        throw RegistrationError.invalidField(field, raw);
    }
    return normalized;
}

function requireStrongSecret(raw: string): Secret {
    const secret = new Secret(raw);
    if (!isStrongSecret(secret)) {
        secret.wipe();
        throw RegistrationError.weakSecret();
    }
    return secret;
}

function parseHolder(payload: Omit<RegistrationPayload, 'date' | 'time' | 'signatureCode'>): Omit<AccountHolder, 'identifier'> {
    const name = requireField(RegistrationFields.NAME, payload.name, normalizeName);
    const email = requireField(RegistrationFields.EMAIL, payload.email, normalizeEmail);
    const phone = requireField(RegistrationFields.PHONE, payload.phone, normalizePhone);
    const secret = requireStrongSecret(payload.password);

    return {
        name,
        canonicalName: mustCanonicalize(name),
        email,
        phone,
        secret,
    };
}

/**
 * Validate a self-service registration payload.
 *
 * @throws RegistrationError - INVALID_FIELD for the first malformed field,
 *         WEAK_SECRET if the password does not meet the policy
 */
export function parseRegistrationRequest(payload: RegistrationPayload): RegistrationRequest {
    const identifier = requireField(RegistrationFields.IDENTIFIER, payload.identifier, normalizeIdentifier);
    const date = requireField(RegistrationFields.DATE, payload.date, normalizeDate);
    const time = requireField(RegistrationFields.TIME, payload.time, normalizeTime);
    const signatureCode = requireField(RegistrationFields.SIGNATURE_CODE, payload.signatureCode, normalizeSignatureCode);

    return {
        identifier,
        date,
        time,
        signatureCode,
        ...parseHolder(payload),
    };
}

/**
 * Validate an operator's provisioning payload. No document fields; the
 * username is chosen by the operator.
 */
export function parseManualProvisioningRequest(payload: ManualProvisioningPayload): ManualProvisioningRequest {
    const username = requireField(RegistrationFields.USERNAME, payload.username, normalizeUsername);
    const identifier = requireField(RegistrationFields.IDENTIFIER, payload.identifier, normalizeIdentifier);

    return {
        username,
        identifier,
        ...parseHolder(payload),
    };
}
