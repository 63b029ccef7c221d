/**
 * Student Provisioning - Validation Module
 *
 * Input normalization for registration payloads.
 *
 * @module validation
 */

export {
    canonicalize,
    mustCanonicalize,
    canonicalNamesEqual,
    usernameCandidates,
    toPlainAscii,
    transliterate,
} from './name';

export type { CanonicalName, CanonicalizeResult, NameError } from './name';

export {
    normalizeIdentifier,
    normalizeDate,
    normalizeTime,
    normalizeSignatureCode,
    normalizeName,
    normalizePhone,
    normalizeUsername,
} from './fields';

export { normalizeEmail } from './email';

export { checkPasswordPolicy, isStrongSecret } from './password-policy';

export type { PasswordPolicyResult } from './password-policy';

export { parseRegistrationRequest, parseManualProvisioningRequest } from './request';

export type { AccountHolder, RegistrationRequest, ManualProvisioningRequest } from './request';
