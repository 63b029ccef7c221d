/**
 * Student Provisioning - Password Policy
 *
 * Checks a plaintext password against PASSWORD_POLICY. Length is counted
 * in characters, not bytes.
 */

import type { PasswordPolicy } from '../constants';
import { PASSWORD_POLICY } from '../constants';
import type { Secret } from '../secret';

export interface PasswordPolicyResult {
    valid: boolean;
    /** Policy rules that were not met */
    failures: Array<'too_short' | 'too_long' | 'missing_lowercase' | 'missing_uppercase' | 'missing_number'>;
}

export function checkPasswordPolicy(
    plaintext: string,
    policy: PasswordPolicy = PASSWORD_POLICY
): PasswordPolicyResult {
    const failures: PasswordPolicyResult['failures'] = [];
    const length = [...plaintext].length;

    if (length < policy.minLength) {
        failures.push('too_short');
    }
    if (length > policy.maxLength) {
        failures.push('too_long');
    }
    if (policy.requireLowercase && !/\p{Ll}/u.test(plaintext)) {
        failures.push('missing_lowercase');
    }
    if (policy.requireUppercase && !/\p{Lu}/u.test(plaintext)) {
        failures.push('missing_uppercase');
    }
    if (policy.requireNumber && !/\p{Nd}/u.test(plaintext)) {
        failures.push('missing_number');
    }

    return { valid: failures.length === 0, failures };
}

export function isStrongSecret(secret: Secret, policy: PasswordPolicy = PASSWORD_POLICY): boolean {
    return secret.expose((plaintext) => checkPasswordPolicy(plaintext, policy).valid);
}
