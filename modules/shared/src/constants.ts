/**
 * Student Provisioning - Constants
 *
 * Policy values shared by the validators and the directory writer.
 * Runtime configuration (URLs, credentials, account defaults) comes from
 * environment variables; what lives here changes only with a code review.
 */

// =============================================================================
// Names
// =============================================================================

/**
 * Grammatical particles ignored when comparing names and building usernames.
 */
export const NAME_PARTICLES: readonly string[] = ['de', 'da', 'do', 'dos', 'das'];

/** Longer names are truncated to this many tokens */
export const MAX_NAME_TOKENS = 10;

/** Minimum tokens (given name + one surname) after dropping particles */
export const MIN_NAME_TOKENS = 2;

/** Usernames must be strictly shorter than this */
export const MAX_USERNAME_LENGTH = 20;

// =============================================================================
// Password Policy
// =============================================================================

/**
 * Password strength policy.
 * Bounds have changed over time; this table is the only place they live.
 */
export const PASSWORD_POLICY = {
    minLength: 8,
    maxLength: 25,
    requireLowercase: true,
    requireUppercase: true,
    requireNumber: true,
} as const;

export type PasswordPolicy = {
    readonly [K in keyof typeof PASSWORD_POLICY]: typeof PASSWORD_POLICY[K] extends boolean ? boolean : number;
};

// =============================================================================
// Credential Hashing
// =============================================================================

/** Scheme prefix of salted SHA-1 directory passwords */
export const SSHA_PREFIX = '{SSHA}';

/** Salt length for salted SHA-1 hashes, in bytes */
export const SSHA_SALT_BYTES = 4;

/** SHA-1 digest length, in bytes */
export const SHA1_DIGEST_BYTES = 20;
