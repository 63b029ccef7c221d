/**
 * Student Provisioning - Directory Gateway Configuration
 *
 * Centralized environment configuration with validation.
 * Values are cached after first load for Lambda warm starts.
 */

import { optionalEnv, optionalNumericEnv, requireEnv } from '@provisioner/shared';
import type { AccountDefaults, DirectoryEnvConfig } from './types';

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    IDENTIFIER_ATTRIBUTE: 'dccDRE',
    TIMEOUT_MS: 10000,
    CONNECT_TIMEOUT_MS: 5000,
    ALLOCATION_ATTEMPTS: 5,
    ALLOCATION_BACKOFF_MS: 20,
    ALLOCATION_MAX_BACKOFF_MS: 500,
    HOME_PREFIX: '/usuarios/alunos/',
    LOGIN_SHELL: '/bin/bash',
    SAMBA_ACCT_FLAGS: '[U          ]',
} as const;

// =============================================================================
// Configuration Loaders
// =============================================================================

let directoryConfigCache: DirectoryEnvConfig | null = null;
let accountDefaultsCache: AccountDefaults | null = null;

export function getDirectoryConfig(): DirectoryEnvConfig {
    if (directoryConfigCache) {
        return directoryConfigCache;
    }

    directoryConfigCache = {
        url: requireEnv('LDAP_URL'),
        bindDn: requireEnv('LDAP_BIND_DN'),
        bindPassword: requireEnv('LDAP_BIND_PASSWORD'),
        baseDn: requireEnv('LDAP_BASE_DN'),
        accountsDn: requireEnv('LDAP_ACCOUNTS_DN'),
        identifierAttribute: optionalEnv('LDAP_IDENTIFIER_ATTRIBUTE', DEFAULTS.IDENTIFIER_ATTRIBUTE),
        timeoutMs: optionalNumericEnv('LDAP_TIMEOUT_MS', DEFAULTS.TIMEOUT_MS),
        connectTimeoutMs: optionalNumericEnv('LDAP_CONNECT_TIMEOUT_MS', DEFAULTS.CONNECT_TIMEOUT_MS),
        allocation: {
            maxAttempts: optionalNumericEnv('LDAP_ALLOCATION_ATTEMPTS', DEFAULTS.ALLOCATION_ATTEMPTS),
            baseDelayMs: optionalNumericEnv('LDAP_ALLOCATION_BACKOFF_MS', DEFAULTS.ALLOCATION_BACKOFF_MS),
            maxDelayMs: optionalNumericEnv('LDAP_ALLOCATION_MAX_BACKOFF_MS', DEFAULTS.ALLOCATION_MAX_BACKOFF_MS),
        },
    };

    return directoryConfigCache;
}

export function getAccountDefaults(): AccountDefaults {
    if (accountDefaultsCache) {
        return accountDefaultsCache;
    }

    accountDefaultsCache = {
        gidNumber: requireEnv('ACCOUNT_GID_NUMBER'),
        sambaSidPrefix: requireEnv('ACCOUNT_SAMBA_SID_PREFIX'),
        sambaAcctFlags: optionalEnv('ACCOUNT_SAMBA_ACCT_FLAGS', DEFAULTS.SAMBA_ACCT_FLAGS),
        sambaLmPassword: requireEnv('ACCOUNT_SAMBA_LM_PASSWORD'),
        sambaPasswordHistory: requireEnv('ACCOUNT_SAMBA_PASSWORD_HISTORY'),
        sambaPrimaryGroupSid: requireEnv('ACCOUNT_SAMBA_PRIMARY_GROUP_SID'),
        quota: requireEnv('ACCOUNT_QUOTA'),
        homePrefix: optionalEnv('ACCOUNT_HOME_PREFIX', DEFAULTS.HOME_PREFIX),
        mailDomain: requireEnv('ACCOUNT_MAIL_DOMAIN'),
        loginShell: optionalEnv('ACCOUNT_LOGIN_SHELL', DEFAULTS.LOGIN_SHELL),
    };

    return accountDefaultsCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    directoryConfigCache = null;
    accountDefaultsCache = null;
}
