/**
 * Student Provisioning - Directory Gateway Types
 *
 * Type definitions for directory sessions, lookups and account creation.
 */

import type { Attribute, Change } from 'ldapts';
import type { AuditLogger, Logger, RetryConfig } from '@provisioner/shared';

// =============================================================================
// Environment Configuration
// =============================================================================

/**
 * Backoff between compare-and-swap attempts; a base delay of 0 disables
 * waiting.
 */
export interface AllocationRetryConfig extends RetryConfig {
    /** Compare-and-swap attempts before giving up */
    maxAttempts: number;
}

export interface DirectoryEnvConfig {
    url: string;
    bindDn: string;
    bindPassword: string;
    /** Search base for lookups and the sambaDomain counter entry */
    baseDn: string;
    /** Parent DN of new student entries */
    accountsDn: string;
    /** Attribute holding the enrollment identifier */
    identifierAttribute: string;
    timeoutMs: number;
    connectTimeoutMs: number;
    allocation: AllocationRetryConfig;
}

/**
 * Fixed attribute values written on every new account.
 */
export interface AccountDefaults {
    gidNumber: string;
    sambaSidPrefix: string;
    sambaAcctFlags: string;
    sambaLmPassword: string;
    sambaPasswordHistory: string;
    sambaPrimaryGroupSid: string;
    quota: string;
    /** Prefix of the home directory, username appended */
    homePrefix: string;
    /** Institutional mail domain, `mail` = username@domain */
    mailDomain: string;
    loginShell: string;
}

// =============================================================================
// Directory Client Port
// =============================================================================

export type AttributeValue = string | string[] | Buffer | Buffer[];

export interface DirectoryEntry {
    dn: string;
    [attribute: string]: AttributeValue;
}

export interface DirectorySearchOptions {
    scope: 'one' | 'sub';
    filter: string;
    attributes: string[];
}

/**
 * The subset of the LDAP client the gateway uses. `ldapts`' Client
 * satisfies it; tests supply an in-memory directory.
 */
export interface DirectoryClient {
    bind(dn: string, password: string): Promise<void>;
    search(baseDn: string, options: DirectorySearchOptions): Promise<{ searchEntries: DirectoryEntry[] }>;
    modify(dn: string, changes: Change[]): Promise<void>;
    add(dn: string, attributes: Attribute[]): Promise<void>;
    unbind(): Promise<void>;
}

export type DirectoryClientFactory = (config: DirectoryEnvConfig) => DirectoryClient;

// =============================================================================
// Operation Context and Results
// =============================================================================

export interface DirectoryOperationContext {
    signal?: AbortSignal;
    logger?: Logger;
    audit?: AuditLogger;
}

/**
 * Freshly allocated directory-wide ids. Never cached.
 */
export interface DirectoryAllocation {
    uidNumber: string;
    rid: string;
}

export type DirectoryLookupOutcome =
    | { type: 'SlotAvailable'; username: string }
    | { type: 'AlreadyRegistered'; username: string };

export interface ProvisionedAccount extends DirectoryAllocation {
    username: string;
    dn: string;
}
