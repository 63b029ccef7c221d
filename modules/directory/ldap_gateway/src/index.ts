/**
 * Student Provisioning - Directory Gateway
 *
 * LDAP access for student registration: registration probes, username
 * selection, optimistic id allocation and account creation.
 */

export { DirectoryGateway } from './gateway';
export type { DirectoryGatewayOptions } from './gateway';

export { withDirectorySession, createLdapClient, abortable } from './session';

export {
    findByIdentifier,
    usernameTaken,
    firstAvailableUsername,
    probeRegistration,
    equalityFilter,
    readAttribute,
} from './lookup';

export { allocateIds } from './allocation';

export { createAccount } from './create-account';

export { buildAccountEntry, accountDn, agingTimestamps } from './account-entry';
export type { AccountEntry, PasswordHashes } from './account-entry';

export { DirectoryError } from './errors';
export type { DirectoryErrorReason } from './errors';

export { getDirectoryConfig, getAccountDefaults, clearConfigCache } from './config';

export * from './constants';

export type {
    AccountDefaults,
    AllocationRetryConfig,
    AttributeValue,
    DirectoryAllocation,
    DirectoryClient,
    DirectoryClientFactory,
    DirectoryEntry,
    DirectoryEnvConfig,
    DirectoryLookupOutcome,
    DirectoryOperationContext,
    DirectorySearchOptions,
    ProvisionedAccount,
} from './types';
