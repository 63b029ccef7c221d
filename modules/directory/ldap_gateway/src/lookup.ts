/**
 * Student Provisioning - Directory Lookups
 *
 * Read-only queries run inside a directory session. Every filter is an
 * attribute equality with the value escaped per RFC 4515.
 */

import { EqualityFilter } from 'ldapts';
import type { CanonicalName } from '@provisioner/shared';
import { usernameCandidates } from '@provisioner/shared';
import { Attributes } from './constants';
import { DirectoryError } from './errors';
import { abortable } from './session';
import type {
    AttributeValue,
    DirectoryClient,
    DirectoryEntry,
    DirectoryEnvConfig,
    DirectoryLookupOutcome,
    DirectoryOperationContext,
} from './types';

// =============================================================================
// Entry Helpers
// =============================================================================

export function equalityFilter(attribute: string, value: string): string {
    return new EqualityFilter({ attribute, value }).toString();
}

function firstString(value: AttributeValue | undefined): string | null {
    if (value === undefined) {
        return null;
    }
    const first = Array.isArray(value) ? value[0] : value;
    if (first === undefined) {
        return null;
    }
    return typeof first === 'string' ? first : first.toString('utf-8');
}

/**
 * First value of an attribute. Attribute names are case-insensitive.
 */
export function readAttribute(entry: DirectoryEntry, attribute: string): string | null {
    const key = Object.keys(entry).find((name) => name.toLowerCase() === attribute.toLowerCase());
    return key === undefined ? null : firstString(entry[key]);
}

async function search(
    client: DirectoryClient,
    baseDn: string,
    filter: string,
    attributes: string[],
    context: DirectoryOperationContext
): Promise<DirectoryEntry[]> {
    try {
        const { searchEntries } = await abortable(
            () => client.search(baseDn, { scope: 'sub', filter, attributes }),
            context.signal
        );
        return searchEntries;
    } catch (error) {
        if (context.signal?.aborted) {
            throw error;
        }
        throw DirectoryError.fromClientError(error, 'search');
    }
}

// =============================================================================
// Lookups
// =============================================================================

/**
 * Username of the account registered for an enrollment identifier.
 *
 * @returns null when no account exists
 * @throws DirectoryError - missing-attribute if the matching entry has no uid
 */
export async function findByIdentifier(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    identifier: string,
    context: DirectoryOperationContext = {}
): Promise<string | null> {
    const filter = equalityFilter(config.identifierAttribute, identifier);
    const entries = await search(client, config.baseDn, filter, [Attributes.UID], context);

    if (entries.length === 0) {
        return null;
    }

    const username = readAttribute(entries[0], Attributes.UID);
    if (username === null) {
        throw new DirectoryError(
            'missing-attribute',
            `Entry ${entries[0].dn} matches the identifier but has no ${Attributes.UID}`
        );
    }
    return username;
}

export async function usernameTaken(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    candidate: string,
    context: DirectoryOperationContext = {}
): Promise<boolean> {
    const filter = equalityFilter(Attributes.UID, candidate);
    const entries = await search(client, config.baseDn, filter, [Attributes.NO_ATTRIBUTES], context);
    return entries.length > 0;
}

/**
 * First username candidate not yet in use.
 *
 * @throws DirectoryError - no-available-username when every candidate is
 *         taken. With dozens of candidates this usually means lookups are
 *         misbehaving, so operators should check the directory first.
 */
export async function firstAvailableUsername(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    name: CanonicalName,
    context: DirectoryOperationContext = {}
): Promise<string> {
    for (const candidate of usernameCandidates(name)) {
        if (!(await usernameTaken(client, config, candidate, context))) {
            return candidate;
        }
    }

    context.logger?.warn('No username candidate available', { tokens: name.tokens.length });
    throw new DirectoryError('no-available-username', 'Every username candidate is taken');
}

/**
 * Whether an identifier is already registered and, if not, the username
 * the new account would get.
 */
export async function probeRegistration(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    identifier: string,
    name: CanonicalName,
    context: DirectoryOperationContext = {}
): Promise<DirectoryLookupOutcome> {
    const existing = await findByIdentifier(client, config, identifier, context);
    if (existing !== null) {
        return { type: 'AlreadyRegistered', username: existing };
    }

    const username = await firstAvailableUsername(client, config, name, context);
    return { type: 'SlotAvailable', username };
}
