/**
 * Student Provisioning - Account Creation
 */

import { AlreadyExistsError, Attribute } from 'ldapts';
import type { AccountHolder } from '@provisioner/shared';
import { generateSaltedHash, legacyHash } from '@provisioner/shared';
import type { AccountEntry } from './account-entry';
import { buildAccountEntry } from './account-entry';
import { DirectoryError } from './errors';
import { abortable } from './session';
import type {
    AccountDefaults,
    DirectoryAllocation,
    DirectoryClient,
    DirectoryEnvConfig,
    DirectoryOperationContext,
} from './types';

/**
 * Add the student entry in a single operation, so either the whole
 * account exists afterwards or nothing was written.
 *
 * @throws DirectoryError - account-creation-conflict (retryable) if the
 *         entry already exists, typically a concurrent registration that
 *         picked the same username
 */
export async function createAccount(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    defaults: AccountDefaults,
    params: { username: string; allocation: DirectoryAllocation; holder: AccountHolder; now: Date },
    context: DirectoryOperationContext = {}
): Promise<AccountEntry> {
    const { username, allocation, holder, now } = params;

    const entry = buildAccountEntry({
        username,
        allocation,
        holder,
        hashes: {
            salted: generateSaltedHash(holder.secret),
            legacy: await legacyHash(holder.secret),
        },
        defaults,
        config,
        now,
    });

    const attributes = Object.entries(entry.attributes).map(
        ([type, values]) => new Attribute({ type, values })
    );

    try {
        await abortable(() => client.add(entry.dn, attributes), context.signal);
    } catch (error) {
        if (context.signal?.aborted) {
            throw error;
        }
        if (error instanceof AlreadyExistsError) {
            throw new DirectoryError('account-creation-conflict', `Entry ${entry.dn} already exists`, { cause: error });
        }
        throw DirectoryError.fromClientError(error, 'add');
    }

    return entry;
}
