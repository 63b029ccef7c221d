/**
 * Student Provisioning - Id Allocation
 *
 * Hands out uidNumber and Samba RID from the counters on the sambaDomain
 * entry. There is no lock: each attempt reads the counters and swaps them
 * with a single modify that deletes the old values and adds the new ones.
 * The directory applies a modify atomically and fails it when a value to
 * delete is gone, so a concurrent registration that bumped the counters
 * first makes this attempt fail, and it starts over with fresh values.
 */

import { Attribute, Change, NoSuchAttributeError } from 'ldapts';
import { calculateDelay, errorDetails, sleep } from '@provisioner/shared';
import { Attributes, SAMBA_DOMAIN_FILTER } from './constants';
import { DirectoryError } from './errors';
import { readAttribute } from './lookup';
import { abortable } from './session';
import type {
    DirectoryAllocation,
    DirectoryClient,
    DirectoryEntry,
    DirectoryEnvConfig,
    DirectoryOperationContext,
} from './types';

interface CounterSnapshot {
    dn: string;
    uidNumber: string;
    rid: string;
}

function requireCounter(entry: DirectoryEntry, attribute: string): string {
    const value = readAttribute(entry, attribute);
    if (value === null || !/^\d+$/.test(value)) {
        throw new DirectoryError('malformed-counter', `Counter ${attribute} is missing or not numeric`);
    }
    return value;
}

function increment(counter: string): string {
    return (BigInt(counter) + 1n).toString();
}

async function readCounters(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    context: DirectoryOperationContext
): Promise<CounterSnapshot> {
    let entries: DirectoryEntry[];
    try {
        ({ searchEntries: entries } = await abortable(
            () => client.search(config.baseDn, {
                scope: 'one',
                filter: SAMBA_DOMAIN_FILTER,
                attributes: [Attributes.UID_NUMBER, Attributes.NEXT_RID],
            }),
            context.signal
        ));
    } catch (error) {
        if (context.signal?.aborted) {
            throw error;
        }
        throw DirectoryError.fromClientError(error, 'counter read');
    }

    if (entries.length === 0) {
        throw new DirectoryError('malformed-counter', `No sambaDomain entry under ${config.baseDn}`);
    }

    const [entry] = entries;
    return {
        dn: entry.dn,
        uidNumber: requireCounter(entry, Attributes.UID_NUMBER),
        rid: requireCounter(entry, Attributes.NEXT_RID),
    };
}

function swapChanges(attribute: string, current: string, next: string): Change[] {
    return [
        new Change({ operation: 'delete', modification: new Attribute({ type: attribute, values: [current] }) }),
        new Change({ operation: 'add', modification: new Attribute({ type: attribute, values: [next] }) }),
    ];
}

/**
 * Reserve the next uidNumber and RID.
 *
 * A swap that fails because an old value is gone lost a race and is
 * retried. Any other failure means the directory refused the change.
 *
 * @throws DirectoryError - allocation-exhausted (retryable) after
 *         `config.allocation.maxAttempts` lost swaps, malformed-counter if
 *         the counters cannot be read, protocol or connection if the swap
 *         is refused
 */
export async function allocateIds(
    client: DirectoryClient,
    config: DirectoryEnvConfig,
    context: DirectoryOperationContext = {},
    random: () => number = Math.random
): Promise<DirectoryAllocation> {
    const { maxAttempts } = config.allocation;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const current = await readCounters(client, config, context);
        const next: DirectoryAllocation = {
            uidNumber: increment(current.uidNumber),
            rid: increment(current.rid),
        };

        try {
            await abortable(
                () => client.modify(current.dn, [
                    ...swapChanges(Attributes.UID_NUMBER, current.uidNumber, next.uidNumber),
                    ...swapChanges(Attributes.NEXT_RID, current.rid, next.rid),
                ]),
                context.signal
            );
            return next;
        } catch (error) {
            if (context.signal?.aborted) {
                throw error;
            }
            if (!(error instanceof NoSuchAttributeError)) {
                throw DirectoryError.fromClientError(error, 'counter swap');
            }
            lastError = error;
            context.logger?.info('Id counter swap lost', { attempt: attempt + 1, ...errorDetails(error) });
            context.audit?.idAllocationConflict({ attempt: attempt + 1, ...next });
        }

        const delay = calculateDelay(attempt, config.allocation, random);
        if (delay > 0 && attempt + 1 < maxAttempts) {
            await sleep(delay, context.signal);
        }
    }

    throw new DirectoryError(
        'allocation-exhausted',
        `Could not reserve ids after ${maxAttempts} attempts`,
        { cause: lastError }
    );
}
