/**
 * Student Provisioning - Directory Sessions
 *
 * Scoped directory access: open a client, bind with the service
 * credentials, run the operations, and unbind on every exit path.
 */

import { Client } from 'ldapts';
import { errorDetails } from '@provisioner/shared';
import { DirectoryError } from './errors';
import type {
    DirectoryClient,
    DirectoryClientFactory,
    DirectoryEnvConfig,
    DirectoryOperationContext,
} from './types';

export const createLdapClient: DirectoryClientFactory = (config) =>
    new Client({
        url: config.url,
        timeout: config.timeoutMs,
        connectTimeout: config.connectTimeoutMs,
    });

/**
 * Start `operation` unless the signal already aborted, then settle with it
 * or reject with the signal's reason as soon as it aborts. An abandoned
 * operation's result is discarded.
 */
export async function abortable<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
        return operation();
    }
    signal.throwIfAborted();

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        operation().then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

/**
 * Run `fn` inside a bound directory session.
 *
 * @example
 * ```typescript
 * const username = await withDirectorySession(config, createLdapClient, (client) =>
 *     findByIdentifier(client, config, '123456789'),
 * );
 * ```
 */
export async function withDirectorySession<T>(
    config: DirectoryEnvConfig,
    createClient: DirectoryClientFactory,
    fn: (client: DirectoryClient) => Promise<T>,
    context: DirectoryOperationContext = {}
): Promise<T> {
    const { signal, logger } = context;
    signal?.throwIfAborted();

    const client = createClient(config);
    try {
        try {
            await abortable(() => client.bind(config.bindDn, config.bindPassword), signal);
        } catch (error) {
            if (signal?.aborted) {
                throw error;
            }
            throw new DirectoryError('connection', 'Could not bind to the directory', { cause: error });
        }

        return await fn(client);
    } finally {
        try {
            await client.unbind();
        } catch (error) {
            // Never overrides the result of fn
            logger?.warn('Directory unbind failed', errorDetails(error));
        }
    }
}
