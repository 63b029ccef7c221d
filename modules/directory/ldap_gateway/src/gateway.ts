/**
 * Student Provisioning - Directory Gateway
 *
 * Session-scoped entry points used by the registration workflow. Each
 * call opens its own session, so concurrent calls never share a
 * connection.
 */

import type { AccountHolder, CanonicalName } from '@provisioner/shared';
import { createAccount } from './create-account';
import { allocateIds } from './allocation';
import { probeRegistration } from './lookup';
import { createLdapClient, withDirectorySession } from './session';
import type {
    AccountDefaults,
    DirectoryClientFactory,
    DirectoryEnvConfig,
    DirectoryLookupOutcome,
    DirectoryOperationContext,
    ProvisionedAccount,
} from './types';

export interface DirectoryGatewayOptions {
    createClient?: DirectoryClientFactory;
    clock?: () => Date;
    /** Jitter source for allocation backoff */
    random?: () => number;
}

export class DirectoryGateway {
    private readonly config: DirectoryEnvConfig;
    private readonly defaults: AccountDefaults;
    private readonly createClient: DirectoryClientFactory;
    private readonly clock: () => Date;
    private readonly random: () => number;

    constructor(config: DirectoryEnvConfig, defaults: AccountDefaults, options: DirectoryGatewayOptions = {}) {
        this.config = config;
        this.defaults = defaults;
        this.createClient = options.createClient ?? createLdapClient;
        this.clock = options.clock ?? (() => new Date());
        this.random = options.random ?? Math.random;
    }

    probeRegistration(
        identifier: string,
        name: CanonicalName,
        context: DirectoryOperationContext = {}
    ): Promise<DirectoryLookupOutcome> {
        return withDirectorySession(
            this.config,
            this.createClient,
            (client) => probeRegistration(client, this.config, identifier, name, context),
            context
        );
    }

    /**
     * Reserve ids and create the entry within one session.
     */
    provisionAccount(
        username: string,
        holder: AccountHolder,
        context: DirectoryOperationContext = {}
    ): Promise<ProvisionedAccount> {
        return withDirectorySession(
            this.config,
            this.createClient,
            async (client) => {
                const allocation = await allocateIds(client, this.config, context, this.random);
                const entry = await createAccount(
                    client,
                    this.config,
                    this.defaults,
                    { username, allocation, holder, now: this.clock() },
                    context
                );
                context.logger?.info('Directory entry created', { dn: entry.dn, ...allocation });
                return { username, dn: entry.dn, ...allocation };
            },
            context
        );
    }
}
