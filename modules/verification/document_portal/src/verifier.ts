/**
 * Student Provisioning - Document Verifier
 *
 * Authenticates a "regularly enrolled" document against the university
 * portal: GET the form to obtain a view state token, POST the document
 * fields with it, and scrape the answer. Both requests share a cookie jar,
 * since the token is bound to the portal's session cookie.
 */

import { CookieJar } from 'tough-cookie';
import { errorDetails } from '@provisioner/shared';
import { PortalTransportError } from './errors';
import { buildValidationForm } from './form';
import { extractViewState, parseValidationResult } from './parser';
import type {
    DocumentQuery,
    PortalEnvConfig,
    PortalFetch,
    PortalOperationContext,
    VerificationOutcome,
} from './types';

export interface DocumentVerifierOptions {
    fetch?: PortalFetch;
    clock?: () => Date;
}

interface PortalSession {
    jar: CookieJar;
    signal: AbortSignal;
    caller?: AbortSignal;
}

export class DocumentVerifier {
    private readonly config: PortalEnvConfig;
    private readonly fetch: PortalFetch;
    private readonly clock: () => Date;

    constructor(config: PortalEnvConfig, options: DocumentVerifierOptions = {}) {
        this.config = config;
        this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * @throws PortalContractError if the portal's pages are not as expected
     * @throws PortalTransportError on network failure, HTTP error or timeout
     */
    async verifyDocument(
        query: DocumentQuery,
        context: PortalOperationContext = {}
    ): Promise<VerificationOutcome> {
        context.signal?.throwIfAborted();

        const timeout = AbortSignal.timeout(this.config.timeoutMs);
        const session: PortalSession = {
            jar: new CookieJar(),
            signal: context.signal ? AbortSignal.any([context.signal, timeout]) : timeout,
            caller: context.signal,
        };

        const formPage = await this.request(session, this.config.formUrl, {
            method: 'GET',
            headers: {},
        });
        const viewState = extractViewState(formPage);

        const form = buildValidationForm(query, viewState, this.clock());
        const resultPage = await this.request(session, this.config.submitUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8' },
            body: form.toString(),
        });

        const outcome = parseValidationResult(resultPage, this.config.targetProgram);
        context.logger?.info('Document verified', { outcome: outcome.type });
        return outcome;
    }

    private async request(
        session: PortalSession,
        url: string,
        init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: string }
    ): Promise<string> {
        try {
            const cookie = await session.jar.getCookieString(url);
            const headers = cookie ? { ...init.headers, Cookie: cookie } : init.headers;

            const response = await this.fetch(url, { ...init, headers, signal: session.signal });

            for (const setCookie of response.headers.getSetCookie()) {
                await session.jar.setCookie(setCookie, url);
            }

            if (!response.ok) {
                throw new PortalTransportError(`Portal answered ${init.method} with HTTP ${response.status}`, {
                    status: response.status,
                });
            }

            return await response.text();
        } catch (error) {
            if (error instanceof PortalTransportError) {
                throw error;
            }
            if (session.caller?.aborted) {
                throw session.caller.reason;
            }
            if (session.signal.aborted) {
                throw new PortalTransportError(`Portal ${init.method} timed out`, { cause: error });
            }
            throw new PortalTransportError(`Portal ${init.method} failed: ${errorDetails(error).message}`, {
                cause: error,
            });
        }
    }
}
