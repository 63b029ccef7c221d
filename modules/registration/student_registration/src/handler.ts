/**
 * Student Provisioning - Registration Handler
 *
 * Lambda handler for POST /api/register
 *
 * Flow:
 * 1. Check method and decode the JSON body
 * 2. Run the registration workflow, cancelled shortly before the Lambda
 *    deadline
 * 3. Map the outcome to a status code (see responses.ts)
 *
 * Passwords never reach the logs: the body is not logged and the workflow
 * holds the password in a Secret.
 *
 * @module student_registration/handler
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    RegistrationError,
    createLogger,
    created,
    invalidRequest,
    methodNotAllowed,
    serverError,
    withContext,
} from '@provisioner/shared';
import { DirectoryGateway, getAccountDefaults, getDirectoryConfig } from '@provisioner/ldap-gateway';
import { DocumentVerifier, getPortalConfig } from '@provisioner/document-portal';
import { parseRegistrationBody } from './body-parser';
import { registerStudent } from './orchestrator';
import { registrationErrorResponse } from './responses';
import type { DirectoryPort, DocumentVerifierPort } from './types';

/** Time left for answering after the workflow is cancelled */
const DEADLINE_MARGIN_MS = 1000;

export interface HandlerDependencies {
    verifier: DocumentVerifierPort;
    directory: DirectoryPort;
}

export type RegistrationHandler = (
    event: APIGatewayProxyEventV2,
    context?: Context
) => Promise<APIGatewayProxyStructuredResultV2>;

function deadlineSignal(context?: Context): AbortSignal | undefined {
    if (!context) {
        return undefined;
    }
    return AbortSignal.timeout(Math.max(context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS, 1));
}

export function createRegistrationHandler(deps: HandlerDependencies): RegistrationHandler {
    return async (event, context) => {
        const log = createLogger(event, context);
        const audit = withContext(event, context);

        if (event.requestContext.http.method !== 'POST') {
            return methodNotAllowed('POST');
        }

        const body = parseRegistrationBody(event.body, event.isBase64Encoded);
        if (!body.valid) {
            log.warn('Rejected registration body', { reason: body.reason });
            return invalidRequest(`${ErrorMessages.INVALID_BODY}: ${body.reason}`);
        }

        try {
            const account = await registerStudent(
                body.payload,
                { ...deps, logger: log, audit },
                { signal: deadlineSignal(context) }
            );
            return created({ username: account.username });
        } catch (err) {
            if (err instanceof RegistrationError) {
                return registrationErrorResponse(err);
            }
            const error = err instanceof Error ? err : new Error(String(err));
            log.error('Registration handler error', { error: error.message, stack: error.stack });
            return serverError(ErrorMessages.SERVER_ERROR);
        }
    };
}

// =============================================================================
// Lambda Handler
// =============================================================================

let defaultHandler: RegistrationHandler | null = null;

/**
 * Wires the real portal and directory from environment configuration on
 * first invocation.
 */
export const handler: RegistrationHandler = async (event, context) => {
    if (!defaultHandler) {
        try {
            defaultHandler = createRegistrationHandler({
                verifier: new DocumentVerifier(getPortalConfig()),
                directory: new DirectoryGateway(getDirectoryConfig(), getAccountDefaults()),
            });
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            createLogger(event, context).error('Registration handler misconfigured', { error: error.message });
            return serverError(ErrorMessages.SERVER_ERROR);
        }
    }
    return defaultHandler(event, context);
};
