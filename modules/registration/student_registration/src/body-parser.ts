/**
 * Student Provisioning - JSON Body Parser
 *
 * Parses the registration body and checks its shape. Field contents are
 * validated later, by the workflow.
 */

import type { RegistrationPayload } from '../../../shared_types/registration';

const PAYLOAD_FIELDS = [
    'identifier',
    'date',
    'time',
    'signatureCode',
    'name',
    'email',
    'phone',
    'password',
] as const satisfies ReadonlyArray<keyof RegistrationPayload>;

export type BodyParseResult =
    | { valid: true; payload: RegistrationPayload }
    | { valid: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a JSON body from API Gateway.
 * Handles base64-encoded bodies.
 */
export function parseRegistrationBody(
    body: string | null | undefined,
    isBase64Encoded: boolean
): BodyParseResult {
    if (!body) {
        return { valid: false, reason: 'Missing request body' };
    }

    const decodedBody = isBase64Encoded
        ? Buffer.from(body, 'base64').toString('utf-8')
        : body;

    let parsed: unknown;
    try {
        parsed = JSON.parse(decodedBody);
    } catch {
        return { valid: false, reason: 'Body is not valid JSON' };
    }

    if (!isRecord(parsed)) {
        return { valid: false, reason: 'Body must be a JSON object' };
    }

    const record = parsed;
    const missing = PAYLOAD_FIELDS.find((field) => typeof record[field] !== 'string');
    if (missing) {
        return { valid: false, reason: `Field ${missing} must be a string` };
    }

    const field = (name: keyof RegistrationPayload): string => String(record[name]);
    return {
        valid: true,
        payload: {
            identifier: field('identifier'),
            date: field('date'),
            time: field('time'),
            signatureCode: field('signatureCode'),
            name: field('name'),
            email: field('email'),
            phone: field('phone'),
            password: field('password'),
        },
    };
}
