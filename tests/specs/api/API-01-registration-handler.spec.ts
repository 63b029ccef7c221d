/**
 * API-01: Registration Handler
 *
 * POST /api/register maps every workflow outcome onto a status code and
 * a JSON error body.
 */

import { describe, it, expect, vi } from 'vitest';
import { ErrorMessages, RegistrationError } from '@provisioner/shared';
import { DirectoryError } from '@provisioner/ldap-gateway';
import { PortalTransportError } from '@provisioner/document-portal';
import type { DocumentQuery, PortalOperationContext, VerificationOutcome } from '@provisioner/document-portal';
import { createRegistrationHandler, statusFor } from '@provisioner/student-registration';
import type { HandlerDependencies } from '@provisioner/student-registration';
import { OFFICIAL_NAME, TEST_PASSWORD, payload } from '../../fixtures';
import { SLOT_AVAILABLE, stubDirectory, stubVerifier } from '../../support/fake-ports';
import { lambdaContext, parseBody, registrationEvent } from '../../support/lambda';

function post(deps: HandlerDependencies, body: unknown = payload()) {
  return createRegistrationHandler(deps)(registrationEvent({ body: JSON.stringify(body) }), lambdaContext());
}

describe('API-01: Registration Handler', () => {
  it('should answer 201 with the new username', async () => {
    const response = await post({ verifier: stubVerifier(), directory: stubDirectory() });

    expect(response.statusCode).toBe(201);
    expect(parseBody(response)).toEqual({ username: 'joaocps' });
    expect(response.headers?.['Cache-Control']).toBe('no-store');
  });

  it('should accept a base64-encoded body', async () => {
    const handler = createRegistrationHandler({ verifier: stubVerifier(), directory: stubDirectory() });

    const response = await handler(registrationEvent({
      body: Buffer.from(JSON.stringify(payload())).toString('base64'),
      isBase64Encoded: true,
    }));

    expect(response.statusCode).toBe(201);
  });

  describe('rejections', () => {
    it('should answer 422 for a malformed field', async () => {
      const response = await post({ verifier: stubVerifier(), directory: stubDirectory() }, payload({ identifier: '12345' }));

      expect(response.statusCode).toBe(422);
      expect(parseBody(response)).toEqual({
        error: 'invalid_field',
        error_description: 'O DRE "12345" não é válido',
      });
    });

    it('should answer 422 for a weak password', async () => {
      const response = await post({ verifier: stubVerifier(), directory: stubDirectory() }, payload({ password: 'senha' }));

      expect(response.statusCode).toBe(422);
      expect(parseBody(response)).toEqual({ error: 'weak_secret', error_description: ErrorMessages.WEAK_SECRET });
    });

    it('should answer 422 for a name mismatch', async () => {
      const response = await post({
        verifier: stubVerifier({ type: 'MatchedEnrolledStudent', officialName: 'MARIA SOUZA' }),
        directory: stubDirectory(),
      });

      expect(response.statusCode).toBe(422);
      expect(parseBody(response)).toMatchObject({ error: 'name_mismatch' });
    });

    it('should answer 403 for an unrecognized document', async () => {
      const response = await post({ verifier: stubVerifier({ type: 'DocumentUnrecognized' }), directory: stubDirectory() });

      expect(response.statusCode).toBe(403);
      expect(parseBody(response)).toEqual({ error: 'document_invalid', error_description: ErrorMessages.DOCUMENT_INVALID });
    });

    it('should answer 403 for a student of another program', async () => {
      const response = await post({
        verifier: stubVerifier({ type: 'MatchedOtherProgram', officialName: OFFICIAL_NAME, programName: 'Física' }),
        directory: stubDirectory(),
      });

      expect(response.statusCode).toBe(403);
      expect(parseBody(response)).toEqual({
        error: 'other_program',
        error_description: 'Alunos de Física não têm direito a esta conta',
      });
    });

    it('should answer 409 for an existing registration', async () => {
      const response = await post({
        verifier: stubVerifier(),
        directory: stubDirectory({ type: 'AlreadyRegistered', username: 'joaocps' }),
      });

      expect(response.statusCode).toBe(409);
      expect(parseBody(response)).toEqual({
        error: 'already_registered',
        error_description: 'O cadastro já existe, com o username "joaocps"',
      });
    });
  });

  describe('failures', () => {
    it('should answer 500 when the portal fails', async () => {
      const response = await post({
        verifier: stubVerifier(new PortalTransportError('Portal GET timed out')),
        directory: stubDirectory(),
      });

      expect(response.statusCode).toBe(500);
      expect(parseBody(response)).toEqual({ error: 'portal_failure', error_description: ErrorMessages.PORTAL_FAILURE });
    });

    it('should answer 503 when directory contention may clear', async () => {
      const directory = stubDirectory(SLOT_AVAILABLE, async () => {
        throw new DirectoryError('allocation-exhausted', 'Could not reserve ids after 5 attempts');
      });

      const response = await post({ verifier: stubVerifier(), directory });

      expect(response.statusCode).toBe(503);
      expect(parseBody(response)).toEqual({
        error: 'directory_failure',
        error_description: ErrorMessages.DIRECTORY_RETRY,
        retryable: true,
      });
    });

    it('should answer 500 when the directory is unavailable', async () => {
      const response = await post({
        verifier: stubVerifier(),
        directory: stubDirectory(new DirectoryError('connection', 'Directory unavailable during bind')),
      });

      expect(response.statusCode).toBe(500);
      expect(parseBody(response)).toEqual({
        error: 'directory_failure',
        error_description: ErrorMessages.DIRECTORY_FAILURE,
      });
    });

    it('should answer 500 server_error for an unexpected error', async () => {
      const response = await post({
        verifier: stubVerifier(new TypeError('undefined is not a function')),
        directory: stubDirectory(),
      });

      expect(response.statusCode).toBe(500);
      expect(parseBody(response)).toEqual({ error: 'server_error', error_description: ErrorMessages.SERVER_ERROR });
    });

    it('should cancel the workflow ahead of the Lambda deadline', async () => {
      const verifier = {
        verifyDocument: vi.fn((_query: DocumentQuery, context?: PortalOperationContext) => {
          const signal = context?.signal;
          return new Promise<VerificationOutcome>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
          });
        }),
      };
      const handler = createRegistrationHandler({ verifier, directory: stubDirectory() });

      const response = await handler(registrationEvent({ body: JSON.stringify(payload()) }), lambdaContext(1020));

      expect(response.statusCode).toBe(500);
      expect(parseBody(response)).toEqual({ error: 'cancelled', error_description: ErrorMessages.CANCELLED });
    });
  });

  describe('request shape', () => {
    it('should answer 405 to anything but POST', async () => {
      const handler = createRegistrationHandler({ verifier: stubVerifier(), directory: stubDirectory() });

      const response = await handler(registrationEvent({ method: 'GET' }));

      expect(response.statusCode).toBe(405);
      expect(response.headers?.Allow).toBe('POST');
    });

    it('should answer 400 to a body that is not JSON', async () => {
      const handler = createRegistrationHandler({ verifier: stubVerifier(), directory: stubDirectory() });

      const response = await handler(registrationEvent({ body: '{"identifier":' }));

      expect(response.statusCode).toBe(400);
      expect(parseBody(response)).toEqual({
        error: 'invalid_request',
        error_description: 'Corpo da requisição inválido: Body is not valid JSON',
      });
    });

    it('should answer 400 to a body with a missing field', async () => {
      const { password: _password, ...withoutPassword } = payload();

      const response = await post({ verifier: stubVerifier(), directory: stubDirectory() }, withoutPassword);

      expect(response.statusCode).toBe(400);
      expect(parseBody(response).error_description).toBe('Corpo da requisição inválido: Field password must be a string');
    });

    it('should answer 400 to an empty body', async () => {
      const handler = createRegistrationHandler({ verifier: stubVerifier(), directory: stubDirectory() });

      const response = await handler(registrationEvent());

      expect(parseBody(response).error_description).toBe('Corpo da requisição inválido: Missing request body');
    });
  });

  describe('logging', () => {
    it('should keep the password out of every log line', async () => {
      await post({ verifier: stubVerifier(), directory: stubDirectory() });
      await post({ verifier: stubVerifier({ type: 'DocumentUnrecognized' }), directory: stubDirectory() });

      const lines = vi.mocked(console.log).mock.calls.map(([line]) => String(line));
      expect(lines.length).toBeGreaterThan(0);
      expect(lines.filter((line) => line.includes(TEST_PASSWORD))).toEqual([]);
    });

    it('should audit with the forwarded client address and the Lambda request id', async () => {
      await post({ verifier: stubVerifier(), directory: stubDirectory() });

      const requested = vi.mocked(console.log).mock.calls
        .map(([line]) => JSON.parse(String(line)))
        .find((entry: Record<string, unknown>) => entry.action === 'REGISTRATION_REQUESTED');
      expect(requested).toMatchObject({
        level: 'AUDIT',
        requestId: 'lambda-request-1',
        ip: '203.0.113.7',
        actor: { type: 'STUDENT', identifier: '123456789' },
      });
    });
  });

  describe('statusFor', () => {
    it('should map retryable failures to 503 whatever their code', () => {
      expect(statusFor(RegistrationError.directoryFailure(new Error('lost race'), true))).toBe(503);
      expect(statusFor(RegistrationError.directoryFailure(new Error('down'), false))).toBe(500);
      expect(statusFor(RegistrationError.cancelled())).toBe(500);
      expect(statusFor(RegistrationError.alreadyRegistered('joaocps'))).toBe(409);
    });
  });
});
