/**
 * REG-01: Registration Workflow
 *
 * The portal check and the directory probe run together; their outcomes
 * are reconciled into one decision before anything is written.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditLogger, RegistrationError, Secret } from '@provisioner/shared';
import { DirectoryError } from '@provisioner/ldap-gateway';
import type { DirectoryLookupOutcome } from '@provisioner/ldap-gateway';
import { PortalContractError, PortalTransportError } from '@provisioner/document-portal';
import type { DocumentQuery, PortalOperationContext, VerificationOutcome } from '@provisioner/document-portal';
import { registerStudent } from '@provisioner/student-registration';
import type { RegistrationState } from '@provisioner/student-registration';
import { OFFICIAL_NAME, SIGNATURE_CODE, payload } from '../../fixtures';
import { ENROLLED, SLOT_AVAILABLE, accountFor, stubDirectory, stubVerifier } from '../../support/fake-ports';

async function failureOf(pending: Promise<unknown>): Promise<RegistrationError> {
  const error = await pending.then(
    () => new Error('Expected the registration to fail'),
    (e: unknown) => e
  );
  if (error instanceof RegistrationError) {
    return error;
  }
  throw error;
}

describe('REG-01: Registration Workflow', () => {
  describe('scenarios', () => {
    it('should register an enrolled student with a free username', async () => {
      const verifier = stubVerifier(ENROLLED);
      const directory = stubDirectory(SLOT_AVAILABLE);

      const account = await registerStudent(payload(), { verifier, directory });

      expect(account).toEqual(accountFor('joaocps'));
      expect(verifier.verifyDocument).toHaveBeenCalledWith(
        { identifier: '123456789', date: '01/03/2025', time: '09:05', signatureCode: SIGNATURE_CODE },
        expect.anything()
      );
      expect(directory.probeRegistration).toHaveBeenCalledWith(
        '123456789',
        { tokens: ['joao', 'carlos', 'pereira', 'silva'] },
        expect.anything()
      );
      expect(directory.provisionAccount).toHaveBeenCalledWith(
        'joaocps',
        expect.objectContaining({ identifier: '123456789', name: 'João Carlos Pereira da Silva' }),
        expect.anything()
      );
    });

    it('should reject an already registered identifier whatever the portal says', async () => {
      const directory = stubDirectory({ type: 'AlreadyRegistered', username: 'joaocps' });

      for (const outcome of [ENROLLED, { type: 'DocumentUnrecognized' } as const]) {
        const failure = await failureOf(registerStudent(payload(), { verifier: stubVerifier(outcome), directory }));

        expect(failure.failure).toEqual({ code: 'already_registered', username: 'joaocps' });
      }
      expect(directory.provisionAccount).not.toHaveBeenCalled();
    });

    it('should reject a student of another program even with a free username', async () => {
      const verifier = stubVerifier({
        type: 'MatchedOtherProgram',
        officialName: OFFICIAL_NAME,
        programName: 'Engenharia Civil',
      });
      const directory = stubDirectory(SLOT_AVAILABLE);

      const failure = await failureOf(registerStudent(payload(), { verifier, directory }));

      expect(failure.failure).toEqual({ code: 'other_program', program: 'Engenharia Civil' });
      expect(failure.message).toBe('Alunos de Engenharia Civil não têm direito a esta conta');
      expect(directory.provisionAccount).not.toHaveBeenCalled();
    });

    it('should reject a name that differs from the official record', async () => {
      const verifier = stubVerifier({ type: 'MatchedEnrolledStudent', officialName: 'Joao Carlos Silva' });
      const directory = stubDirectory({ type: 'SlotAvailable', username: 'joaos' });

      const failure = await failureOf(registerStudent(payload({ name: 'Joao Silva' }), { verifier, directory }));

      expect(failure.failure).toEqual({ code: 'name_mismatch', reported: 'Joao Silva', official: 'Joao Carlos Silva' });
      expect(directory.provisionAccount).not.toHaveBeenCalled();
    });

    it('should accept a name that differs only in accents, case and particles', async () => {
      const verifier = stubVerifier({ type: 'MatchedEnrolledStudent', officialName: 'JOAO CARLOS PEREIRA SILVA' });

      await expect(registerStudent(payload(), { verifier, directory: stubDirectory() })).resolves.toMatchObject({
        username: 'joaocps',
      });
    });
  });

  describe('precedence', () => {
    it('should report a directory failure before anything else', async () => {
      const failure = await failureOf(registerStudent(payload(), {
        verifier: stubVerifier(new PortalTransportError('Portal GET timed out')),
        directory: stubDirectory(new DirectoryError('connection', 'Could not bind to the directory')),
      }));

      expect(failure.failure).toEqual({ code: 'directory_failure', retryable: false });
    });

    it('should report an existing registration over a portal failure', async () => {
      const failure = await failureOf(registerStudent(payload(), {
        verifier: stubVerifier(new PortalContractError('ambiguous-outcome', 'both markers')),
        directory: stubDirectory({ type: 'AlreadyRegistered', username: 'jcps' }),
      }));

      expect(failure.failure).toEqual({ code: 'already_registered', username: 'jcps' });
    });

    it('should report a portal failure when the directory has a slot', async () => {
      const failure = await failureOf(registerStudent(payload(), {
        verifier: stubVerifier(new PortalContractError('unexpected-field-count', 'two fields')),
        directory: stubDirectory(),
      }));

      expect(failure.failure).toEqual({ code: 'portal_failure' });
      expect(failure.cause).toBeInstanceOf(PortalContractError);
    });

    it('should reject an unrecognized document', async () => {
      const failure = await failureOf(registerStudent(payload(), {
        verifier: stubVerifier({ type: 'DocumentUnrecognized' }),
        directory: stubDirectory(),
      }));

      expect(failure.failure).toEqual({ code: 'document_invalid' });
    });

    it('should treat an unparseable official name as a mismatch', async () => {
      const failure = await failureOf(registerStudent(payload(), {
        verifier: stubVerifier({ type: 'MatchedEnrolledStudent', officialName: 'JOAO 2' }),
        directory: stubDirectory(),
      }));

      expect(failure.failure).toEqual({
        code: 'name_mismatch',
        reported: 'João Carlos Pereira da Silva',
        official: 'JOAO 2',
      });
    });

    it('should let errors outside the taxonomy through unchanged', async () => {
      const bug = new TypeError('undefined is not a function');

      await expect(registerStudent(payload(), {
        verifier: stubVerifier(bug),
        directory: stubDirectory(),
      })).rejects.toBe(bug);
    });
  });

  describe('validation', () => {
    it('should stop at the first invalid field without external calls', async () => {
      const verifier = stubVerifier();
      const directory = stubDirectory();

      const failure = await failureOf(registerStudent(payload({ phone: '1234' }), { verifier, directory }));

      expect(failure.failure).toEqual({ code: 'invalid_field', field: 'phone', value: '1234' });
      expect(verifier.verifyDocument).not.toHaveBeenCalled();
      expect(directory.probeRegistration).not.toHaveBeenCalled();
    });
  });

  describe('concurrency', () => {
    it('should start both checks before either settles', async () => {
      let release: (outcome: DirectoryLookupOutcome) => void = () => undefined;
      const verifier = stubVerifier();
      const directory = {
        ...stubDirectory(),
        probeRegistration: vi.fn(() => new Promise<DirectoryLookupOutcome>((resolve) => {
          release = resolve;
        })),
      };

      const pending = registerStudent(payload(), { verifier, directory });

      expect(verifier.verifyDocument).toHaveBeenCalledTimes(1);
      expect(directory.probeRegistration).toHaveBeenCalledTimes(1);
      release(SLOT_AVAILABLE);
      await expect(pending).resolves.toMatchObject({ username: 'joaocps' });
    });
  });

  describe('state machine', () => {
    it('should walk through every state on success', async () => {
      const states: RegistrationState[] = [];

      await registerStudent(
        payload(),
        { verifier: stubVerifier(), directory: stubDirectory() },
        { onTransition: (state) => states.push(state) }
      );

      expect(states).toEqual(['Validating', 'AwaitingExternalChecks', 'Reconciling', 'Provisioning', 'Done']);
    });

    it('should end in Failed from reconciliation', async () => {
      const states: RegistrationState[] = [];

      await registerStudent(
        payload(),
        { verifier: stubVerifier({ type: 'DocumentUnrecognized' }), directory: stubDirectory() },
        { onTransition: (state) => states.push(state) }
      ).catch(() => undefined);

      expect(states).toEqual(['Validating', 'AwaitingExternalChecks', 'Reconciling', 'Failed']);
    });

    it('should end in Failed from validation', async () => {
      const states: RegistrationState[] = [];

      await registerStudent(
        payload({ identifier: '' }),
        { verifier: stubVerifier(), directory: stubDirectory() },
        { onTransition: (state) => states.push(state) }
      ).catch(() => undefined);

      expect(states).toEqual(['Validating', 'Failed']);
    });
  });

  describe('cancellation', () => {
    it('should cancel before any external call when already aborted', async () => {
      const controller = new AbortController();
      controller.abort(new Error('client went away'));
      const verifier = stubVerifier();

      const failure = await failureOf(registerStudent(
        payload(),
        { verifier, directory: stubDirectory() },
        { signal: controller.signal }
      ));

      expect(failure.failure).toEqual({ code: 'cancelled' });
      expect(verifier.verifyDocument).not.toHaveBeenCalled();
    });

    it('should cancel while the checks are running and never reconcile', async () => {
      const controller = new AbortController();
      const verifier = {
        verifyDocument: vi.fn((_query: DocumentQuery, context?: PortalOperationContext) => {
          const signal = context?.signal;
          return new Promise<VerificationOutcome>((_resolve, reject) => {
            if (signal) {
              signal.addEventListener('abort', () => reject(signal.reason), { once: true });
            }
          });
        }),
      };
      const directory = stubDirectory();
      const states: RegistrationState[] = [];

      const pending = registerStudent(
        payload(),
        { verifier, directory },
        { signal: controller.signal, onTransition: (state) => states.push(state) }
      );
      controller.abort(new Error('client went away'));
      const failure = await failureOf(pending);

      expect(failure.failure).toEqual({ code: 'cancelled' });
      expect(states).toEqual(['Validating', 'AwaitingExternalChecks', 'Failed']);
      expect(directory.provisionAccount).not.toHaveBeenCalled();
    });

    it('should finish provisioning once it has started', async () => {
      const controller = new AbortController();
      const directory = stubDirectory(SLOT_AVAILABLE, async (username) => {
        controller.abort(new Error('client went away'));
        return accountFor(username);
      });

      await expect(registerStudent(
        payload(),
        { verifier: stubVerifier(), directory },
        { signal: controller.signal }
      )).resolves.toEqual(accountFor('joaocps'));
    });
  });

  describe('provisioning', () => {
    it('should report directory contention during provisioning as retryable', async () => {
      const directory = stubDirectory(SLOT_AVAILABLE, async () => {
        throw new DirectoryError('allocation-exhausted', 'Could not reserve ids after 5 attempts');
      });

      const failure = await failureOf(registerStudent(payload(), { verifier: stubVerifier(), directory }));

      expect(failure.failure).toEqual({ code: 'directory_failure', retryable: true });
      expect(failure.retryable).toBe(true);
    });

    it('should wipe the password after success', async () => {
      const directory = stubDirectory();

      await registerStudent(payload(), { verifier: stubVerifier(), directory });

      const holder = directory.provisionAccount.mock.calls[0]?.[1];
      expect(holder?.secret.isWiped).toBe(true);
    });

    it('should wipe the password after a rejection', async () => {
      const wipe = vi.spyOn(Secret.prototype, 'wipe');

      await registerStudent(payload(), {
        verifier: stubVerifier({ type: 'DocumentUnrecognized' }),
        directory: stubDirectory(),
      }).catch(() => undefined);

      expect(wipe).toHaveBeenCalledTimes(1);
    });
  });

  describe('audit', () => {
    it('should audit the request and the provisioned account', async () => {
      const audit = new AuditLogger({ requestId: 'req-1', ip: '127.0.0.1' });
      const requested = vi.spyOn(audit, 'registrationRequested');
      const provisioned = vi.spyOn(audit, 'userProvisioned');

      await registerStudent(payload(), { verifier: stubVerifier(), directory: stubDirectory(), audit });

      const actor = { type: 'STUDENT', identifier: '123456789' };
      expect(requested).toHaveBeenCalledWith(actor);
      expect(provisioned).toHaveBeenCalledWith(actor, { username: 'joaocps', uidNumber: '1001', rid: '5001' });
    });

    it('should audit a rejection with its code', async () => {
      const audit = new AuditLogger({ requestId: 'req-1', ip: '127.0.0.1' });
      const rejected = vi.spyOn(audit, 'registrationRejected');

      await registerStudent(payload(), {
        verifier: stubVerifier(),
        directory: stubDirectory({ type: 'AlreadyRegistered', username: 'jcps' }),
        audit,
      }).catch(() => undefined);

      expect(rejected).toHaveBeenCalledWith(
        { type: 'STUDENT', identifier: '123456789' },
        { code: 'already_registered', retryable: false }
      );
    });

    it('should audit an invalid payload as anonymous', async () => {
      const audit = new AuditLogger({ requestId: 'req-1', ip: '127.0.0.1' });
      const rejected = vi.spyOn(audit, 'registrationRejected');

      await registerStudent(payload({ identifier: 'abc' }), {
        verifier: stubVerifier(),
        directory: stubDirectory(),
        audit,
      }).catch(() => undefined);

      expect(rejected).toHaveBeenCalledWith({ type: 'ANONYMOUS' }, { code: 'invalid_field', retryable: false });
    });
  });
});
