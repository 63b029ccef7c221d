/**
 * Student Provisioning - Student Registration
 *
 * Self-service registration workflow, operator provisioning and the
 * Lambda front end.
 */

export { registerStudent, reconcile } from './orchestrator';

export { provisionWithoutDocument } from './manual-provisioning';
export type { ManualProvisioningOptions } from './manual-provisioning';

export { toRegistrationError } from './failures';

export { createRegistrationHandler, handler } from './handler';
export type { HandlerDependencies, RegistrationHandler } from './handler';

export { parseRegistrationBody } from './body-parser';
export type { BodyParseResult } from './body-parser';

export { registrationErrorResponse, statusFor } from './responses';

export type {
    DirectoryPort,
    DocumentVerifierPort,
    RegistrationDependencies,
    RegistrationOptions,
    RegistrationResult,
    RegistrationState,
} from './types';
