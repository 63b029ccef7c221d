/**
 * Student Provisioning - Error Module
 *
 * @module errors
 */

export { RegistrationErrors, RegistrationFields } from './registration-error-codes';

export type { RegistrationErrorCode, RegistrationField } from './registration-error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export {
    ErrorMessages,
    invalidFieldMessage,
    otherProgramMessage,
    alreadyRegisteredMessage,
    nameMismatchMessage,
} from './error-messages';

export { RegistrationError } from './registration-error';

export type { RegistrationFailure } from './registration-error';
