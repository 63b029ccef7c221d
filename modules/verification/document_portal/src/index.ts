/**
 * Student Provisioning - Document Portal
 *
 * Authenticates enrollment documents against the university portal.
 */

export { DocumentVerifier } from './verifier';
export type { DocumentVerifierOptions } from './verifier';

export { extractViewState, parseValidationResult } from './parser';

export { buildValidationForm, currentMonth, VIEW_STATE_FIELD } from './form';

export { PortalContractError, PortalTransportError, isPortalError } from './errors';
export type { PortalContractViolation } from './errors';

export { getPortalConfig, clearConfigCache } from './config';

export type {
    DocumentQuery,
    PortalEnvConfig,
    PortalFetch,
    PortalOperationContext,
    PortalRequestInit,
    PortalResponse,
    VerificationOutcome,
} from './types';
