/**
 * Student Provisioning - Document Portal Errors
 *
 * Contract errors mean the portal answered with something the parser does
 * not recognize, most likely after a change on the portal's side. They
 * should alert operators; they are never the student's fault.
 */

export type PortalContractViolation =
    /** The form page has no `javax.faces.ViewState` token */
    | 'missing-view-state'
    /** Both or neither of the valid/invalid markers are present */
    | 'ambiguous-outcome'
    /** A valid document did not show exactly name, registry id and program */
    | 'unexpected-field-count';

export class PortalContractError extends Error {
    readonly violation: PortalContractViolation;

    constructor(violation: PortalContractViolation, message: string) {
        super(message);
        this.name = 'PortalContractError';
        this.violation = violation;
    }
}

export class PortalTransportError extends Error {
    /** HTTP status, when the portal answered */
    readonly status?: number;

    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'PortalTransportError';
        this.status = options.status;
    }
}

export function isPortalError(error: unknown): error is PortalContractError | PortalTransportError {
    return error instanceof PortalContractError || error instanceof PortalTransportError;
}
