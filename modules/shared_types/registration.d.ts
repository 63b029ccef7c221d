/**
 * Student Provisioning - Inbound Registration Payloads
 *
 * Raw, untrusted shapes accepted by the front end. Every field is a string
 * exactly as typed by the student; nothing here has been validated.
 */

/**
 * Self-service registration request.
 * `identifier`, `date`, `time` and `signatureCode` come from the
 * "regularly enrolled" document and are authenticated against the portal.
 */
export interface RegistrationPayload {
    /** Enrollment identifier, 9 digits */
    identifier: string;
    /** Document issuance date, e.g. `25/12/2025` */
    date: string;
    /** Document issuance time, e.g. `23:59` */
    time: string;
    /** Signature code, `XXXX.XXXX.XXXX.XXXX.XXXX.XXXX.XXXX.XXXX` */
    signatureCode: string;
    /** Full name; must match the portal's record up to accents, case and particles */
    name: string;
    /** External (non-institutional) e-mail address */
    email: string;
    /** Brazilian phone number */
    phone: string;
    /** Plaintext password. Wrapped in a Secret as soon as it is parsed. */
    password: string;
}

/**
 * Operator-driven provisioning without document verification.
 * The operator chooses the username.
 */
export interface ManualProvisioningPayload {
    username: string;
    identifier: string;
    name: string;
    email: string;
    phone: string;
    password: string;
}
