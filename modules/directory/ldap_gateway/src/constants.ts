/**
 * Student Provisioning - Directory Schema Constants
 *
 * Object classes, attribute names and fixed policy values of student
 * entries. Downstream systems (lab logins, Samba, mail) read these exact
 * values; change them only together with those systems.
 */

export const STUDENT_OBJECT_CLASSES = [
    'dcc',
    'dccAluno',
    'sambaSamAccount',
    'shadowAccount',
    'posixAccount',
    'inetOrgPerson',
] as const;

export const SAMBA_DOMAIN_FILTER = '(objectClass=sambaDomain)';

export const Attributes = {
    UID: 'uid',
    UID_NUMBER: 'uidNumber',
    NEXT_RID: 'sambaNextRid',
    /** Requests no attributes, existence checks only (RFC 4511 Section 4.5.1.8) */
    NO_ATTRIBUTES: '1.1',
} as const;

// =============================================================================
// Password Aging
// =============================================================================

export const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Offset of sambaKickoffTime and sambaPwdMustChange from now, in seconds.
 * Written as hours * days * minutes * seconds: 3600 days, a little short
 * of the ten years it is meant to be. Kept as is; other systems compare
 * against the stored values.
 */
export const SAMBA_KICKOFF_OFFSET_SECONDS = 3600 * 24 * 60 * 60;

/** Renewal day = shadowLastChange + this many days */
export const RENEWAL_OFFSET_DAYS = 3600;

/**
 * Shadow policy: lab access never expires, the account never locks after
 * password expiry, and the password may be changed at any time.
 */
export const SHADOW_POLICY = {
    shadowExpire: '-1',
    shadowFlag: '-1',
    shadowInactive: '-1',
    shadowMax: '3600',
    shadowMin: '0',
    shadowWarning: '14',
} as const;

/** New accounts are never lab monitors */
export const MONITOR_FLAG = '0';
