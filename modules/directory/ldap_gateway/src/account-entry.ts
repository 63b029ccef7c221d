/**
 * Student Provisioning - Student Entry Construction
 *
 * Builds the single multi-schema entry (inetOrgPerson, posixAccount,
 * shadowAccount, sambaSamAccount and the institution's own classes) that
 * makes up a student account.
 */

import { DN } from 'ldapts';
import type { AccountHolder } from '@provisioner/shared';
import { transliterate } from '@provisioner/shared';
import {
    MONITOR_FLAG,
    RENEWAL_OFFSET_DAYS,
    SAMBA_KICKOFF_OFFSET_SECONDS,
    SECONDS_PER_DAY,
    SHADOW_POLICY,
    STUDENT_OBJECT_CLASSES,
} from './constants';
import type { AccountDefaults, DirectoryAllocation, DirectoryEnvConfig } from './types';

export interface PasswordHashes {
    /** `{SSHA}` value for userPassword */
    salted: string;
    /** Uppercase NT hash for sambaNTPassword */
    legacy: string;
}

export interface AccountEntry {
    dn: string;
    attributes: Record<string, string[]>;
}

/**
 * DN of a student entry; ldapts escapes the RDN value.
 */
export function accountDn(username: string, config: DirectoryEnvConfig): string {
    return `${new DN({ uid: username }).toString()},${config.accountsDn}`;
}

/**
 * Password-aging values derived from the creation instant.
 */
export function agingTimestamps(now: Date): {
    pwdLastSet: string;
    kickoff: string;
    lastChangeDay: string;
    renewalDay: string;
} {
    const seconds = Math.floor(now.getTime() / 1000);
    const day = Math.floor(seconds / SECONDS_PER_DAY);

    return {
        pwdLastSet: String(seconds),
        kickoff: String(seconds + SAMBA_KICKOFF_OFFSET_SECONDS),
        lastChangeDay: String(day),
        renewalDay: String(day + RENEWAL_OFFSET_DAYS),
    };
}

export function buildAccountEntry(params: {
    username: string;
    allocation: DirectoryAllocation;
    holder: Omit<AccountHolder, 'secret'>;
    hashes: PasswordHashes;
    defaults: AccountDefaults;
    config: DirectoryEnvConfig;
    now: Date;
}): AccountEntry {
    const { username, allocation, holder, hashes, defaults, config, now } = params;
    const [givenName, ...surnames] = holder.name.split(/\s+/).filter((token) => token.length > 0);
    const aging = agingTimestamps(now);

    const attributes: Record<string, string[]> = {
        objectClass: [...STUDENT_OBJECT_CLASSES],
        [config.identifierAttribute]: [holder.identifier],
        uid: [username],
        uidNumber: [allocation.uidNumber],
        gidNumber: [defaults.gidNumber],
        homeDirectory: [`${defaults.homePrefix}${username}`],
        loginShell: [defaults.loginShell],
        mail: [`${username}@${defaults.mailDomain}`],
        emailExterno: [holder.email],
        telephoneNumber: [holder.phone],
        cn: [givenName],
        sn: [surnames.join(' ')],
        gecos: [transliterate(holder.name)],
        userPassword: [hashes.salted],

        sambaSID: [`${defaults.sambaSidPrefix}${allocation.rid}`],
        sambaAcctFlags: [defaults.sambaAcctFlags],
        sambaLMPassword: [defaults.sambaLmPassword],
        sambaNTPassword: [hashes.legacy],
        sambaPasswordHistory: [defaults.sambaPasswordHistory],
        sambaPrimaryGroupSID: [defaults.sambaPrimaryGroupSid],
        sambaPwdLastSet: [aging.pwdLastSet],
        sambaKickoffTime: [aging.kickoff],
        sambaPwdMustChange: [aging.kickoff],

        shadowLastChange: [aging.lastChangeDay],
        ...Object.fromEntries(Object.entries(SHADOW_POLICY).map(([name, value]) => [name, [value]])),

        cota: [defaults.quota],
        monitor: [MONITOR_FLAG],
        dataCriacao: [aging.lastChangeDay],
        dataRenovacao: [aging.renewalDay],
    };

    return { dn: accountDn(username, config), attributes };
}
