/**
 * Student Provisioning - Field Normalization
 *
 * Each normalizer takes the raw string typed by the student and returns
 * the canonical representation used by the portal and the directory, or
 * null when the input is not valid. Surrounding whitespace is tolerated
 * everywhere.
 *
 * Canonical outputs are fixed points: feeding one back into its
 * normalizer returns it unchanged.
 */

import { MAX_USERNAME_LENGTH, NAME_PARTICLES } from '../constants';
import { canonicalize } from './name';

// =============================================================================
// Patterns
// =============================================================================

const IDENTIFIER_REGEX = /^\s*(\d{9})\s*$/;

/** `1/1/25`, `01 / 01 / 2025` */
const SLASHED_DATE_REGEX = /^\s*(\d{1,2})\s*\/\s*(\d{1,2})\s*\/\s*(\d{1,4})\s*$/;

/** `01012025`, `01 01 2025` */
const COMPACT_DATE_REGEX = /^\s*(\d{2})\s*(\d{2})\s*(\d{4})\s*$/;

const TIME_REGEX = /^\s*(\d{1,2})\s*:\s*(\d{1,2})\s*$/;

const SIGNATURE_GROUP = '([0-9A-F]{4})';
const SIGNATURE_SEPARATOR = '\\s*\\.\\s*';
const SIGNATURE_CODE_REGEX = new RegExp(
    `^\\s*${Array<string>(8).fill(SIGNATURE_GROUP).join(SIGNATURE_SEPARATOR)}\\s*$`
);

/** Optional +55, area code with optional 0 and parentheses, 8 or 9 digit number */
const PHONE_REGEX = /^\s*(?:\+55)?\s*(?:\(\s*0?(\d{2})\s*\)|0?(\d{2}))\s*(\d{4,5})\s*-?\s*(\d{4})\s*$/;

const USERNAME_REGEX = /^[a-z][a-z0-9]*$/;

/** Years written with fewer than four digits are in this century */
const CENTURY = 2000;

// =============================================================================
// Document Fields
// =============================================================================

/**
 * @example normalizeIdentifier(' 123456789 ') // '123456789'
 */
export function normalizeIdentifier(raw: string): string | null {
    const match = IDENTIFIER_REGEX.exec(raw);
    return match ? match[1] : null;
}

/**
 * Issuance date as `dd/mm/yyyy`.
 *
 * @example
 * ```typescript
 * normalizeDate('1 / 1 / 25'); // '01/01/2025'
 * normalizeDate('25 12 2002'); // '25/12/2002'
 * normalizeDate('25 12 02'); // null
 * ```
 */
export function normalizeDate(raw: string): string | null {
    const match = SLASHED_DATE_REGEX.exec(raw) ?? COMPACT_DATE_REGEX.exec(raw);
    if (!match) {
        return null;
    }

    const day = match[1].padStart(2, '0');
    const month = match[2].padStart(2, '0');
    const parsedYear = parseInt(match[3], 10);
    const year = parsedYear < 1000 ? parsedYear + CENTURY : parsedYear;

    return `${day}/${month}/${year}`;
}

/**
 * Issuance time as `HH:MM`. Ranges are not checked: `24:00` and `12:60`
 * are accepted.
 */
export function normalizeTime(raw: string): string | null {
    const match = TIME_REGEX.exec(raw);
    if (!match) {
        return null;
    }
    return `${match[1].padStart(2, '0')}:${match[2].padStart(2, '0')}`;
}

/**
 * Document signature code, eight dot-separated groups of four uppercase
 * hexadecimal digits. Lowercase is rejected.
 */
export function normalizeSignatureCode(raw: string): string | null {
    const match = SIGNATURE_CODE_REGEX.exec(raw);
    if (!match) {
        return null;
    }
    return match.slice(1, 9).join('.');
}

// =============================================================================
// Personal Fields
// =============================================================================

function capitalize(token: string): string {
    const [first, ...rest] = [...token];
    return first.toUpperCase() + rest.join('');
}

/**
 * Full name, capitalized per word with particles in lowercase.
 * Accents are kept.
 *
 * @example normalizeName('josé da     silva') // 'José da Silva'
 */
export function normalizeName(raw: string): string | null {
    if (!canonicalize(raw).valid) {
        return null;
    }

    return raw
        .toLowerCase()
        .split(/\s+/)
        .filter((token) => token.length > 0)
        .map((token) => (NAME_PARTICLES.includes(token) ? token : capitalize(token)))
        .join(' ');
}

/**
 * Brazilian phone number as `+55` + area code + subscriber number.
 *
 * @example normalizePhone('(021) 98765-4321') // '+5521987654321'
 */
export function normalizePhone(raw: string): string | null {
    const match = PHONE_REGEX.exec(raw);
    if (!match) {
        return null;
    }
    const areaCode = match[1] ?? match[2];
    return `+55${areaCode}${match[3]}${match[4]}`;
}

/**
 * Operator-chosen username: lowercase letter first, then lowercase letters
 * or digits, shorter than 20 characters.
 */
export function normalizeUsername(raw: string): string | null {
    const trimmed = raw.trim();
    if (trimmed.length >= MAX_USERNAME_LENGTH || !USERNAME_REGEX.test(trimmed)) {
        return null;
    }
    return trimmed;
}
