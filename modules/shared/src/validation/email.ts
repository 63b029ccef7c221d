/**
 * Student Provisioning - Email Validation
 *
 * Mailbox validation and normalization for the student's external address.
 *
 * Accepts the RFC 5322 `addr-spec` forms seen in practice:
 * - dot-atom local parts, including UTF-8 letters (RFC 6531)
 * - quoted local parts, which may contain `@` and spaces
 * - hostname domains and bracketed domain literals
 *
 * The domain is lowercased; the local part keeps its case, since only the
 * receiving server may interpret it.
 *
 * @see RFC 5322 Section 3.4.1 - Addr-Spec Specification
 * @see RFC 5321 Section 4.5.3.1 - Size Limits
 */

// =============================================================================
// Constants
// =============================================================================

/** Maximum allowed email length per RFC 5321 Section 4.5.3.1.3 */
const MAX_EMAIL_LENGTH = 254;

/** Maximum local part length per RFC 5321 Section 4.5.3.1.1 */
const MAX_LOCAL_PART_LENGTH = 64;

/**
 * atext: anything but controls, space and the RFC 5322 specials.
 * Code points above ASCII are allowed.
 */
const DOT_ATOM_REGEX = /^[^\x00-\x20\x7f"(),.:;<>@[\\\]]+(?:\.[^\x00-\x20\x7f"(),.:;<>@[\\\]]+)*$/u;

/** quoted-string without folding whitespace */
const QUOTED_STRING_REGEX = /^"(?:[^"\\\r\n]|\\[^\r\n])*"$/u;

const HOSTNAME_REGEX = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/;

const DOMAIN_LITERAL_REGEX = /^\[[^[\]\\\r\n]*\]$/;

// =============================================================================
// Email Validation
// =============================================================================

/**
 * Split a mailbox into local part and domain.
 * The domain can never contain `@`, so the last one is the separator.
 */
function splitMailbox(email: string): { localPart: string; domain: string } | null {
    const atIndex = email.lastIndexOf('@');
    if (atIndex <= 0 || atIndex === email.length - 1) {
        return null;
    }
    return {
        localPart: email.substring(0, atIndex),
        domain: email.substring(atIndex + 1),
    };
}

function isValidLocalPart(localPart: string): boolean {
    if ([...localPart].length > MAX_LOCAL_PART_LENGTH) {
        return false;
    }
    return DOT_ATOM_REGEX.test(localPart) || QUOTED_STRING_REGEX.test(localPart);
}

function isValidDomain(domain: string): boolean {
    return HOSTNAME_REGEX.test(domain) || DOMAIN_LITERAL_REGEX.test(domain);
}

/**
 * Normalize an email address.
 *
 * Surrounding whitespace is removed and the domain is lowercased.
 *
 * @returns The canonical address, or null if it is not a valid mailbox
 *
 * @example
 * ```typescript
 * normalizeEmail('  JoSe@Exemplo.Com  '); // 'JoSe@exemplo.com'
 * normalizeEmail('"jose@joao"@email.com'); // '"jose@joao"@email.com'
 * normalizeEmail('jose@joao@email.com'); // null
 * ```
 */
export function normalizeEmail(email: string): string | null {
    const trimmed = email.trim();
    if (trimmed.length === 0 || [...trimmed].length > MAX_EMAIL_LENGTH) {
        return null;
    }

    const parts = splitMailbox(trimmed);
    if (!parts) {
        return null;
    }

    if (!isValidLocalPart(parts.localPart) || !isValidDomain(parts.domain)) {
        return null;
    }

    return `${parts.localPart}@${parts.domain.toLowerCase()}`;
}
