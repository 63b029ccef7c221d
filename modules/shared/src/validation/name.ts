/**
 * Student Provisioning - Name Canonicalization
 *
 * Reduces a person's full name to a comparison-ready token sequence and
 * derives the ordered list of usernames tried for a new account.
 *
 * Canonical form:
 * - `ç`/`Ç` become `c`; other accents are stripped via NFD
 * - lowercase ASCII letters only, split on spaces
 * - particles (`de`, `da`, `do`, `dos`, `das`) removed
 * - at most 10 tokens, at least 2
 *
 * @example
 * ```typescript
 * canonicalNamesEqual(
 *   mustCanonicalize('JOSE LIMA DA SILVA'),
 *   mustCanonicalize('José Lima Silva'),
 * ); // true
 * ```
 */

import { MAX_NAME_TOKENS, MAX_USERNAME_LENGTH, MIN_NAME_TOKENS, NAME_PARTICLES } from '../constants';

// =============================================================================
// Types
// =============================================================================

export interface CanonicalName {
    readonly tokens: readonly string[];
}

export type NameError = 'InvalidCharacter' | 'TooFewWords';

export type CanonicalizeResult =
    | { valid: true; name: CanonicalName }
    | { valid: false; error: NameError };

// =============================================================================
// Canonicalization
// =============================================================================

/**
 * Strip diacritics, keeping case. Code points with no ASCII base letter
 * are dropped.
 *
 * @example transliterate('João Conceição') // 'Joao Conceicao'
 */
export function transliterate(raw: string): string {
    return raw
        .replace(/ç/g, 'c')
        .replace(/Ç/g, 'C')
        .normalize('NFD')
        .replace(/[^\x00-\x7f]/g, '');
}

export function toPlainAscii(raw: string): string {
    return transliterate(raw).toLowerCase();
}

export function canonicalize(raw: string): CanonicalizeResult {
    const sanitized = toPlainAscii(raw);

    if (!/^[a-z ]*$/.test(sanitized)) {
        return { valid: false, error: 'InvalidCharacter' };
    }

    const tokens = sanitized
        .split(' ')
        .filter((token) => token.length > 0 && !NAME_PARTICLES.includes(token))
        .slice(0, MAX_NAME_TOKENS);

    if (tokens.length < MIN_NAME_TOKENS) {
        return { valid: false, error: 'TooFewWords' };
    }

    return { valid: true, name: Object.freeze({ tokens: Object.freeze(tokens) }) };
}

/**
 * Canonicalize, or throw if the name is not valid.
 */
export function mustCanonicalize(raw: string): CanonicalName {
    const result = canonicalize(raw);
    if (!result.valid) {
        throw new Error(`Name cannot be canonicalized: ${result.error}`);
    }
    return result.name;
}

export function canonicalNamesEqual(a: CanonicalName, b: CanonicalName): boolean {
    return a.tokens.length === b.tokens.length
        && a.tokens.every((token, index) => token === b.tokens[index]);
}

// =============================================================================
// Username Candidates
// =============================================================================

/**
 * Enumerate usernames for a name, most compact first.
 *
 * Each candidate is the given name followed, per surname token, by either
 * its initial or the whole token. Choices are enumerated as a binary
 * counter in which the last surname toggles fastest and the initial comes
 * before the full token. Candidates of 20 characters or more are skipped,
 * and so are repeats, which a one-letter surname such as `E` produces.
 *
 * `JOAO CARLOS PEREIRA DA SILVA` yields `joaocps`, `joaocpsilva`,
 * `joaocpereiras`, `joaocpereirasilva`, `joaocarlosps`, ...
 */
export function* usernameCandidates(name: CanonicalName): Generator<string, void, undefined> {
    const [given, ...surnames] = name.tokens;
    const total = 1 << surnames.length;
    const seen = new Set<string>();

    for (let counter = 0; counter < total; counter++) {
        let candidate = given;
        surnames.forEach((surname, index) => {
            const full = (counter >> (surnames.length - 1 - index)) & 1;
            candidate += full ? surname : surname[0];
        });

        if (candidate.length < MAX_USERNAME_LENGTH && !seen.has(candidate)) {
            seen.add(candidate);
            yield candidate;
        }
    }
}
