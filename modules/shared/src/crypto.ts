/**
 * Student Provisioning - Credential Hashing
 *
 * Derives the two password representations stored on a new account:
 * - Legacy NT hash (MD4 over UTF-16LE), for the Samba subsystem
 * - Salted SHA-1 (`{SSHA}`), for directory bind authentication
 *
 * Security Notes:
 * - Salted hash verification compares in constant time
 * - Every intermediate buffer holding secret material is zero-filled
 * - MD4 comes from hash-wasm; OpenSSL 3 no longer ships it by default
 *
 * @see RFC 2307 - userPassword schemes
 */

import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import { md4 } from 'hash-wasm';
import { SHA1_DIGEST_BYTES, SSHA_PREFIX, SSHA_SALT_BYTES } from './constants';
import type { Secret } from './secret';
import { wipeBuffers } from './secret';

// =============================================================================
// Legacy NT Hash
// =============================================================================

/**
 * Compute the NT hash used by Samba.
 *
 * @returns 32 uppercase hexadecimal characters
 *
 * @example
 * ```typescript
 * await legacyHash(new Secret('12345678')); // '259745CB123A52AA2E693AAACCA2DB52'
 * ```
 */
export async function legacyHash(secret: Secret): Promise<string> {
    const utf16 = secret.expose((plaintext) => Buffer.from(plaintext, 'utf16le'));
    try {
        const digest = await md4(utf16);
        return digest.toUpperCase();
    } finally {
        wipeBuffers(utf16);
    }
}

// =============================================================================
// Salted SHA-1
// =============================================================================

/**
 * Compute `{SSHA}` + base64(SHA1(secret || salt) || salt).
 *
 * @param salt - Exactly 4 bytes
 */
export function saltedHash(secret: Secret, salt: Buffer): string {
    if (salt.length !== SSHA_SALT_BYTES) {
        throw new Error(`Salt must be ${SSHA_SALT_BYTES} bytes, got ${salt.length}`);
    }

    const plain = secret.toBuffer();
    const digest = createHash('sha1').update(plain).update(salt).digest();
    const salted = Buffer.concat([digest, salt]);

    try {
        return SSHA_PREFIX + salted.toString('base64');
    } finally {
        wipeBuffers(plain, digest, salted);
    }
}

/**
 * Compute a salted SHA-1 hash with a fresh random salt.
 */
export function generateSaltedHash(secret: Secret): string {
    const salt = randomBytes(SSHA_SALT_BYTES);
    try {
        return saltedHash(secret, salt);
    } finally {
        wipeBuffers(salt);
    }
}

/**
 * Check a secret against a stored `{SSHA}` hash.
 *
 * Malformed stored values (wrong prefix, bad base64, wrong length) never
 * match and return false.
 */
export function verifySaltedHash(secret: Secret, storedHash: string): boolean {
    if (!storedHash.startsWith(SSHA_PREFIX)) {
        return false;
    }

    const encoded = storedHash.slice(SSHA_PREFIX.length);
    if (!/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) {
        return false;
    }

    const decoded = Buffer.from(encoded, 'base64');
    if (decoded.length !== SHA1_DIGEST_BYTES + SSHA_SALT_BYTES) {
        wipeBuffers(decoded);
        return false;
    }

    const salt = decoded.subarray(SHA1_DIGEST_BYTES);
    const recomputed = Buffer.from(saltedHash(secret, salt), 'utf-8');
    const stored = Buffer.from(storedHash, 'utf-8');

    try {
        if (recomputed.length !== stored.length) {
            return false;
        }
        return timingSafeEqual(recomputed, stored);
    } finally {
        wipeBuffers(decoded, recomputed, stored);
    }
}
