/**
 * HSH-01: Password Hashes
 *
 * The NT hash feeds Samba and the salted SHA-1 feeds directory binds;
 * both formats are read by systems outside this project.
 */

import { createHash } from 'node:crypto';
import { inspect } from 'node:util';
import { describe, it, expect } from 'vitest';
import {
  Secret,
  generateSaltedHash,
  legacyHash,
  saltedHash,
  verifySaltedHash,
} from '@provisioner/shared';

describe('HSH-01: Password Hashes', () => {
  describe('legacyHash', () => {
    it('should match the known NT hash of a reference password', async () => {
      await expect(legacyHash(new Secret('12345678'))).resolves.toBe('259745CB123A52AA2E693AAACCA2DB52');
    });

    it('should return 32 uppercase hex characters', async () => {
      const hash = await legacyHash(new Secret('Senha-Teste1'));

      expect(hash).toMatch(/^[0-9A-F]{32}$/);
    });

    it('should leave the secret usable', async () => {
      const secret = new Secret('Senha-Teste1');
      await legacyHash(secret);

      expect(secret.isWiped).toBe(false);
    });
  });

  describe('saltedHash', () => {
    it('should encode SHA-1 of secret and salt followed by the salt', () => {
      const salt = Buffer.from([0x01, 0x02, 0x03, 0x04]);
      const digest = createHash('sha1').update('test-secret').update(salt).digest();
      const expected = '{SSHA}' + Buffer.concat([digest, salt]).toString('base64');

      expect(saltedHash(new Secret('test-secret'), salt)).toBe(expected);
    });

    it('should reject a salt that is not 4 bytes', () => {
      expect(() => saltedHash(new Secret('test-secret'), Buffer.alloc(3))).toThrow('Salt must be 4 bytes, got 3');
    });

    it('should draw a fresh salt each time', () => {
      const secret = new Secret('test-secret');

      expect(generateSaltedHash(secret)).not.toBe(generateSaltedHash(secret));
    });

    it('should produce a 38 character value', () => {
      expect(generateSaltedHash(new Secret('test-secret'))).toHaveLength(38);
    });
  });

  describe('verifySaltedHash', () => {
    it('should accept the secret a hash was generated from', () => {
      for (const password of ['test-secret', 'Senha-Teste1', 'çãé ü', '']) {
        const stored = generateSaltedHash(new Secret(password));

        expect(verifySaltedHash(new Secret(password), stored)).toBe(true);
      }
    });

    it('should reject a different secret', () => {
      const stored = generateSaltedHash(new Secret('test-secret'));

      expect(verifySaltedHash(new Secret('test-secret2'), stored)).toBe(false);
    });

    it('should reject any mutated character of the stored hash', () => {
      const secret = new Secret('test-secret');
      const stored = generateSaltedHash(secret);

      for (let index = '{SSHA}'.length; index < stored.length; index++) {
        const replacement = stored[index] === 'A' ? 'B' : 'A';
        const mutated = stored.slice(0, index) + replacement + stored.slice(index + 1);

        expect(verifySaltedHash(secret, mutated)).toBe(false);
      }
    });

    it('should return false for malformed stored values', () => {
      const secret = new Secret('test-secret');

      expect(verifySaltedHash(secret, '{SHA}dGVzdC1zZWNyZXQ=')).toBe(false);
      expect(verifySaltedHash(secret, '{SSHA}not base64!')).toBe(false);
      expect(verifySaltedHash(secret, '{SSHA}' + Buffer.alloc(10).toString('base64'))).toBe(false);
      expect(verifySaltedHash(secret, '')).toBe(false);
    });
  });

  describe('Secret', () => {
    it('should never print its value', () => {
      const secret = new Secret('test-secret');

      expect(String(secret)).toBe('[REDACTED]');
      expect(JSON.stringify({ password: secret })).toBe('{"password":"[REDACTED]"}');
      expect(inspect(secret)).toBe('[REDACTED]');
    });

    it('should refuse access once wiped', () => {
      const secret = new Secret('test-secret');
      secret.wipe();

      expect(secret.isWiped).toBe(true);
      expect(() => secret.expose((plaintext) => plaintext)).toThrow('Secret has already been wiped');
      expect(() => secret.toBuffer()).toThrow('Secret has already been wiped');
    });
  });
});
