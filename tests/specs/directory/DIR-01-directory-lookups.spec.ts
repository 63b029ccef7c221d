/**
 * DIR-01: Directory Lookups
 *
 * Registration probes: is the identifier registered, and which username
 * would a new account get.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NoSuchObjectError } from 'ldapts';
import { mustCanonicalize } from '@provisioner/shared';
import {
  DirectoryError,
  equalityFilter,
  findByIdentifier,
  firstAvailableUsername,
  probeRegistration,
  readAttribute,
  usernameTaken,
} from '@provisioner/ldap-gateway';
import {
  ACCOUNTS_DN,
  BASE_DN,
  FakeDirectory,
  TEST_DIRECTORY_CONFIG as config,
} from '../../support/fake-directory';

const JOAO = mustCanonicalize('JOAO CARLOS PEREIRA DA SILVA');

describe('DIR-01: Directory Lookups', () => {
  let directory: FakeDirectory;

  beforeEach(() => {
    directory = new FakeDirectory();
  });

  describe('findByIdentifier', () => {
    it('should return the username registered for an identifier', async () => {
      directory.seedStudent('jcps', '123456789');

      await expect(findByIdentifier(directory.client(), config, '123456789')).resolves.toBe('jcps');
    });

    it('should search the subtree by identifier for the uid only', async () => {
      await findByIdentifier(directory.client(), config, '123456789');

      expect(directory.calls).toEqual([
        { operation: 'search', dn: BASE_DN, filter: '(dccDRE=123456789)' },
      ]);
    });

    it('should return null when nothing matches', async () => {
      directory.seedStudent('jcps', '987654321');

      await expect(findByIdentifier(directory.client(), config, '123456789')).resolves.toBeNull();
    });

    it('should report an entry without uid as a data integrity failure', async () => {
      directory.seed(`cn=orphan,${ACCOUNTS_DN}`, { dccDRE: ['123456789'] });

      await expect(findByIdentifier(directory.client(), config, '123456789')).rejects.toMatchObject({
        name: 'DirectoryError',
        reason: 'missing-attribute',
      });
    });

    it('should map a rejected search to a protocol error', async () => {
      directory = new FakeDirectory({ failSearch: { match: 'dccDRE', error: new NoSuchObjectError() } });

      const error = await findByIdentifier(directory.client(), config, '123456789').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DirectoryError);
      expect(error).toMatchObject({ reason: 'protocol', retryable: false });
    });

    it('should map a transport failure to a connection error', async () => {
      directory = new FakeDirectory({ failSearch: { match: 'dccDRE', error: new Error('read ECONNRESET') } });

      await expect(findByIdentifier(directory.client(), config, '123456789')).rejects.toMatchObject({
        reason: 'connection',
      });
    });
  });

  describe('filters', () => {
    it('should escape filter metacharacters in values', () => {
      expect(equalityFilter('uid', 'a*b(c)')).toBe('(uid=a\\2ab\\28c\\29)');
    });

    it('should not match anything through an injected wildcard', async () => {
      directory.seedStudent('jcps', '123456789');

      await expect(findByIdentifier(directory.client(), config, '*')).resolves.toBeNull();
    });

    it('should read attributes case-insensitively', () => {
      expect(readAttribute({ dn: 'uid=x', UID: ['x'] }, 'uid')).toBe('x');
      expect(readAttribute({ dn: 'uid=x', uid: Buffer.from('x') }, 'uid')).toBe('x');
      expect(readAttribute({ dn: 'uid=x', uid: [] }, 'uid')).toBeNull();
      expect(readAttribute({ dn: 'uid=x' }, 'uid')).toBeNull();
    });
  });

  describe('usernameTaken', () => {
    it('should check uid equality without fetching attributes', async () => {
      directory.seedStudent('joaocps');

      await expect(usernameTaken(directory.client(), config, 'joaocps')).resolves.toBe(true);
      await expect(usernameTaken(directory.client(), config, 'joaocpsilva')).resolves.toBe(false);
      expect(directory.calls[0]).toEqual({ operation: 'search', dn: BASE_DN, filter: '(uid=joaocps)' });
    });
  });

  describe('firstAvailableUsername', () => {
    it('should return the first candidate not in use', async () => {
      directory.seedStudent('joaocps').seedStudent('joaocpsilva');

      await expect(firstAvailableUsername(directory.client(), config, JOAO)).resolves.toBe('joaocpereiras');
      expect(directory.count('search')).toBe(3);
    });

    it('should stop at the first free candidate', async () => {
      await expect(firstAvailableUsername(directory.client(), config, JOAO)).resolves.toBe('joaocps');
      expect(directory.count('search')).toBe(1);
    });

    it('should fail when every candidate is taken', async () => {
      directory.seedStudent('anas').seedStudent('anasouza');

      await expect(
        firstAvailableUsername(directory.client(), config, mustCanonicalize('Ana Souza'))
      ).rejects.toMatchObject({ reason: 'no-available-username' });
    });
  });

  describe('probeRegistration', () => {
    it('should report an existing registration with its username', async () => {
      directory.seedStudent('jcps', '123456789');

      await expect(probeRegistration(directory.client(), config, '123456789', JOAO)).resolves.toEqual({
        type: 'AlreadyRegistered',
        username: 'jcps',
      });
    });

    it('should offer the first free username otherwise', async () => {
      directory.seedStudent('joaocps', '987654321');

      await expect(probeRegistration(directory.client(), config, '123456789', JOAO)).resolves.toEqual({
        type: 'SlotAvailable',
        username: 'joaocpsilva',
      });
    });

    it('should not search usernames for a registered identifier', async () => {
      directory.seedStudent('jcps', '123456789');

      await probeRegistration(directory.client(), config, '123456789', JOAO);

      expect(directory.count('search')).toBe(1);
    });
  });
});
