import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { JwksClientError } from '../src/errors.js';
import { JsonWebKeySet } from '../src/keySet.js';

import { createEcJwk, createKeySet, createRsaJwk } from './helpers/fixtures.js';

const rsaDocument = {
  keys: [
    {
      alg: 'RS256',
      kty: 'RSA',
      use: 'sig',
      n: 'test-modulus',
      e: 'AQAB',
      kid: 'rsa-key-1',
      x5t: 'test-thumbprint',
      x5c: ['test-certificate'],
    },
  ],
};

const ecDocument = {
  keys: [
    {
      alg: 'ES256',
      kty: 'EC',
      crv: 'P-256',
      x: 'test-x-coordinate',
      y: 'test-y-coordinate',
      kid: 'ec-key-1',
    },
  ],
};

describe('JsonWebKeySet', () => {
  describe('parse', () => {
    it('parses an RSA key set', () => {
      const keySet = JsonWebKeySet.parse(rsaDocument);
      const key = keySet.getKey('rsa-key-1');

      expect(key).toEqual({
        kty: 'RSA',
        kid: 'rsa-key-1',
        alg: 'RS256',
        use: 'sig',
        n: 'test-modulus',
        e: 'AQAB',
        x5t: 'test-thumbprint',
        x5c: ['test-certificate'],
      });
    });

    it('parses an EC key set', () => {
      const key = JsonWebKeySet.parse(ecDocument).getKey('ec-key-1');

      expect(key.alg).toBe('ES256');
      expect(key.kty).toBe('EC');
      if (key.kty === 'EC') {
        expect(key.crv).toBe('P-256');
        expect(key.x).toBe('test-x-coordinate');
        expect(key.y).toBe('test-y-coordinate');
      }
    });

    it('accepts an empty key set', () => {
      expect(JsonWebKeySet.parse({ keys: [] }).size).toBe(0);
    });

    it('skips keys of unsupported types', () => {
      const keySet = JsonWebKeySet.parse({
        keys: [
          { kty: 'oct', kid: 'symmetric', k: 'test-secret' },
          { kty: 'OKP', kid: 'edwards', crv: 'Ed25519', x: 'test-x' },
          ...rsaDocument.keys,
        ],
      });

      expect(keySet.size).toBe(1);
      expect(keySet.getKey('rsa-key-1').kty).toBe('RSA');
    });

    it('drops members it does not model', () => {
      const keySet = JsonWebKeySet.parse({
        keys: [{ ...rsaDocument.keys[0], key_ops: ['verify'] }],
      });

      expect(keySet.getKey('rsa-key-1')).not.toHaveProperty('key_ops');
    });

    it('rejects a document without keys', () => {
      expect(() => JsonWebKeySet.parse({ foo: 'bar' })).toThrow(ZodError);
    });

    it('rejects an RSA key without modulus', () => {
      expect(() =>
        JsonWebKeySet.parse({ keys: [{ kty: 'RSA', kid: 'broken', e: 'AQAB' }] }),
      ).toThrow(ZodError);
    });

    it('rejects a key without kid', () => {
      expect(() =>
        JsonWebKeySet.parse({ keys: [{ kty: 'RSA', n: 'test-modulus', e: 'AQAB' }] }),
      ).toThrow(ZodError);
    });

    it('rejects an unknown use value', () => {
      expect(() =>
        JsonWebKeySet.parse({ keys: [{ ...rsaDocument.keys[0], use: 'wrap' }] }),
      ).toThrow(ZodError);
    });
  });

  describe('lookups', () => {
    it('starts empty', () => {
      const keySet = JsonWebKeySet.empty();

      expect(keySet.size).toBe(0);
      expect(keySet.keys()).toEqual([]);
    });

    it('throws KEY_NOT_FOUND for an unknown key id', () => {
      const keySet = createKeySet(createRsaJwk('rsa-key-1'));

      let thrown: unknown;
      try {
        keySet.getKey('other-kid');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(JwksClientError);
      expect(thrown).toMatchObject({ code: 'KEY_NOT_FOUND', keyId: 'other-kid' });
      expect(String(thrown)).toBe('JwksClientError: Cannot find key for key_id: other-kid');
    });

    it('returns the first key when a key id is published twice', () => {
      const keySet = createKeySet(
        createRsaJwk('duplicate', { x5t: 'first' }),
        createRsaJwk('duplicate', { x5t: 'second' }),
      );

      expect(keySet.getKey('duplicate').x5t).toBe('first');
    });

    it('takeKey behaves like getKey', () => {
      const keySet = createKeySet(createRsaJwk('rsa-key-1'), createEcJwk('ec-key-1'));

      expect(keySet.takeKey('ec-key-1')).toBe(keySet.getKey('ec-key-1'));
      expect(() => keySet.takeKey('missing')).toThrow('Cannot find key for key_id: missing');
      expect(keySet.size).toBe(2);
    });

    it('findKey returns undefined on a miss', () => {
      expect(createKeySet(createRsaJwk('rsa-key-1')).findKey('missing')).toBeUndefined();
    });

    it('does not expose its key list for mutation', () => {
      const keySet = createKeySet(createRsaJwk('rsa-key-1'));

      keySet.keys().pop();

      expect(keySet.size).toBe(1);
    });
  });

  describe('toJSON', () => {
    it('serializes to a document that parses back to the same keys', () => {
      const original = createKeySet(
        createRsaJwk('rsa-key-1', { x5c: ['test-certificate'] }),
        createEcJwk('ec-key-1'),
      );

      const reparsed = JsonWebKeySet.parse(JSON.parse(JSON.stringify(original)));

      expect(reparsed.keys()).toEqual(original.keys());
    });
  });
});
