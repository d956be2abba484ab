import { exportJWK, generateKeyPair, type JWTPayload, SignJWT } from 'jose';

import { JsonWebKeySet } from '../../src/keySet.js';
import {
  type EcPublicJwk,
  EcPublicJwkSchema,
  type RsaPublicJwk,
  RsaPublicJwkSchema,
} from '../../src/schemas/jsonWebKey.schema.js';

type KeyPair = Awaited<ReturnType<typeof generateKeyPair>>;

export const JWKS_URL = 'https://issuer.example.com/.well-known/jwks.json';

/** RSA key with placeholder material, for tests that never verify a signature. */
export const createRsaJwk = (
  kid: string,
  overrides: Partial<RsaPublicJwk> = {},
): RsaPublicJwk => ({
  kty: 'RSA',
  kid,
  alg: 'RS256',
  use: 'sig',
  n: 'test-modulus',
  e: 'AQAB',
  ...overrides,
});

export const createEcJwk = (
  kid: string,
  overrides: Partial<EcPublicJwk> = {},
): EcPublicJwk => ({
  kty: 'EC',
  kid,
  alg: 'ES256',
  crv: 'P-256',
  x: 'test-x-coordinate',
  y: 'test-y-coordinate',
  ...overrides,
});

export const createKeySet = (...keys: Array<RsaPublicJwk | EcPublicJwk>): JsonWebKeySet =>
  JsonWebKeySet.from(keys);

/** A freshly generated RSA signing key with its public JWK. */
export interface RsaSigningKey {
  keyPair: KeyPair;
  jwk: RsaPublicJwk;
}

/** @param alg - Algorithm the JWK declares; `null` publishes the key without `alg` */
export async function createRsaSigningKey(
  kid: string,
  alg: string | null = 'RS256',
): Promise<RsaSigningKey> {
  const keyPair = await generateKeyPair('RS256', { extractable: true });
  const exported = await exportJWK(keyPair.publicKey);
  return {
    keyPair,
    jwk: RsaPublicJwkSchema.parse({ ...exported, kid, alg: alg ?? undefined }),
  };
}

export async function createEcSigningKey(
  kid: string,
): Promise<{ keyPair: KeyPair; jwk: EcPublicJwk }> {
  const keyPair = await generateKeyPair('ES256', { extractable: true });
  const exported = await exportJWK(keyPair.publicKey);
  return { keyPair, jwk: EcPublicJwkSchema.parse({ ...exported, kid, alg: 'ES256' }) };
}

export interface SignTokenOptions {
  kid?: string;
  alg?: string;
  audience?: string;
  /** Absolute `exp` in epoch seconds; `null` leaves the claim out */
  expiresAt?: number | null;
}

export async function signToken(
  keyPair: KeyPair,
  claims: JWTPayload,
  { kid, alg = 'RS256', audience, expiresAt }: SignTokenOptions = {},
): Promise<string> {
  const jwt = new SignJWT(claims).setProtectedHeader({ alg, kid }).setIssuedAt();
  if (audience) {
    jwt.setAudience(audience);
  }
  if (expiresAt !== null) {
    jwt.setExpirationTime(expiresAt ?? Math.floor(Date.now() / 1000) + 300);
  }
  return jwt.sign(keyPair.privateKey);
}

/** Resolves or rejects on demand, to hold a fetch in flight. */
export function createDeferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
