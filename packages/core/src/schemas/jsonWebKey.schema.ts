import * as z from 'zod';

/** Key types this library models. Entries of any other `kty` are skipped when a set is parsed. */
export const SUPPORTED_KEY_TYPES = new Set<string>(['RSA', 'EC']);

/**
 * Members shared by every JSON Web Key, as defined by RFC 7517 section 4.
 *
 * @property kid - Key identifier used to match keys in JWT headers
 * @property alg - Algorithm intended for use with this key (e.g. 'RS256')
 * @property use - Intended use of the public key, signature or encryption
 * @property x5c - X.509 certificate chain, base64 (not base64url) DER certificates
 * @property x5t - X.509 certificate SHA-1 thumbprint
 */
const commonKeyShape = {
  kid: z.string(),
  alg: z.string().optional(),
  use: z.enum(['sig', 'enc']).optional(),
  x5c: z.array(z.string()).optional(),
  x5t: z.string().optional(),
};

/**
 * Zod schema for an RSA public key.
 *
 * @property n - Modulus, base64url encoded
 * @property e - Public exponent, base64url encoded
 */
export const RsaPublicJwkSchema = z.object({
  kty: z.literal('RSA'),
  ...commonKeyShape,
  n: z.string().min(1),
  e: z.string().min(1),
});

/**
 * Zod schema for an elliptic curve public key.
 *
 * @property crv - Curve name (e.g. 'P-256')
 * @property x - X coordinate, base64url encoded
 * @property y - Y coordinate, base64url encoded
 */
export const EcPublicJwkSchema = z.object({
  kty: z.literal('EC'),
  ...commonKeyShape,
  crv: z.string().min(1),
  x: z.string().min(1),
  y: z.string().min(1),
});

export const JsonWebKeySchema = z.discriminatedUnion('kty', [
  RsaPublicJwkSchema,
  EcPublicJwkSchema,
]);

/**
 * Zod schema for a JSON Web Key Set document as published on a `jwks_uri` endpoint.
 * Keys of an unsupported `kty` (symmetric `oct`, `OKP`, ...) are dropped before the
 * remaining entries are validated, so a provider publishing extra key types does not
 * make the whole set unusable.
 */
export const JsonWebKeySetSchema = z.object({
  keys: z
    .array(z.looseObject({ kty: z.string() }))
    .transform((keys) => keys.filter((key) => SUPPORTED_KEY_TYPES.has(key.kty)))
    .pipe(z.array(JsonWebKeySchema)),
});

export type RsaPublicJwk = Readonly<z.infer<typeof RsaPublicJwkSchema>>;
export type EcPublicJwk = Readonly<z.infer<typeof EcPublicJwkSchema>>;
export type JsonWebKey = RsaPublicJwk | EcPublicJwk;
export type JsonWebKeySetDocument = z.infer<typeof JsonWebKeySetSchema>;
