import { pbkdf2, scrypt, timingSafeEqual } from 'node:crypto';
import { customAlphabet } from 'nanoid';
import { CREDENTIAL_ALPHABET, CREDENTIAL_LENGTH } from '@sentinel/shared';

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

/**
 * Hashes are stored as `scrypt:N:r:p$salt$hex`, the same layout Werkzeug's
 * `generate_password_hash` writes, so configs written by earlier agent
 * releases keep verifying. `pbkdf2:<digest>:<iterations>$salt$hex` is accepted
 * for verification only.
 */
export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 32768, r: 8, p: 1 };

const SCRYPT_KEY_LENGTH = 64;
const SALT_LENGTH = 16;

const generateSalt = customAlphabet(CREDENTIAL_ALPHABET, SALT_LENGTH);

export const generateCredential: () => string = customAlphabet(
  CREDENTIAL_ALPHABET,
  CREDENTIAL_LENGTH,
);

type ParsedHash =
  | { method: 'scrypt'; params: ScryptParams; salt: string; digest: Buffer }
  | { method: 'pbkdf2'; hash: string; iterations: number; salt: string; digest: Buffer };

export function parseCredentialHash(stored: string): ParsedHash | null {
  const parts = stored.split('$');
  if (parts.length !== 3) return null;

  const [methodSpec, salt, hex] = parts;
  if (!salt || !/^[0-9a-f]+$/i.test(hex) || hex.length % 2 !== 0) return null;
  const digest = Buffer.from(hex, 'hex');

  const spec = methodSpec.split(':');
  if (spec[0] === 'scrypt' && spec.length === 4) {
    const [N, r, p] = spec.slice(1).map(Number);
    if (![N, r, p].every((n) => Number.isInteger(n) && n > 0)) return null;
    return { method: 'scrypt', params: { N, r, p }, salt, digest };
  }

  if (spec[0] === 'pbkdf2' && spec.length === 3) {
    const iterations = Number(spec[2]);
    if (!Number.isInteger(iterations) || iterations <= 0) return null;
    return { method: 'pbkdf2', hash: spec[1], iterations, salt, digest };
  }

  return null;
}

function deriveScrypt(
  secret: string,
  salt: string,
  params: ScryptParams,
  keyLength: number,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(
      secret,
      salt,
      keyLength,
      { N: params.N, r: params.r, p: params.p, maxmem: 132 * params.N * params.r * params.p },
      (err, key) => (err ? reject(err) : resolve(key)),
    );
  });
}

function derivePbkdf2(
  secret: string,
  salt: string,
  iterations: number,
  digest: string,
  keyLength: number,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    pbkdf2(secret, salt, iterations, keyLength, digest, (err, key) =>
      err ? reject(err) : resolve(key),
    );
  });
}

export async function hashCredential(
  credential: string,
  params: ScryptParams = DEFAULT_SCRYPT_PARAMS,
): Promise<string> {
  const salt = generateSalt();
  const key = await deriveScrypt(credential, salt, params, SCRYPT_KEY_LENGTH);
  return `scrypt:${params.N}:${params.r}:${params.p}$${salt}$${key.toString('hex')}`;
}

/**
 * Re-derives the presented value with the stored salt and compares digests of
 * equal length in constant time. The cost does not depend on the length or
 * content of `credential`.
 */
export async function verifyCredential(credential: string, stored: string): Promise<boolean> {
  const parsed = parseCredentialHash(stored);
  if (!parsed || parsed.digest.length === 0) return false;

  const derived =
    parsed.method === 'scrypt'
      ? await deriveScrypt(credential, parsed.salt, parsed.params, parsed.digest.length)
      : await derivePbkdf2(
          credential,
          parsed.salt,
          parsed.iterations,
          parsed.hash,
          parsed.digest.length,
        );

  return timingSafeEqual(derived, parsed.digest);
}

