import { getLogger } from '@sentinel/shared';
import type { AuthOutcome } from '@sentinel/shared';
import { verifyCredential } from './credentials.js';

const logger = getLogger();

const BEARER_PREFIX = 'Bearer ';

export type CredentialVerifier = (credential: string, storedHash: string) => Promise<boolean>;

/**
 * Validates bearer tokens against the stored password hash. Holds only the
 * hash; the plaintext credential is never known to the guard.
 */
export class AccessGuard {
  private readonly passwordHash: string;
  private readonly verify: CredentialVerifier;

  constructor(passwordHash: string, verify: CredentialVerifier = verifyCredential) {
    this.passwordHash = passwordHash;
    this.verify = verify;
  }

  /** Extract the token from an `Authorization: Bearer <token>` header value. */
  static parseBearer(header: string | undefined): string | null {
    if (!header || !header.startsWith(BEARER_PREFIX)) return null;
    const token = header.slice(BEARER_PREFIX.length).trim();
    if (token.length === 0 || /\s/.test(token)) return null;
    return token;
  }

  async authenticate(presented: string | undefined): Promise<AuthOutcome> {
    if (presented === undefined || presented.length === 0) return 'unauthenticated';

    try {
      return (await this.verify(presented, this.passwordHash)) ? 'ok' : 'invalid';
    } catch (err) {
      logger.error({ err }, 'Credential verification failed');
      return 'invalid';
    }
  }

  /** Resolve an Authorization header value to an outcome. */
  async check(header: string | undefined): Promise<AuthOutcome> {
    const token = AccessGuard.parseBearer(header);
    if (token === null) return 'unauthenticated';
    return this.authenticate(token);
  }

  async isAuthorized(header: string | undefined): Promise<boolean> {
    return (await this.check(header)) === 'ok';
  }
}
