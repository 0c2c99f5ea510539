import { createHash } from 'crypto';

/**
 * Masks a secret the way the iRacing OAuth server expects it:
 * base64(sha256(secret + lowercase(identifier))).
 *
 * The password is masked against the account username and the client
 * secret against the client id.
 */
export function maskSecret(secret: string, identifier: string): string {
  return createHash('sha256')
    .update(secret + identifier.toLowerCase(), 'utf8')
    .digest('base64');
}
