/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Session tokens carry 256 bits of entropy, so an unkeyed digest is enough
 * for lookup-by-hash.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
