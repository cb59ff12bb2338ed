/**
 * Hashing Utilities
 *
 * We use TWO types of hashing:
 *
 * 1. PASSWORD HASHING (bcrypt)
 *    - Slow by design (prevents brute force)
 *    - Includes "salt" (random data) so same password = different hash
 *    - Used ONLY for passwords
 *
 * 2. GENERAL HASHING (SHA-256)
 *    - Fast
 *    - Same input = same output (deterministic)
 *    - Used for log context (hashing user IDs, IPs, etc.)
 */

import bcrypt from 'bcryptjs';
import crypto from 'crypto';
import { MAX_PASSWORD_BYTES } from './validation.utils';

// Number of salt rounds for bcrypt (higher = slower but more secure)
export const DEFAULT_SALT_ROUNDS = 12;

const BCRYPT_HASH_PATTERN = /^\$2[abxy]?\$\d{2}\$[./A-Za-z0-9]{53}$/;

function exceedsBcryptLimit(plaintext: string): boolean {
  return Buffer.byteLength(plaintext, 'utf8') > MAX_PASSWORD_BYTES;
}

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, storedHash: string): Promise<boolean>;
}

/**
 * bcrypt-backed hasher. The cost factor is fixed at construction.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly saltRounds: number = DEFAULT_SALT_ROUNDS) {}

  /**
   * bcrypt only reads the first 72 bytes, so longer input is refused
   * rather than silently truncated.
   */
  async hash(plaintext: string): Promise<string> {
    if (exceedsBcryptLimit(plaintext)) {
      throw new RangeError(`Password exceeds ${MAX_PASSWORD_BYTES} bytes`);
    }
    return bcrypt.hash(plaintext, this.saltRounds);
  }

  /**
   * Resolves false for a wrong password, for a password longer than
   * bcrypt reads, and for a stored hash that is not a bcrypt hash at all.
   */
  async verify(plaintext: string, storedHash: string): Promise<boolean> {
    if (exceedsBcryptLimit(plaintext) || !BCRYPT_HASH_PATTERN.test(storedHash)) {
      return false;
    }
    try {
      return await bcrypt.compare(plaintext, storedHash);
    } catch {
      return false;
    }
  }
}

/**
 * Create a SHA-256 hash (for log context, non-password data)
 * @returns Hex-encoded SHA-256 hash
 */
export function sha256Hash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
