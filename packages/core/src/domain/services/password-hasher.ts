/**
 * PBKDF2-SHA256 password hashing
 *
 * The stored hash is `<iterations>$<hex>` so records hashed with an older
 * iteration count keep verifying after the default changes.
 */

import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto';
import { promisify } from 'util';

const pbkdf2Async = promisify(pbkdf2);

export const DEFAULT_PASSWORD_ITERATIONS = 100000;
const KEY_LENGTH = 64;
const DIGEST = 'sha256';
const SALT_BYTES = 16;

export interface PasswordRecord {
  passwordHash: string;
  passwordSalt: string;
}

export class PasswordHasher {
  constructor(private readonly iterations: number = DEFAULT_PASSWORD_ITERATIONS) {}

  public async hash(password: string): Promise<PasswordRecord> {
    const passwordSalt = randomBytes(SALT_BYTES).toString('hex');
    const key = await pbkdf2Async(password, passwordSalt, this.iterations, KEY_LENGTH, DIGEST);
    return { passwordHash: `${String(this.iterations)}$${key.toString('hex')}`, passwordSalt };
  }

  public async verify(password: string, record: PasswordRecord): Promise<boolean> {
    const [iterationsText, storedHex] = record.passwordHash.split('$');
    const iterations = Number(iterationsText);
    if (storedHex === undefined || !Number.isInteger(iterations) || iterations <= 0) {
      return false;
    }
    const stored = Buffer.from(storedHex, 'hex');
    if (stored.length !== KEY_LENGTH) {
      return false;
    }
    const candidate = await pbkdf2Async(password, record.passwordSalt, iterations, KEY_LENGTH, DIGEST);
    return timingSafeEqual(candidate, stored);
  }
}
