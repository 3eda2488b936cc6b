import { hash, verify, type Options } from '@node-rs/argon2';
import { type PasswordHasher } from '@contacts/domain';

export type Argon2Cost = Pick<Options, 'memoryCost' | 'timeCost' | 'parallelism'>;

/** OWASP minimum for argon2id. */
export const DEFAULT_ARGON2_COST: Argon2Cost = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: Options;

  constructor(cost: Argon2Cost = DEFAULT_ARGON2_COST) {
    this.options = { ...cost, outputLen: 32 };
  }

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  // Parameters are read back from the stored hash, so raising the cost keeps old hashes valid.
  // A malformed stored hash counts as a mismatch.
  async verify(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }
}
