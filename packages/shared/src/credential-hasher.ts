import { hash, verify } from '@node-rs/argon2';
import { type CredentialHasher } from '@homestock/domain';

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

export class Argon2CredentialHasher implements CredentialHasher {
  async hash(plaintext: string): Promise<string> {
    return hash(plaintext, ARGON2_OPTIONS);
  }

  /** A malformed stored hash verifies as false rather than throwing. */
  async verify(plaintext: string, credentialHash: string): Promise<boolean> {
    if (!credentialHash.startsWith('$argon2')) return false;
    try {
      return await verify(credentialHash, plaintext, ARGON2_OPTIONS);
    } catch {
      return false;
    }
  }
}
