import { describe, it, expect } from 'vitest';
import { Argon2CredentialHasher } from '../credential-hasher';

describe('Argon2CredentialHasher', () => {
  const hasher = new Argon2CredentialHasher();

  it('hashes a credential into an argon2 hash string', async () => {
    const hash = await hasher.hash('test-secret');
    expect(hash).toMatch(/^\$argon2/);
    expect(hash).not.toContain('test-secret');
  });

  it('verifies the matching credential', async () => {
    const hash = await hasher.hash('test-secret');
    expect(await hasher.verify('test-secret', hash)).toBe(true);
  });

  it('rejects a different credential', async () => {
    const hash = await hasher.hash('test-secret');
    expect(await hasher.verify('other-secret', hash)).toBe(false);
  });

  it('returns false for corrupted hash strings', async () => {
    expect(await hasher.verify('test-secret', 'not-a-valid-hash')).toBe(false);
    expect(await hasher.verify('test-secret', '$argon2id$broken')).toBe(false);
  });

  it('salts every hash', async () => {
    const first = await hasher.hash('test-secret');
    const second = await hasher.hash('test-secret');
    expect(first).not.toBe(second);
  });
});
