import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher, sha256Hash } from '../utils/hash.utils';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher(4);

  it('salts every hash', async () => {
    const first = await hasher.hash('secret');
    const second = await hasher.hash('secret');

    expect(first).not.toBe(second);
    expect(await hasher.verify('secret', first)).toBe(true);
    expect(await hasher.verify('secret', second)).toBe(true);
  });

  it('rejects a wrong password', async () => {
    const hash = await hasher.hash('secret');

    expect(await hasher.verify('Secret', hash)).toBe(false);
  });

  it('uses the configured cost factor', async () => {
    const hash = await hasher.hash('secret');

    expect(hash.startsWith('$2a$04$')).toBe(true);
  });

  it('never matches a password that differs only past byte 72', async () => {
    const stored = await hasher.hash('a'.repeat(72));

    expect(await hasher.verify('a'.repeat(72), stored)).toBe(true);
    expect(await hasher.verify(`${'a'.repeat(72)}WRONG`, stored)).toBe(false);
  });

  it('refuses to hash more than 72 bytes', async () => {
    // 36 two-byte characters fill the limit exactly
    await expect(hasher.hash('é'.repeat(36))).resolves.toMatch(/^\$2a\$04\$/);
    await expect(hasher.hash('é'.repeat(37))).rejects.toThrow('Password exceeds 72 bytes');
  });

  it.each(['', 'not-a-hash', '$2a$04$short', 'x'.repeat(60)])('treats malformed stored hash %j as a mismatch', async (stored) => {
    await expect(hasher.verify('secret', stored)).resolves.toBe(false);
  });
});

describe('sha256Hash', () => {
  it('is deterministic hex', () => {
    expect(sha256Hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
