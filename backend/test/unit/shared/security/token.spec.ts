import { describe, it, expect } from 'vitest';
import { HmacSha256KeyedHasher } from '../../../../src/shared/security/keyed-hasher';
import { Sha256TokenHasher } from '../../../../src/shared/security/sha256-token-hasher';
import { generateSecureToken, generateVerificationCode } from '../../../../src/shared/security/token';

describe('generateVerificationCode', () => {
  it('always returns exactly the requested number of digits', () => {
    for (let i = 0; i < 200; i++) {
      expect(generateVerificationCode(6)).toMatch(/^\d{6}$/);
    }
  });
});

describe('generateSecureToken', () => {
  it('returns distinct url-safe tokens', () => {
    const a = generateSecureToken();
    const b = generateSecureToken();

    expect(a).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(a).not.toBe(b);
  });
});

describe('Sha256TokenHasher', () => {
  it('produces the sha256 hex digest', () => {
    expect(new Sha256TokenHasher().hash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});

describe('HmacSha256KeyedHasher', () => {
  it('rejects short keys', () => {
    expect(() => new HmacSha256KeyedHasher('short')).toThrow(/at least 32 characters/);
  });

  it('depends on the key', () => {
    const a = new HmacSha256KeyedHasher('a'.repeat(32));
    const b = new HmacSha256KeyedHasher('b'.repeat(32));

    expect(a.hash('123456')).toBe(a.hash('123456'));
    expect(a.hash('123456')).not.toBe(b.hash('123456'));
    expect(a.hash('123456')).toMatch(/^[0-9a-f]{64}$/);
  });
});
