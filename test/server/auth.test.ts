import { describe, it, expect } from 'vitest';
import { createAuth } from '@/server/auth.js';

const auth = createAuth([
  { identity: 'admin', token: 'admin-token' },
  { identity: 'alice', token: 'alice-token' },
]);

describe('createAuth', () => {
  it('resolves a known token to its identity', () => {
    expect(auth.resolveToken('admin-token')).toBe('admin');
    expect(auth.resolveToken('alice-token')).toBe('alice');
  });

  it('returns null for unknown tokens', () => {
    expect(auth.resolveToken('wrong')).toBeNull();
    expect(auth.resolveToken('')).toBeNull();
  });

  it('resolves nothing when no callers are configured', () => {
    expect(createAuth([]).resolveToken('admin-token')).toBeNull();
  });
});
