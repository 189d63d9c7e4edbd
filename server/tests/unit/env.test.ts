import { describe, it, expect } from 'vitest';
import { parseEnv } from '../../src/env.js';

const base = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-service-role-key',
};

describe('parseEnv()', () => {
  it('should apply defaults', () => {
    expect(parseEnv(base)).toEqual({
      ...base,
      PORT: 8787,
      SESSION_TTL_SECONDS: 604800,
      LOGIN_LINK_TTL_SECONDS: 86400,
    });
  });

  it('should coerce numeric settings', () => {
    const env = parseEnv({ ...base, PORT: '3000', SESSION_TTL_SECONDS: '3600', SECRET: 'test-secret' });

    expect(env.PORT).toBe(3000);
    expect(env.SESSION_TTL_SECONDS).toBe(3600);
    expect(env.SECRET).toBe('test-secret');
  });

  it('should name every invalid setting', () => {
    expect(() => parseEnv({ SESSION_TTL_SECONDS: '-1' })).toThrow(
      /SUPABASE_URL: .*SUPABASE_SERVICE_ROLE_KEY: .*SESSION_TTL_SECONDS: /,
    );
  });
});
