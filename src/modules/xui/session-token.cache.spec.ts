import { testConfig } from '../../testing/test-harness';
import { SessionTokenCache } from './session-token.cache';

describe('SessionTokenCache', () => {
  let now: number;
  let cache: SessionTokenCache;

  beforeEach(() => {
    now = 1_700_000_000_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    cache = new SessionTokenCache(testConfig({ PANEL_SESSION_TTL_SECONDS: 60 }));
  });

  afterEach(() => jest.restoreAllMocks());

  it('returns a stored session until it expires', () => {
    cache.set(1, { cookie: '3x-ui=a' });

    now += 59_999;
    expect(cache.get(1)).toEqual({ cookie: '3x-ui=a' });

    now += 1;
    expect(cache.get(1)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('overwrites on a new login and forgets on invalidate', () => {
    cache.set(1, { cookie: '3x-ui=a' });
    cache.set(1, { token: 'tok' });
    cache.set(2, { cookie: '3x-ui=b' });

    expect(cache.get(1)).toEqual({ token: 'tok' });
    cache.invalidate(1);
    expect(cache.get(1)).toBeNull();
    expect(cache.get(2)).toEqual({ cookie: '3x-ui=b' });

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
