import { TestHarness, createHarness } from '../../testing/test-harness';
import { RoundRobinCursor, roundRobinKey } from './round-robin-cursor';

describe('RoundRobinCursor', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(() => h.close());

  const candidates = [{ id: 4 }, { id: 7 }, { id: 9 }];

  it('walks the candidates and wraps around', () => {
    const cursor = new RoundRobinCursor(h.settings, 1);

    expect([1, 2, 3, 4].map(() => cursor.advance(candidates).id)).toEqual([4, 7, 9, 4]);
    expect(cursor.lastId()).toBe(4);
  });

  it('keeps one cursor per location', () => {
    new RoundRobinCursor(h.settings, 1).advance(candidates);

    expect(new RoundRobinCursor(h.settings, 2).advance(candidates).id).toBe(4);
    expect(h.settings.get(roundRobinKey(1))).toBe('4');
  });

  it('ignores a garbled cursor', () => {
    h.settings.set(roundRobinKey(1), 'oops');

    expect(new RoundRobinCursor(h.settings, 1).advance(candidates).id).toBe(4);
  });

  it('refuses an empty candidate list', () => {
    expect(() => new RoundRobinCursor(h.settings, 1).advance([])).toThrow(RangeError);
  });
});
