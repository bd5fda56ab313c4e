import { describe, it, expect, vi } from 'vitest';
import {
  ScrollTarget,
  buildPageUrl,
  initialScrollState,
  isScrollSettled,
  nextScrollState,
  scrollUntilStable,
} from './navigator.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function fakeTarget(fingerprints: number[]): { target: ScrollTarget; scrolls: () => number } {
  let scrolls = 0;
  const target: ScrollTarget = {
    scroll: async () => {
      scrolls++;
    },
    fingerprint: async () => fingerprints[Math.min(scrolls, fingerprints.length) - 1] ?? 0,
  };
  return { target, scrolls: () => scrolls };
}

describe('scroll state', () => {
  it('should not count the first observation as stable', () => {
    expect(nextScrollState(initialScrollState, 100)).toEqual({ fingerprint: 100, stableCount: 0, iterations: 1 });
  });

  it('should count unchanged observations and reset on change', () => {
    let state = nextScrollState(initialScrollState, 100);
    state = nextScrollState(state, 100);
    state = nextScrollState(state, 100);
    expect(state.stableCount).toBe(2);

    state = nextScrollState(state, 180);
    expect(state).toEqual({ fingerprint: 180, stableCount: 0, iterations: 4 });
  });

  it('should settle on stability or on the iteration ceiling', () => {
    const options = { requiredStable: 2, maxIterations: 5, pauseMs: 0 };

    expect(isScrollSettled({ fingerprint: 1, stableCount: 2, iterations: 3 }, options)).toBe(true);
    expect(isScrollSettled({ fingerprint: 1, stableCount: 0, iterations: 5 }, options)).toBe(true);
    expect(isScrollSettled({ fingerprint: 1, stableCount: 1, iterations: 4 }, options)).toBe(false);
  });
});

describe('scrollUntilStable', () => {
  it('should stop once the fingerprint holds for the required checks', async () => {
    const { target, scrolls } = fakeTarget([100, 200, 200, 200, 200, 200]);

    const state = await scrollUntilStable(target, { requiredStable: 2, maxIterations: 10, pauseMs: 0 });

    expect(scrolls()).toBe(4);
    expect(state).toEqual({ fingerprint: 200, stableCount: 2, iterations: 4 });
  });

  it('should stop at the iteration ceiling when content keeps growing', async () => {
    const { target, scrolls } = fakeTarget([1, 2, 3, 4, 5, 6, 7, 8]);

    const state = await scrollUntilStable(target, { requiredStable: 3, maxIterations: 5, pauseMs: 0 });

    expect(scrolls()).toBe(5);
    expect(state.stableCount).toBe(0);
  });

  it('should settle after one repeat when a single check is required', async () => {
    const { target, scrolls } = fakeTarget([900, 900, 900]);

    await scrollUntilStable(target, { requiredStable: 1, maxIterations: 10, pauseMs: 0 });

    expect(scrolls()).toBe(2);
  });
});

describe('buildPageUrl', () => {
  it('should replace an existing page number in place', () => {
    expect(buildPageUrl('https://directory.example/results?q=&pagenumber=1&city=Galveston', 3)).toBe(
      'https://directory.example/results?q=&pagenumber=3&city=Galveston'
    );
  });

  it('should append the page parameter when absent', () => {
    expect(buildPageUrl('https://directory.example/results?q=dentist', 2)).toBe(
      'https://directory.example/results?q=dentist&pagenumber=2'
    );
    expect(buildPageUrl('https://directory.example/results', 2)).toBe(
      'https://directory.example/results?pagenumber=2'
    );
  });

  it('should honour a custom parameter name', () => {
    expect(buildPageUrl('https://directory.example/list?page=7', 8, 'page')).toBe(
      'https://directory.example/list?page=8'
    );
  });
});
