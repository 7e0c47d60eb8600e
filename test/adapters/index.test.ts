import { describe, it, expect } from 'vitest';
import { findAdapter } from '../../src/adapters/index.js';
import { MtRoseAdapter } from '../../src/adapters/mt-rose.js';
import { PlaceholderHeadlessAdapter } from '../../src/adapters/placeholder-headless.js';
import { ADAPTER_KINDS } from '../../src/types/resort.js';

describe('adapter registry', () => {
  it('should register an adapter for every kind', () => {
    for (const kind of ADAPTER_KINDS) {
      expect(findAdapter(kind)?.config.kind).toBe(kind);
    }
  });

  it('should find an adapter by kind', () => {
    expect(findAdapter('mt_rose')).toBeInstanceOf(MtRoseAdapter);
  });

  it('should return null for unknown kinds', () => {
    expect(findAdapter('killington')).toBeNull();
  });
});

describe('PlaceholderHeadlessAdapter', () => {
  const adapter = new PlaceholderHeadlessAdapter();

  it('should be marked as needing a headless browser', () => {
    expect(adapter.config.kind).toBe('placeholder_headless');
    expect(adapter.config.fetchMethod).toBe('headless');
  });

  it('should always fail with needsHeadless', () => {
    expect(adapter.parse('<html><body>5/10 Lifts Open</body></html>')).toEqual({
      ok: false,
      error: 'This resort requires JavaScript rendering (headless browser)',
      needsHeadless: true,
    });
  });
});
