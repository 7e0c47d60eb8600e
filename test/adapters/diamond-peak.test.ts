import { describe, it, expect } from 'vitest';
import { DiamondPeakAdapter } from '../../src/adapters/diamond-peak.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('DiamondPeakAdapter', () => {
  const adapter = new DiamondPeakAdapter();

  it('should have correct config', () => {
    expect(adapter.config.kind).toBe('diamond_peak');
    expect(adapter.config.fetchMethod).toBe('http');
  });

  describe('conditions page', () => {
    const result = adapter.parse(loadFixture('diamond-peak', 'conditions.html'));

    it('should count lift rows by label', () => {
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.ops.lifts_open).toBe(2);
      expect(result.ops.lifts_total).toBe(3);
      expect(result.ops.open_flag).toBe(true);
    });

    it('should count open and groomed trails and skip Village rows', () => {
      if (!result.ok) throw new Error(result.error);
      expect(result.ops.trails_open).toBe(3);
      expect(result.ops.trails_total).toBe(4);
    });

    it('should read snow figures with storm total as the 48h value', () => {
      if (!result.ok) throw new Error(result.error);
      expect(result.snow).toEqual({
        new_snow_24h_in: 7,
        new_snow_48h_in: 18,
        base_depth_in: 40,
        season_total_in: 112,
        surface: null,
      });
    });
  });

  it('should prefer the 24 hour figure over overnight', () => {
    const html = `<html><body>
      <strong>0</strong> Inches overnight
      <strong>5</strong> Inches 24 hour
      <strong>34</strong> Inches storm total
      Base: <strong>16</strong> Inches
      Season: <strong>66</strong> Inches
    </body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.snow.new_snow_24h_in).toBe(5);
    expect(result.snow.new_snow_48h_in).toBe(34);
    expect(result.snow.base_depth_in).toBe(16);
    expect(result.snow.season_total_in).toBe(66);
  });

  it('should fall back to overnight snow', () => {
    const result = adapter.parse('<html><body><strong>3</strong> Inches overnight</body></html>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.snow.new_snow_24h_in).toBe(3);
  });

  it('should report closed for the season without lift rows', () => {
    const result = adapter.parse('<html><body><p>We are closed for season. See you next winter!</p></body></html>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops.open_flag).toBe(false);
    expect(result.ops.lifts_open).toBeNull();
  });
});
