import { describe, it, expect } from 'vitest';
import { VailResortsAdapter } from '../../src/adapters/vail-resorts.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('VailResortsAdapter', () => {
  const adapter = new VailResortsAdapter();

  it('should have correct config', () => {
    expect(adapter.config.kind).toBe('vail_resorts');
    expect(adapter.config.fetchMethod).toBe('http');
  });

  describe('embedded status feed', () => {
    const result = adapter.parse(loadFixture('vail-resorts', 'terrain-status.html'));

    it('should count numeric and string lift statuses', () => {
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.ops.lifts_open).toBe(2);
      expect(result.ops.lifts_scheduled).toBe(1);
      expect(result.ops.lifts_total).toBe(5);
      expect(result.ops.open_flag).toBe(true);
    });

    it('should count trails across grooming areas', () => {
      if (!result.ok) throw new Error(result.error);
      expect(result.ops.trails_open).toBe(3);
      expect(result.ops.trails_scheduled).toBe(0);
      expect(result.ops.trails_total).toBe(4);
    });

    it('should read the snow report despite trailing commas', () => {
      if (!result.ok) throw new Error(result.error);
      expect(result.snow).toEqual({
        new_snow_24h_in: 3,
        new_snow_48h_in: 9,
        base_depth_in: 44,
        season_total_in: 156,
        surface: null,
      });
    });
  });

  it('should fall back to page text without script data', () => {
    const html = `<html><body>
      <div>4 / 12 Lifts</div>
      <div>30 / 90 Trails</div>
      <div>24 Hour 2"</div>
      <div>Base: 30 in</div>
    </body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops.lifts_open).toBe(4);
    expect(result.ops.lifts_total).toBe(12);
    expect(result.ops.trails_open).toBe(30);
    expect(result.ops.trails_total).toBe(90);
    expect(result.snow.new_snow_24h_in).toBe(2);
    expect(result.snow.base_depth_in).toBe(30);
    expect(result.snow.season_total_in).toBeNull();
  });

  it('should treat a zero snowfall as zero, not unknown', () => {
    const html = `<html><head><script>
      FR.snowReportData = {"TwentyFourHourSnowfall":{"Inches":"0"},"BaseDepth":{"Inches":""},"CurrentSeason":87};
    </script></head><body></body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.snow.new_snow_24h_in).toBe(0);
    expect(result.snow.base_depth_in).toBeNull();
    expect(result.snow.season_total_in).toBe(87);
    expect(result.ops.open_flag).toBeNull();
  });
});
