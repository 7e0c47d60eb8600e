import { describe, it, expect } from 'vitest';
import { HomewoodAdapter } from '../../src/adapters/homewood.js';
import { SierraAtTahoeAdapter } from '../../src/adapters/sierra-at-tahoe.js';
import { BorealAdapter } from '../../src/adapters/boreal.js';

describe('HomewoodAdapter', () => {
  const adapter = new HomewoodAdapter();

  it('should parse lift, run and snow labels', () => {
    const html = `<html><body>
      <div class="stat"><h4>Open Lifts</h4><span>4/8</span></div>
      <div class="stat"><h4>Open Runs</h4><span>45/67</span></div>
      <p>Base: 38 in</p>
      <p>Season Total: 142 in</p>
      <p>24 hr: 3 in</p>
    </body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops).toMatchObject({
      lifts_open: 4,
      lifts_total: 8,
      trails_open: 45,
      trails_total: 67,
      open_flag: true,
    });
    expect(result.snow).toMatchObject({
      base_depth_in: 38,
      season_total_in: 142,
      new_snow_24h_in: 3,
    });
  });

  it('should leave open_flag unknown without counts', () => {
    const result = adapter.parse('<html><body><p>Snow report coming soon</p></body></html>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops.open_flag).toBeNull();
  });
});

describe('SierraAtTahoeAdapter', () => {
  const adapter = new SierraAtTahoeAdapter();

  it('should parse lifts, runs and take the summit depth as base', () => {
    const html = `<html><body>
      <div>10/14 Lifts Open</div>
      <div>41/50 Runs Open</div>
      <div>24-Hour: 6"</div>
      <div>60" (summit), 35" (base)</div>
      <div>YTD: 201"</div>
    </body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops).toMatchObject({ lifts_open: 10, lifts_total: 14, trails_open: 41, trails_total: 50 });
    expect(result.ops.open_flag).toBe(true);
    expect(result.snow.new_snow_24h_in).toBe(6);
    expect(result.snow.base_depth_in).toBe(60);
    expect(result.snow.season_total_in).toBe(201);
  });

  it('should report closed when no lift is open', () => {
    const result = adapter.parse('<html><body><div>0/14 Lifts Open</div></body></html>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops.open_flag).toBe(false);
  });
});

describe('BorealAdapter', () => {
  const adapter = new BorealAdapter();

  it('should parse "X of Y" counts and snow labels', () => {
    const html = `<html><body>
      <p>Lifts Open: 5 of 7</p>
      <p>Trails Open: 20 of 33</p>
      <p>New Snow: 2 in</p>
      <p>Last 48: 6 in</p>
      <p>Base: 30 in</p>
      <p>Season: 110 in</p>
    </body></html>`;
    const result = adapter.parse(html);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops).toMatchObject({ lifts_open: 5, lifts_total: 7, trails_open: 20, trails_total: 33, open_flag: true });
    expect(result.snow).toEqual({
      new_snow_24h_in: 2,
      new_snow_48h_in: 6,
      base_depth_in: 30,
      season_total_in: 110,
      surface: null,
    });
  });

  it('should report closed for the season', () => {
    const result = adapter.parse('<html><body><p>Closed for the season</p><p>Base: 12 in</p></body></html>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ops.open_flag).toBe(false);
    expect(result.snow.base_depth_in).toBe(12);
  });

  it('should fail without lifts, trails or base depth', () => {
    const result = adapter.parse('<html><body><div id="root"></div></body></html>');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe('Could not extract conditions data from page');
    expect(result.needsHeadless).toBe(false);
  });
});
