import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/lib/config';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({});
    expect(config.NODE_ENV).toBe('development');
    expect(config.SEARCH_RADIUS_KM).toBe(4);
    expect(config.TRAVEL_TIME_TIMEOUT_MS).toBe(5000);
    expect(config.PLACE_LOOKUP_CACHE_SIZE).toBe(200);
    expect(config.POSTGRES_PORT).toBe(5432);
    expect(config.GOOGLE_MAPS_API_KEY).toBeUndefined();
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({
      SEARCH_RADIUS_KM: '2.5',
      TRAVEL_TIME_TIMEOUT_MS: '1500',
      GOOGLE_MAPS_API_KEY: 'test-key',
    });
    expect(config.SEARCH_RADIUS_KM).toBe(2.5);
    expect(config.TRAVEL_TIME_TIMEOUT_MS).toBe(1500);
    expect(config.GOOGLE_MAPS_API_KEY).toBe('test-key');
  });

  it('names every invalid setting', () => {
    expect(() => loadConfig({ SEARCH_RADIUS_KM: '-1', NODE_ENV: 'staging' })).toThrow(
      /^Invalid configuration: NODE_ENV: .+; SEARCH_RADIUS_KM: /
    );
  });
});
