import { afterEach, describe, it, expect, vi } from 'vitest';
import { PostgisPlacesDatabase, rowToPlace } from '@/lib/db';
import type { Queryable } from '@/lib/db';
import { ORIGIN } from './fixtures';

const cafeRow = {
  id: 'cafe-1',
  name: 'Corner Cafe',
  address: '1 Main St',
  lat: 40.001,
  lon: -74.002,
  categories: ['coffee', 'cafes'],
  hours: [{ open: { day: 1, time: '0800' }, close: { day: 1, time: '1700' } }],
  providers: [{ name: 'yelp', rating: 4.5, totalReviewCount: 120 }],
};

function fakeQueryable(rows: unknown[]) {
  const query = vi.fn<Queryable['query']>().mockResolvedValue({ rows });
  return { db: { query }, query };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('rowToPlace', () => {
  it('maps a row to a place', () => {
    const place = rowToPlace(cafeRow);
    expect(place).toMatchObject({
      id: 'cafe-1',
      name: 'Corner Cafe',
      address: '1 Main St',
      coordinate: { lat: 40.001, lon: -74.002 },
      categories: ['coffee', 'cafes'],
      ratingProviders: [{ name: 'yelp', rating: 4.5, totalReviewCount: 120 }],
    });
    // Monday 2026-10-19, 09:00 local
    expect(place?.hours?.isOpenAt(new Date(2026, 9, 19, 9, 0))).toBe(true);
  });

  it('fills absent optional columns', () => {
    const place = rowToPlace({
      ...cafeRow,
      address: null,
      categories: null,
      hours: null,
      providers: [{ name: 'tripAdvisor', rating: null }],
    });
    expect(place?.address).toBeUndefined();
    expect(place?.categories).toEqual([]);
    expect(place?.hours).toBeUndefined();
    expect(place?.ratingProviders).toEqual([{ name: 'tripAdvisor', rating: undefined, totalReviewCount: 0 }]);
  });

  it('rejects a row without rating providers', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(rowToPlace({ ...cafeRow, providers: [] })).toBeNull();
  });
});

describe('PostgisPlacesDatabase', () => {
  it('queries within the radius in meters', async () => {
    const { db, query } = fakeQueryable([cafeRow]);
    const places = await new PostgisPlacesDatabase(db).getPlaces(ORIGIN, 4);

    expect(places.map(p => p.id)).toEqual(['cafe-1']);
    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0]?.[1]).toEqual([40, -74, 4000, 200]);
    expect(query.mock.calls[0]?.[0]).toContain('ST_DWithin');
  });

  it('skips malformed rows', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { db } = fakeQueryable([{ id: 'broken' }, cafeRow]);

    const places = await new PostgisPlacesDatabase(db).getPlaces(ORIGIN, 1);

    expect(places.map(p => p.id)).toEqual(['cafe-1']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rethrows query failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const db: Queryable = { query: () => Promise.reject(new Error('connection refused')) };
    await expect(new PostgisPlacesDatabase(db).getPlaces(ORIGIN, 4)).rejects.toThrow('connection refused');
  });

  it('looks a place up by id', async () => {
    const { db, query } = fakeQueryable([cafeRow]);
    const place = await new PostgisPlacesDatabase(db).getPlace('cafe-1');

    expect(place?.name).toBe('Corner Cafe');
    expect(query.mock.calls[0]?.[1]).toEqual(['cafe-1']);
  });

  it('returns null for an unknown id', async () => {
    const { db } = fakeQueryable([]);
    expect(await new PostgisPlacesDatabase(db).getPlace('missing')).toBeNull();
  });
});
