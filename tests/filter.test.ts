import { describe, it, expect } from 'vitest';
import { categorySummary, classifyPlace } from '@/lib/categories';
import { filterPlaces, passesHoursGate } from '@/lib/filter';
import { WeeklySchedule } from '@/lib/hours';
import { FILTER_BUCKETS } from '@/lib/types';
import type { FilterBucket, FilterSet } from '@/lib/types';
import { CLOSED_FOR_GOOD, makePlace, yelp } from './fixtures';

const NOW = new Date(2026, 9, 19, 12, 0); // Monday noon

function only(...buckets: FilterBucket[]): FilterSet {
  return { enabled: new Set(buckets), topRatedOnly: false };
}

const everything: FilterSet = { enabled: new Set(FILTER_BUCKETS), topRatedOnly: false };

describe('classifyPlace', () => {
  it('maps known tags to their bucket', () => {
    expect(classifyPlace(makePlace('a', { categories: ['restaurants'] }))).toBe('eatAndDrink');
    expect(classifyPlace(makePlace('b', { categories: ['zoos'] }))).toBe('discover');
    expect(classifyPlace(makePlace('c', { categories: ['convenience'] }))).toBe('services');
  });

  it('uses the first tag found in the table', () => {
    expect(classifyPlace(makePlace('a', { categories: ['unlisted', 'shopping', 'food'] }))).toBe('shop');
  });

  it('returns null when no tag is known', () => {
    expect(classifyPlace(makePlace('a', { categories: ['unlisted'] }))).toBeNull();
    expect(classifyPlace(makePlace('b', { categories: [] }))).toBeNull();
  });

  it('routes synthetic ids by prefix regardless of tags', () => {
    expect(classifyPlace(makePlace('event-42', { categories: ['shopping'] }))).toBe('localevents');
    expect(classifyPlace(makePlace('test-discover-1', { categories: ['parks'] }))).toBe('services');
  });
});

describe('filterPlaces', () => {
  it('keeps only places in enabled buckets', () => {
    const a = makePlace('A', { metersNorth: 100, categories: ['shopping'] });
    const b = makePlace('B', { metersNorth: 50, categories: ['restaurants'], providers: [yelp(4.5, 20)] });

    expect(filterPlaces([a, b], only('eatAndDrink'), NOW)).toEqual([b]);
  });

  it('drops unclassifiable places even with every bucket enabled', () => {
    const stray = makePlace('x', { categories: ['unlisted'] });
    expect(filterPlaces([stray], everything, NOW)).toEqual([]);
  });

  it('excludes places that are closed and never reopen', () => {
    const gone = makePlace('gone', { categories: ['restaurants'], hours: CLOSED_FOR_GOOD });
    expect(passesHoursGate(gone, NOW)).toBe(false);
    expect(filterPlaces([gone], everything, NOW)).toEqual([]);
  });

  it('keeps places that are closed now but open later', () => {
    const evening = new WeeklySchedule([{ open: { day: 1, time: '1800' }, close: { day: 1, time: '2300' } }]);
    const later = makePlace('later', { categories: ['restaurants'], hours: evening });
    expect(filterPlaces([later], only('eatAndDrink'), NOW)).toEqual([later]);
  });

  it('never excludes places without hours on the hours gate', () => {
    expect(passesHoursGate(makePlace('open'), NOW)).toBe(true);
  });
});

describe('categorySummary', () => {
  it('joins the first three categories', () => {
    expect(categorySummary(['Pizza', 'Bars', 'Italian', 'Wine'])).toBe('Pizza • Bars • Italian');
  });

  it('is undefined without categories', () => {
    expect(categorySummary([])).toBeUndefined();
    expect(categorySummary(undefined)).toBeUndefined();
  });
});
