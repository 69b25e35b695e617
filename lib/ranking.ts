/**
 * Ranking pipeline: distance, travel time and top-rated orderings.
 *
 * All sorts are stable (Array.prototype.sort is stable since ES2019), so
 * places that compare equal keep their input order across refreshes.
 */

import { distanceMeters } from './geo';
import { createLogger } from './logger';
import { compositeScore, maxReviewCount } from './scoring';
import { settleWithin, shortestTravelTime } from './travel-times';
import type { TravelTimesCache } from './travel-times';
import type { LatLon, Place } from './types';

const log = createLogger('Ranking');

export const DEFAULT_TRAVEL_TIME_TIMEOUT_MS = 5000;

export function sortByDistance(places: Place[], location: LatLon, ascending = true): Place[] {
  const distances = new Map(places.map(p => [p.id, distanceMeters(location, p.coordinate)]));
  const direction = ascending ? 1 : -1;
  return [...places].sort((a, b) => {
    const da = distances.get(a.id) ?? Infinity;
    const db = distances.get(b.id) ?? Infinity;
    return da === db ? 0 : (da < db ? -1 : 1) * direction;
  });
}

export interface TravelTimeSortOptions {
  cache: TravelTimesCache;
  timeoutMs?: number;
  ascending?: boolean;
}

/**
 * Orders places by shortest known travel time from `location`.
 *
 * The distance order is the seed: places whose travel time is unknown once
 * the wait ends sort as if infinitely far and keep their distance order among
 * themselves. Only walking times are requested. The result always holds
 * exactly the input places.
 */
export async function sortByTravelTime(
  places: Place[],
  location: LatLon,
  { cache, timeoutMs = DEFAULT_TRAVEL_TIME_TIMEOUT_MS, ascending = true }: TravelTimeSortOptions
): Promise<Place[]> {
  const seed = sortByDistance(places, location);
  if (seed.length === 0) return seed;

  // From this call's own requests; the cache entry may since have been replaced
  const etas = new Map<string, number>();
  const requests = seed.map(p =>
    cache.request(p, location, ['walking']).then(times => {
      const eta = shortestTravelTime(times ?? undefined);
      if (eta !== undefined) etas.set(p.id, eta);
    })
  );

  const outcome = await settleWithin(requests, timeoutMs);
  if (outcome === 'timedOut') {
    log.warn(`Travel times not settled after ${timeoutMs}ms, ranking with what resolved`);
  }

  const direction = ascending ? 1 : -1;
  return seed.sort((a, b) => {
    const ea = etas.get(a.id) ?? Infinity;
    const eb = etas.get(b.id) ?? Infinity;
    return ea === eb ? 0 : (ea < eb ? -1 : 1) * direction;
  });
}

export function sortByTopRated(places: Place[]): Place[] {
  const maxReviews = maxReviewCount(places);
  const scores = new Map(places.map(p => [p.id, compositeScore(p, maxReviews)]));
  return [...places].sort((a, b) => (scores.get(b.id) ?? 0) - (scores.get(a.id) ?? 0));
}
