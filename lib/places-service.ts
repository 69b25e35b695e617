/**
 * Process-wide store wiring for the route handlers.
 */

import { LRUCache } from './cache';
import { loadConfig } from './config';
import { PostgisPlacesDatabase } from './db';
import { createLogger } from './logger';
import { PlacesStore } from './places-store';
import { DistanceMatrixBackend } from './providers/directions';
import { TravelTimesCache } from './travel-times';
import type { Place } from './types';

const log = createLogger('PlacesService');

let store: PlacesStore | null = null;

export function getPlacesStore(): PlacesStore {
  if (!store) {
    const config = loadConfig();
    store = new PlacesStore({
      database: new PostgisPlacesDatabase(),
      travelTimes: new TravelTimesCache(new DistanceMatrixBackend(config.GOOGLE_MAPS_API_KEY)),
      searchRadiusKm: config.SEARCH_RADIUS_KM,
      travelTimeTimeoutMs: config.TRAVEL_TIME_TIMEOUT_MS,
      lookupCache: new LRUCache<Place>({ maxSize: config.PLACE_LOOKUP_CACHE_SIZE }),
    });
    log.debug(`Store created (radius ${config.SEARCH_RADIUS_KM}km)`);
  }
  return store;
}
