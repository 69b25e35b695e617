/**
 * Concurrent place store.
 *
 * Holds every fetched place (travel-time ranked) and the filtered, displayed
 * subset together with an id -> index map. The three live in one immutable
 * state cell that is only ever read or replaced whole, under a single
 * read/write lock, so no reader can see lists from two different commits.
 *
 * Every commit notifies the delegate once, on the UI context, after the lock
 * is released.
 */

import type { LRUCache } from './cache';
import { PlaceNotFoundError } from './errors';
import { eventToPlace, hasEnded } from './events';
import type { EventsProvider, LocalEvent } from './events';
import type { PlacesDatabase } from './db';
import { filterPlaces } from './filter';
import { createLogger, errorMessage } from './logger';
import { DEFAULT_TRAVEL_TIME_TIMEOUT_MS, sortByDistance, sortByTopRated, sortByTravelTime } from './ranking';
import { ReadWriteLock } from './rwlock';
import type { TravelTimesCache } from './travel-times';
import { DEFAULT_FILTER_SET } from './types';
import type { FilterSet, LatLon, Place } from './types';

const log = createLogger('PlacesStore');

export interface PlacesStoreDelegate {
  onPlacesUpdated(displayedPlaces: readonly Place[]): void;
}

/** Schedules work on the context that owns UI-facing calls. */
export type UiContext = (task: () => void) => void;

export interface PlacesSnapshot {
  allPlaces: readonly Place[];
  displayedPlaces: readonly Place[];
}

interface PlacesState extends PlacesSnapshot {
  indexById: ReadonlyMap<string, number>;
}

export interface PlacesStoreOptions {
  database: PlacesDatabase;
  travelTimes: TravelTimesCache;
  searchRadiusKm: number;
  events?: EventsProvider;
  travelTimeTimeoutMs?: number;
  uiContext?: UiContext;
  lookupCache?: LRUCache<Place>;
  clock?: () => Date;
  initialPlaces?: Place[];
}

function buildState(allPlaces: readonly Place[], displayedPlaces: readonly Place[]): PlacesState {
  const indexById = new Map<string, number>();
  displayedPlaces.forEach((place, index) => indexById.set(place.id, index));
  return {
    allPlaces: Object.freeze([...allPlaces]),
    displayedPlaces: Object.freeze([...displayedPlaces]),
    indexById,
  };
}

export class PlacesStore {
  private readonly lock = new ReadWriteLock();
  private state: PlacesState;
  private currentFilterSet: FilterSet = DEFAULT_FILTER_SET;
  private delegate: PlacesStoreDelegate | null = null;
  private locationGeneration = 0;

  private readonly database: PlacesDatabase;
  private readonly events?: EventsProvider;
  private readonly travelTimes: TravelTimesCache;
  private readonly searchRadiusKm: number;
  private readonly travelTimeTimeoutMs: number;
  private readonly uiContext: UiContext;
  private readonly lookupCache?: LRUCache<Place>;
  private readonly clock: () => Date;

  constructor(options: PlacesStoreOptions) {
    this.database = options.database;
    this.events = options.events;
    this.travelTimes = options.travelTimes;
    this.searchRadiusKm = options.searchRadiusKm;
    this.travelTimeTimeoutMs = options.travelTimeTimeoutMs ?? DEFAULT_TRAVEL_TIME_TIMEOUT_MS;
    this.uiContext = options.uiContext ?? (task => queueMicrotask(task));
    this.lookupCache = options.lookupCache;
    this.clock = options.clock ?? (() => new Date());

    const initial = options.initialPlaces ?? [];
    this.state = buildState(initial, initial);
  }

  /**
   * Register the delegate. Returns a function that unregisters it; call it on
   * teardown so the store does not keep the listener alive.
   */
  setDelegate(delegate: PlacesStoreDelegate): () => void {
    this.delegate = delegate;
    return () => {
      if (this.delegate === delegate) this.delegate = null;
    };
  }

  get filterSet(): FilterSet {
    return this.lock.withReadLock(() => this.currentFilterSet);
  }

  /**
   * Fetch, rank and commit the places around `location`.
   * Resolves false when a later call overtook this one and its result was dropped.
   */
  async updateFromLocation(location: LatLon): Promise<boolean> {
    const generation = ++this.locationGeneration;

    const [placesResult, eventsResult] = await Promise.allSettled([
      this.database.getPlaces(location, this.searchRadiusKm),
      this.events ? this.events.searchEvents(location) : Promise.resolve<LocalEvent[]>([]),
    ]);

    let places: Place[] = [];
    if (placesResult.status === 'fulfilled') {
      places = placesResult.value;
    } else {
      log.warn('Places query failed, continuing without places:', errorMessage(placesResult.reason));
    }

    const now = this.clock();
    let events: Place[] = [];
    if (eventsResult.status === 'fulfilled') {
      events = eventsResult.value.filter(event => !hasEnded(event, now)).map(eventToPlace);
    } else {
      log.warn('Events search failed, continuing without events:', errorMessage(eventsResult.reason));
    }

    const candidates = [...places, ...events];

    // Request travel times for what the user will see first, ahead of the
    // full sort; the cache shares these requests with it.
    const visible = filterPlaces(candidates, this.filterSet, now);
    for (const place of visible) {
      void this.travelTimes.request(place, location, ['walking']);
    }

    const ranked = await sortByTravelTime(candidates, location, {
      cache: this.travelTimes,
      timeoutMs: this.travelTimeTimeoutMs,
    });

    if (generation !== this.locationGeneration) {
      log.debug(`Dropping overtaken location update #${generation}`);
      return false;
    }

    const displayed = this.lock.withWriteLock(() => {
      this.state = this.recompute(ranked);
      return this.state.displayedPlaces;
    });
    log.debug(`Committed ${ranked.length} places, ${displayed.length} displayed`);
    this.notify(displayed);
    return true;
  }

  /**
   * Re-apply filtering and ranking to the current places without fetching.
   * Call from the UI context only.
   */
  refresh(filterSet: FilterSet): void {
    const displayed = this.lock.withWriteLock(() => {
      // Copied so later changes to the caller's set cannot bypass a recompute
      this.currentFilterSet = { enabled: new Set(filterSet.enabled), topRatedOnly: filterSet.topRatedOnly };
      this.state = this.recompute(this.state.allPlaces);
      return this.state.displayedPlaces;
    });
    this.notify(displayed);
  }

  /**
   * Re-order the displayed places by distance. No-op while top-rated ordering is on.
   */
  sortByDistance(location: LatLon): void {
    const displayed = this.lock.withWriteLock(() => {
      if (this.currentFilterSet.topRatedOnly) return null;
      this.state = buildState(this.state.allPlaces, sortByDistance([...this.state.displayedPlaces], location));
      return this.state.displayedPlaces;
    });
    if (displayed) this.notify(displayed);
  }

  placeAt(index: number): Place {
    return this.lock.withReadLock(() => {
      const { displayedPlaces } = this.state;
      if (!Number.isInteger(index) || index < 0 || index >= displayedPlaces.length) {
        throw new PlaceNotFoundError(index);
      }
      return displayedPlaces[index];
    });
  }

  /**
   * Look a place up by id: displayed places and the lookup cache first, then
   * the database. The lock is not held while the database call runs.
   */
  async placeForKey(id: string): Promise<Place | null> {
    const local = this.lock.withReadLock(() => {
      const index = this.state.indexById.get(id);
      return index !== undefined ? this.state.displayedPlaces[index] : this.lookupCache?.get(id);
    });
    if (local) return local;

    try {
      const place = await this.database.getPlace(id);
      if (place) this.lookupCache?.set(id, place);
      return place;
    } catch (error) {
      log.warn(`Lookup of ${id} failed:`, errorMessage(error));
      return null;
    }
  }

  /**
   * The place after `place`. A place no longer displayed maps to the first
   * displayed place so a detail view stays navigable after the list changes.
   */
  nextPlace(place: Place): Place | null {
    return this.lock.withReadLock(() => {
      const { displayedPlaces, indexById } = this.state;
      const index = indexById.get(place.id);
      if (index === undefined) {
        return displayedPlaces.length > 0 ? displayedPlaces[0] : null;
      }
      return index + 1 < displayedPlaces.length ? displayedPlaces[index + 1] : null;
    });
  }

  previousPlace(place: Place): Place | null {
    return this.lock.withReadLock(() => {
      const index = this.state.indexById.get(place.id);
      if (index === undefined || index === 0) return null;
      return this.state.displayedPlaces[index - 1];
    });
  }

  count(): number {
    return this.lock.withReadLock(() => this.state.displayedPlaces.length);
  }

  indexOf(place: Place): number | undefined {
    return this.lock.withReadLock(() => this.state.indexById.get(place.id));
  }

  getSnapshot(): PlacesSnapshot {
    return this.lock.withReadLock(() => ({
      allPlaces: this.state.allPlaces,
      displayedPlaces: this.state.displayedPlaces,
    }));
  }

  // Callers hold the write lock
  private recompute(allPlaces: readonly Place[]): PlacesState {
    const filtered = filterPlaces([...allPlaces], this.currentFilterSet, this.clock());
    // allPlaces is already in travel-time order
    const displayed = this.currentFilterSet.topRatedOnly ? sortByTopRated(filtered) : filtered;
    return buildState(allPlaces, displayed);
  }

  private notify(displayed: readonly Place[]): void {
    this.uiContext(() => {
      this.delegate?.onPlacesUpdated(displayed);
    });
  }
}
