/**
 * Travel-time cache and fetcher.
 *
 * One entry per place id, holding a shared promise so repeated requests for
 * the same place from the same origin (within ORIGIN_TOLERANCE_METERS) never
 * start a second fetch. A request from elsewhere replaces the entry, even
 * while it is in flight; earlier callers still get the old promise. Entries
 * are never evicted; growth is bounded only by the number of distinct place
 * ids seen by the process.
 */

import { distanceMeters } from './geo';
import { createLogger, errorMessage } from './logger';
import type { LatLon, Place, TransitMode, TravelTimes } from './types';

const log = createLogger('TravelTimes');

// An entry is reused for requests from within this distance of its origin
export const ORIGIN_TOLERANCE_METERS = 50;

export const YOU_ARE_HERE_WALKING_MINUTES = 1;
export const MAX_WALKING_MINUTES = 30;

/**
 * Routing backend. Implementations may hang forever; callers bound waits with
 * `settleWithin`.
 */
export interface TravelTimesBackend {
  computeTravelTimes(place: Place, origin: LatLon, modes: TransitMode[]): Promise<TravelTimes>;
}

type EntryState =
  | { status: 'pending' }
  | { status: 'resolved'; value: TravelTimes }
  | { status: 'failed' };

interface TravelTimeEntry {
  origin: LatLon;
  modes: ReadonlySet<TransitMode>;
  state: EntryState;
  promise: Promise<TravelTimes | null>;
}

export class TravelTimesCache {
  private readonly entries = new Map<string, TravelTimeEntry>();

  constructor(private readonly backend: TravelTimesBackend) {}

  /**
   * Travel times for `place` from `origin`. Resolves null when the backend
   * fails; never rejects.
   */
  request(place: Place, origin: LatLon, modes: TransitMode[] = ['walking', 'driving']): Promise<TravelTimes | null> {
    const existing = this.entries.get(place.id);
    if (existing && canReuse(existing, origin, modes)) {
      return existing.promise;
    }

    const entry: TravelTimeEntry = {
      origin,
      modes: new Set(modes),
      state: { status: 'pending' },
      promise: Promise.resolve(null),
    };

    entry.promise = new Promise<TravelTimes>(resolve => {
      resolve(this.backend.computeTravelTimes(place, origin, modes));
    }).then(
      value => {
        entry.state = { status: 'resolved', value };
        return value;
      },
      error => {
        entry.state = { status: 'failed' };
        log.warn(`Lookup failed for ${place.id}:`, errorMessage(error));
        return null;
      }
    );

    this.entries.set(place.id, entry);
    return entry.promise;
  }

  /**
   * Resolved travel times for a place, or undefined while pending, failed or unknown.
   */
  peek(placeId: string): TravelTimes | undefined {
    const state = this.entries.get(placeId)?.state;
    return state?.status === 'resolved' ? state.value : undefined;
  }

  isSettled(placeId: string): boolean {
    const state = this.entries.get(placeId)?.state;
    return state !== undefined && state.status !== 'pending';
  }

  get size(): number {
    return this.entries.size;
  }
}

// Pending or settled, an entry only answers for its own origin class; failures are retried
function canReuse(entry: TravelTimeEntry, origin: LatLon, modes: TransitMode[]): boolean {
  if (entry.state.status === 'failed') return false;
  if (!modes.every(mode => entry.modes.has(mode))) return false;
  return distanceMeters(entry.origin, origin) <= ORIGIN_TOLERANCE_METERS;
}

/**
 * Resolves once every promise settles or `timeoutMs` elapses, whichever is
 * first. Never rejects.
 */
export function settleWithin(promises: Promise<unknown>[], timeoutMs: number): Promise<'settled' | 'timedOut'> {
  return new Promise(resolve => {
    const timer = setTimeout(() => resolve('timedOut'), timeoutMs);
    void Promise.allSettled(promises).then(() => {
      clearTimeout(timer);
      resolve('settled');
    });
  });
}

export function shortestTravelTime(times: TravelTimes | undefined): number | undefined {
  if (!times) return undefined;
  const known = [times.walkingTime, times.drivingTime].filter((t): t is number => t !== undefined);
  return known.length > 0 ? Math.min(...known) : undefined;
}

export type TravelTimesDisplay =
  | { kind: 'userHere' }
  | { kind: 'walking'; minutes: number }
  | { kind: 'driving'; minutes: number }
  | { kind: 'noData' };

export function describeTravelTimes(times: TravelTimes | null): TravelTimesDisplay {
  if (!times) return { kind: 'noData' };

  if (times.walkingTime !== undefined) {
    const minutes = Math.round(times.walkingTime / 60);
    if (minutes <= MAX_WALKING_MINUTES) {
      return minutes < YOU_ARE_HERE_WALKING_MINUTES ? { kind: 'userHere' } : { kind: 'walking', minutes };
    }
  }

  if (times.drivingTime !== undefined) {
    return { kind: 'driving', minutes: Math.round(times.drivingTime / 60) };
  }

  return { kind: 'noData' };
}

/**
 * Staleness guard for a reusable display slot. Each bind takes a new
 * generation; a result is applied only if no later bind happened meanwhile.
 * Superseded fetches are not cancelled, their results are dropped.
 */
export class TravelTimesSlot {
  private generation = 0;
  private boundPlaceId: string | null = null;

  constructor(private readonly cache: TravelTimesCache) {}

  get placeId(): string | null {
    return this.boundPlaceId;
  }

  /**
   * Resolves true if `apply` ran, false if the slot was rebound first.
   */
  async bind(place: Place, origin: LatLon, apply: (display: TravelTimesDisplay) => void): Promise<boolean> {
    const token = ++this.generation;
    this.boundPlaceId = place.id;

    const result = await this.cache.request(place, origin);
    if (token !== this.generation) {
      log.debug(`Dropping stale result for ${place.id}, slot now shows ${this.boundPlaceId ?? 'nothing'}`);
      return false;
    }
    apply(describeTravelTimes(result));
    return true;
  }

  /** Forget the bound place; any outstanding result is dropped. */
  reset(): void {
    this.generation++;
    this.boundPlaceId = null;
  }
}
