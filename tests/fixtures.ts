import { vi } from 'vitest';
import type { PlacesDatabase } from '@/lib/db';
import { WeeklySchedule } from '@/lib/hours';
import type { TravelTimesBackend } from '@/lib/travel-times';
import type { LatLon, Place, RatingProvider, TransitMode, TravelTimes } from '@/lib/types';

export const ORIGIN: LatLon = { lat: 40, lon: -74 };

const METERS_PER_DEGREE_LAT = 111194.93;

export function north(meters: number, from: LatLon = ORIGIN): LatLon {
  return { lat: from.lat + meters / METERS_PER_DEGREE_LAT, lon: from.lon };
}

interface PlaceOptions {
  metersNorth?: number;
  categories?: string[];
  providers?: RatingProvider[];
  hours?: WeeklySchedule;
}

export function makePlace(id: string, options: PlaceOptions = {}): Place {
  return {
    id,
    name: `Place ${id}`,
    coordinate: north(options.metersNorth ?? 0),
    categories: options.categories ?? ['parks'],
    hours: options.hours,
    ratingProviders: options.providers ?? [{ name: 'yelp', totalReviewCount: 0 }],
  };
}

export function yelp(rating: number | undefined, totalReviewCount: number): RatingProvider {
  return { name: 'yelp', rating, totalReviewCount };
}

export function tripAdvisor(rating: number | undefined, totalReviewCount: number): RatingProvider {
  return { name: 'tripAdvisor', rating, totalReviewCount };
}

// Never opens again
export const CLOSED_FOR_GOOD = new WeeklySchedule([]);

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

/**
 * Routing backend answering walking times from a table; unknown ids hang.
 */
export function tableBackend(walkingSeconds: Record<string, number>) {
  const calls: Array<{ placeId: string; origin: LatLon; modes: TransitMode[] }> = [];
  const backend: TravelTimesBackend = {
    computeTravelTimes(place: Place, origin: LatLon, modes: TransitMode[]): Promise<TravelTimes> {
      calls.push({ placeId: place.id, origin, modes });
      const seconds = walkingSeconds[place.id];
      return seconds === undefined ? never<TravelTimes>() : Promise.resolve({ walkingTime: seconds });
    },
  };
  return { backend, calls };
}

export function fakeDatabase(places: Place[] = []) {
  return {
    getPlaces: vi.fn<PlacesDatabase['getPlaces']>().mockResolvedValue(places),
    getPlace: vi.fn<PlacesDatabase['getPlace']>().mockResolvedValue(null),
  };
}

// Runs notifications inline so assertions need no awaiting
export const inline = (task: () => void) => task();
