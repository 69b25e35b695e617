// Google Distance Matrix backed travel times. Durations come back in seconds.
// Requests without GOOGLE_MAPS_API_KEY fail, which the cache records as "no data".

import { z } from 'zod';
import { createLogger } from '../logger';
import type { TravelTimesBackend } from '../travel-times';
import type { LatLon, Place, TransitMode, TravelTimes } from '../types';

const log = createLogger('Directions');

const DISTANCE_MATRIX_URL = 'https://maps.googleapis.com/maps/api/distancematrix/json';
const REQUEST_TIMEOUT = 8000;

const MatrixResponseSchema = z.object({
  status: z.string(),
  rows: z.array(
    z.object({
      elements: z.array(
        z.object({
          status: z.string(),
          duration: z.object({ value: z.number() }).optional(),
        })
      ),
    })
  ),
});

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class DistanceMatrixBackend implements TravelTimesBackend {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly fetchFn: FetchLike = fetch,
    private readonly timeoutMs: number = REQUEST_TIMEOUT
  ) {}

  async computeTravelTimes(place: Place, origin: LatLon, modes: TransitMode[]): Promise<TravelTimes> {
    if (!this.apiKey) {
      throw new Error('GOOGLE_MAPS_API_KEY not configured');
    }

    const durations = await Promise.all(modes.map(mode => this.fetchDurationSeconds(place, origin, mode)));

    const result: TravelTimes = {};
    modes.forEach((mode, i) => {
      const seconds = durations[i];
      if (seconds === null) return;
      if (mode === 'walking') result.walkingTime = seconds;
      else result.drivingTime = seconds;
    });
    return result;
  }

  private async fetchDurationSeconds(place: Place, origin: LatLon, mode: TransitMode): Promise<number | null> {
    const url = new URL(DISTANCE_MATRIX_URL);
    url.searchParams.set('origins', `${origin.lat},${origin.lon}`);
    url.searchParams.set('destinations', `${place.coordinate.lat},${place.coordinate.lon}`);
    url.searchParams.set('mode', mode);
    url.searchParams.set('key', this.apiKey ?? '');

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Distance Matrix error: ${response.status}`);
      }

      const data = MatrixResponseSchema.parse(await response.json());
      const element = data.rows[0]?.elements[0];
      if (!element || element.status !== 'OK' || !element.duration) {
        log.debug(`No ${mode} route to ${place.id} (${element?.status ?? data.status})`);
        return null;
      }
      return element.duration.value;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
