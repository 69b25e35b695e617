import { EVENT_ID_PREFIX } from './categories';
import type { LatLon, Place } from './types';

export interface LocalEvent {
  id: string;
  name: string;
  coordinate: LatLon;
  startTime: Date;
  endTime?: Date;
  venueName?: string;
  url?: string;
}

export interface EventsProvider {
  searchEvents(near: LatLon): Promise<LocalEvent[]>;
}

/**
 * An event is over at its end time, or at the end of its start day when it
 * has none.
 */
export function hasEnded(event: LocalEvent, now: Date): boolean {
  let end = event.endTime;
  if (!end) {
    end = new Date(event.startTime.getTime());
    end.setHours(24, 0, 0, 0);
  }
  return now.getTime() >= end.getTime();
}

/**
 * Present an event as a place so it can be filtered and ranked with the rest.
 * The id prefix routes it to the localevents bucket.
 */
export function eventToPlace(event: LocalEvent): Place {
  return {
    id: `${EVENT_ID_PREFIX}${event.id}`,
    name: event.name,
    address: event.venueName,
    coordinate: event.coordinate,
    categories: ['localevents'],
    ratingProviders: [{ name: 'yelp', totalReviewCount: 0 }],
  };
}
