import { classifyPlace } from './categories';
import type { FilterSet, Place } from './types';

/**
 * A place with listed hours that is closed now and never reopens is gone for
 * good. Places without hours always pass.
 */
export function passesHoursGate(place: Place, now: Date): boolean {
  const hours = place.hours;
  if (!hours) return true;
  return hours.isOpenAt(now) || hours.nextOpeningAfter(now) !== null;
}

export function filterPlaces(places: Place[], filterSet: FilterSet, now: Date = new Date()): Place[] {
  return places.filter(place => {
    if (!passesHoursGate(place, now)) return false;
    const bucket = classifyPlace(place);
    return bucket !== null && filterSet.enabled.has(bucket);
  });
}
