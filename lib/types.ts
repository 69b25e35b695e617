import { z } from 'zod';
import type { WeeklySchedule } from './hours';

// Filter buckets - every place is classified into exactly one
export const FilterBucketSchema = z.enum(['discover', 'eatAndDrink', 'shop', 'services', 'localevents']);
export type FilterBucket = z.infer<typeof FilterBucketSchema>;

export const FILTER_BUCKETS = FilterBucketSchema.options;

// Lat/Lon interface
export interface LatLon {
  lat: number;
  lon: number;
}

// Review provider names used by the composite score
export type ProviderName = 'yelp' | 'tripAdvisor';

export interface RatingProvider {
  name: string;             // 'yelp', 'tripAdvisor', ...
  rating?: number;          // 0-5 average, absent when the provider has none
  totalReviewCount: number;
}

export const RatingProviderSchema = z.object({
  name: z.string().min(1),
  rating: z.number().min(0).max(5).nullish().transform(v => v ?? undefined),
  totalReviewCount: z.number().int().min(0).default(0),
});

export interface Place {
  id: string;
  name: string;
  address?: string;
  coordinate: LatLon;
  categories: string[];       // Ordered category tag ids
  hours?: WeeklySchedule;
  ratingProviders: RatingProvider[];
}

// Travel durations in seconds
export interface TravelTimes {
  walkingTime?: number;
  drivingTime?: number;
}

export type TransitMode = 'walking' | 'driving';

export interface FilterSet {
  enabled: ReadonlySet<FilterBucket>;
  topRatedOnly: boolean;
}

export const DEFAULT_FILTER_SET: FilterSet = {
  enabled: new Set<FilterBucket>(['discover', 'localevents']),
  topRatedOnly: false,
};

// Query params for /api/places
export const PlacesQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  filters: z
    .string()
    .optional()
    .transform(v => (v ? v.split(',').map(s => s.trim()).filter(Boolean) : undefined))
    .pipe(z.array(FilterBucketSchema).optional()),
  topRated: z
    .enum(['true', 'false'])
    .optional()
    .transform(v => v === 'true'),
});

export type PlacesQuery = z.infer<typeof PlacesQuerySchema>;

export function toFilterSet(query: PlacesQuery): FilterSet {
  return {
    enabled: query.filters ? new Set(query.filters) : DEFAULT_FILTER_SET.enabled,
    topRatedOnly: query.topRated,
  };
}

export function findProvider(place: Place, name: ProviderName): RatingProvider | undefined {
  return place.ratingProviders.find(p => p.name === name);
}

// Places API response
export interface PlacesApiResponse {
  ok: boolean;
  count: number;
  places: PlaceDto[];
}

export interface PlaceDto {
  id: string;
  name: string;
  address?: string;
  lat: number;
  lon: number;
  categories: string[];
  ratingProviders: RatingProvider[];
}

export function toPlaceDto(place: Place): PlaceDto {
  return {
    id: place.id,
    name: place.name,
    address: place.address,
    lat: place.coordinate.lat,
    lon: place.coordinate.lon,
    categories: place.categories,
    ratingProviders: place.ratingProviders,
  };
}
