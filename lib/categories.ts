import { z } from 'zod';
import categoryFilters from './data/category-filters.json';
import { FilterBucketSchema } from './types';
import type { FilterBucket, Place } from './types';

// Synthetic entries bypass the tag table
export const DISCOVER_TEST_PREFIX = 'test-discover-';
export const EVENT_ID_PREFIX = 'event-';

const MAX_DISPLAYED_CATEGORIES = 3;

const CategoryTableSchema = z.record(FilterBucketSchema, z.array(z.string().min(1)));

function buildTagIndex(): Map<string, FilterBucket> {
  const table = CategoryTableSchema.parse(categoryFilters);
  const index = new Map<string, FilterBucket>();
  for (const bucket of FilterBucketSchema.options) {
    for (const tag of table[bucket] ?? []) {
      index.set(tag, bucket);
    }
  }
  return index;
}

const TAG_TO_BUCKET = buildTagIndex();

/**
 * Classify a place into one filter bucket, or null when none of its tags is known.
 */
export function classifyPlace(place: Place): FilterBucket | null {
  if (place.id.startsWith(DISCOVER_TEST_PREFIX)) return 'services';
  if (place.id.startsWith(EVENT_ID_PREFIX)) return 'localevents';

  for (const tag of place.categories) {
    const bucket = TAG_TO_BUCKET.get(tag);
    if (bucket) return bucket;
  }
  return null;
}

export function categorySummary(categories: string[] | undefined): string | undefined {
  if (!categories || categories.length === 0) return undefined;
  return categories.slice(0, MAX_DISPLAYED_CATEGORIES).join(' • ');
}
