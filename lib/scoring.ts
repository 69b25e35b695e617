/**
 * Composite place rating.
 *
 * Blends the review-weighted average rating across providers with a
 * log-scaled review volume normalised against the busiest place in the
 * candidate set. Review volume is weighted twice as heavily as the rating,
 * so a well-reviewed place outranks a single 5-star outlier.
 */

import { findProvider } from './types';
import type { Place, RatingProvider } from './types';

const RATING_WEIGHT = 1;
const REVIEW_WEIGHT = 2;
const MAX_RATING = 5;

export function totalReviewCount(place: Place): number {
  const yelp = findProvider(place, 'yelp')?.totalReviewCount ?? 0;
  const tripAdvisor = findProvider(place, 'tripAdvisor')?.totalReviewCount ?? 0;
  return yelp + tripAdvisor;
}

/**
 * Largest review count in the candidate set. Computed once per ranking call.
 */
export function maxReviewCount(places: Place[]): number {
  return places.reduce((max, p) => Math.max(max, totalReviewCount(p)), 0);
}

/**
 * Returns a number from 0-1. `maxReviews` is the largest total review count
 * among the places being ranked together.
 */
export function compositeScore(place: Place, maxReviews: number): number {
  const yelp = findProvider(place, 'yelp');
  const tripAdvisor = findProvider(place, 'tripAdvisor');

  const yelpCount = yelp?.totalReviewCount ?? 0;
  const taCount = tripAdvisor?.totalReviewCount ?? 0;
  const yelpRating = yelp?.rating ?? 0;
  const taRating = tripAdvisor?.rating ?? 0;
  const totalCount = yelpCount + taCount;

  const ratingScore = totalCount > 0
    ? (yelpRating * yelpCount + taRating * taCount) / totalCount / MAX_RATING
    : 0;

  // log10(1) = 0, so a max of 0 or 1 review gives no volume signal
  const logMax = maxReviews > 1 ? Math.log10(maxReviews) : 0;
  const reviewScore = logMax > 0 && totalCount > 0 ? Math.log10(totalCount) / logMax : 0;

  const score = (ratingScore * RATING_WEIGHT + reviewScore * REVIEW_WEIGHT) / (RATING_WEIGHT + REVIEW_WEIGHT);
  return Math.min(1, Math.max(0, score));
}

export function reviewSummary(provider: RatingProvider | undefined, shortened = false): string {
  if (!provider || (provider.totalReviewCount === 0 && provider.rating === undefined)) {
    return 'No info' + (shortened ? '' : ' available');
  }
  const prefix = provider.totalReviewCount > 0 ? String(provider.totalReviewCount) : 'No';
  return `${prefix} Reviews`;
}
