/**
 * Restaurant filtering and sorting over the displayed set
 */

import type { RestaurantRecord, SortOption } from '../../contracts/assistant.contracts.js';

export interface RestaurantFilterCriteria {
  query?: string | undefined;
  cuisines?: readonly string[] | undefined;
  maxPrice?: number | undefined;
  minRating?: number | undefined;
}

export function filterRestaurants(
  restaurants: readonly RestaurantRecord[],
  criteria: RestaurantFilterCriteria
): RestaurantRecord[] {
  let filtered = [...restaurants];

  const query = criteria.query?.trim().toLowerCase();
  if (query) {
    filtered = filtered.filter(r =>
      r.name.toLowerCase().includes(query) ||
      r.cuisines.some(c => c.toLowerCase().includes(query))
    );
  }

  const cuisines = criteria.cuisines;
  if (cuisines && cuisines.length > 0) {
    filtered = filtered.filter(r => r.cuisines.some(c => cuisines.includes(c)));
  }

  const maxPrice = criteria.maxPrice;
  if (maxPrice !== undefined) {
    filtered = filtered.filter(r => r.priceLevel <= maxPrice);
  }

  const minRating = criteria.minRating;
  if (minRating !== undefined) {
    filtered = filtered.filter(r => r.rating >= minRating);
  }

  return filtered;
}

/**
 * Stable sort. Records without a distance go last when sorting by distance.
 */
export function sortRestaurants(restaurants: readonly RestaurantRecord[], option: SortOption): RestaurantRecord[] {
  const sorted = [...restaurants];
  switch (option) {
    case 'distance':
      return sorted.sort((a, b) =>
        (a.distanceMeters ?? Number.POSITIVE_INFINITY) - (b.distanceMeters ?? Number.POSITIVE_INFINITY)
      );
    case 'rating':
      return sorted.sort((a, b) => b.rating - a.rating);
    case 'price':
      return sorted.sort((a, b) => a.priceLevel - b.priceLevel);
  }
}
