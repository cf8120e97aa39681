/**
 * EntityExtractor
 * Turns free-form model text into restaurant records.
 *
 * This is a keyword heuristic, not a search: it never consults a restaurant
 * database and never invents a cuisine outside CUISINES. Field values other
 * than the cuisine are synthesized from templates and the random source.
 */

import type { Coordinate, LocationFix, RestaurantRecord } from '../../contracts/assistant.contracts.js';
import { haversineMeters } from '../../lib/geo/distance-calculator.js';
import {
  mathRandom,
  pickOne,
  randomFloat,
  randomHexId,
  randomInt,
  type RandomSource
} from '../../lib/random/random-source.js';
import {
  COORDINATE_JITTER_DEGREES,
  CUISINES,
  DEFAULT_COORDINATE,
  DEFAULT_HOURS,
  HIGHLIGHTS,
  MAX_ENTITIES,
  NAME_DESCRIPTORS,
  STREET_NAMES,
  VENUE_KEYWORDS
} from './extraction.vocabulary.js';

export interface ExtractionResult {
  entities: RestaurantRecord[];
  /** The response text, unchanged */
  passthroughText: string;
}

export function mentionsVenue(text: string): boolean {
  const lower = text.toLowerCase();
  return VENUE_KEYWORDS.some(keyword => lower.includes(keyword));
}

/**
 * Distinct cuisines in order of first appearance, at most MAX_ENTITIES
 */
export function matchCuisines(text: string): string[] {
  const lower = text.toLowerCase();
  return CUISINES
    .map(cuisine => ({ cuisine, index: lower.indexOf(cuisine.toLowerCase()) }))
    .filter(match => match.index >= 0)
    .sort((a, b) => a.index - b.index)
    .slice(0, MAX_ENTITIES)
    .map(match => match.cuisine);
}

export function extractRestaurants(
  responseText: string,
  fix: LocationFix | undefined,
  random: RandomSource = mathRandom
): ExtractionResult {
  if (!mentionsVenue(responseText)) {
    return { entities: [], passthroughText: responseText };
  }

  const entities = matchCuisines(responseText).map((cuisine, index) =>
    synthesizeRecord(cuisine, index, fix, random)
  );

  return { entities, passthroughText: responseText };
}

function synthesizeRecord(
  cuisine: string,
  index: number,
  fix: LocationFix | undefined,
  random: RandomSource
): RestaurantRecord {
  const coordinates = fix ? jitter(fix, random) : { ...DEFAULT_COORDINATE };
  const slug = cuisine.toLowerCase();

  const record: RestaurantRecord = {
    id: `rest_${randomHexId(random)}`,
    name: `${cuisine} ${pickOne(random, NAME_DESCRIPTORS)}`,
    address: `${randomInt(random, 10, 999)} ${pickOne(random, STREET_NAMES)} St`,
    phone: `(555) ${randomInt(random, 100, 999)}-${randomInt(random, 1000, 9999)}`,
    website: `https://${slug}restaurant.example.com`,
    rating: Math.round(randomFloat(random, 3.0, 5.0) * 10) / 10,
    priceLevel: randomInt(random, 1, 4),
    cuisines: [cuisine],
    coordinates,
    imageUrl: `https://example.com/${cuisine}_${index}.jpg`,
    hours: [...DEFAULT_HOURS],
    description: `Authentic ${cuisine} cuisine with a modern twist. Popular for their ${pickOne(random, HIGHLIGHTS)}.`
  };

  if (fix) {
    record.distanceMeters = haversineMeters(fix, coordinates);
  }

  return record;
}

function jitter(center: Coordinate, random: RandomSource): Coordinate {
  return {
    latitude: center.latitude + randomFloat(random, -COORDINATE_JITTER_DEGREES, COORDINATE_JITTER_DEGREES),
    longitude: center.longitude + randomFloat(random, -COORDINATE_JITTER_DEGREES, COORDINATE_JITTER_DEGREES)
  };
}
