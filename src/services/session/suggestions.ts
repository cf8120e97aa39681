export const COMMON_QUERIES = [
  'Italian restaurants nearby',
  'Best sushi places',
  'Restaurants open now',
  'Outdoor dining options',
  'Family-friendly restaurants',
  'Vegan restaurants',
  'Restaurants with gluten-free options'
] as const;

export const AVAILABLE_CUISINES = [
  'Italian', 'Chinese', 'Mexican', 'Indian', 'Japanese', 'Thai',
  'French', 'American', 'Mediterranean', 'Greek', 'Korean', 'Vietnamese',
  'Spanish', 'Turkish', 'Lebanese', 'Ethiopian', 'German', 'Brazilian'
] as const;

export const MAX_SUGGESTIONS = 6;

/**
 * Recent searches first, padded with common queries
 */
export function suggestedQueries(recentSearches: readonly string[]): string[] {
  const suggestions = [...recentSearches];
  for (const query of COMMON_QUERIES) {
    if (!suggestions.includes(query)) {
      suggestions.push(query);
    }
  }
  return suggestions.slice(0, MAX_SUGGESTIONS);
}
