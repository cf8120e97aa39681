/**
 * "850 m away" under a kilometer, "1.2 km away" above
 */
export function formatDistance(meters: number): string {
  const rounded = Math.round(meters);
  if (rounded < 1000) {
    return `${rounded} m away`;
  }
  return `${(meters / 1000).toFixed(1)} km away`;
}
