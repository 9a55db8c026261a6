/**
 * Formatting utilities for human-readable distance
 */

/**
 * Format distance in meters to human-readable string
 * @param meters Distance in meters
 * @returns Formatted string (e.g., "1.5 km", "850 m")
 */
export function formatDistance(meters: number): string {
  if (!Number.isFinite(meters)) return 'unknown';
  if (meters < 0) return '0 m';

  if (meters >= 1000) {
    const km = meters / 1000;
    return `${km.toFixed(1)} km`;
  }

  return `${Math.round(meters)} m`;
}
