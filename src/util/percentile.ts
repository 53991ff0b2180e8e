/**
 * Percentile calculation on sorted arrays, linear interpolation between
 * nearest ranks.
 *
 * @param sorted - Pre-sorted array of numbers (ascending)
 * @param p - Percentile to compute (0-100)
 */
export function percentile(sorted: readonly number[], p: number): number {
  const first = sorted[0];
  if (first === undefined) return Number.NaN;
  if (sorted.length === 1) return first;

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lowerValue = sorted[lower] ?? first;
  const upperValue = sorted[upper] ?? lowerValue;

  if (lower === upper) return lowerValue;

  const weight = index - lower;
  return lowerValue * (1 - weight) + upperValue * weight;
}
