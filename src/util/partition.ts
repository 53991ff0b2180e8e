/**
 * Split a list into consecutive groups of at most `size` items. The last
 * group may be smaller; an empty list yields no groups.
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Partition size must be a positive integer, got ${size}`);
  }

  const groups: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    groups.push(items.slice(start, start + size));
  }
  return groups;
}
