/**
 * Meter identity helpers.
 *
 * @module meters/meter-id
 */

import type { Tags } from '../types/common.js';
import type { MeterId } from '../types/meter.js';

/**
 * Options shared by every meter
 */
export interface MeterOptions {
  tags?: Tags;
  description?: string;
  baseUnit?: string;
}

export function createMeterId(name: string, options: MeterOptions = {}): MeterId {
  const id: { name: string; tags: Tags; description?: string; baseUnit?: string } = {
    name,
    tags: Object.freeze({ ...options.tags }),
  };
  if (options.description !== undefined) {
    id.description = options.description;
  }
  if (options.baseUnit !== undefined) {
    id.baseUnit = options.baseUnit;
  }
  return Object.freeze(id);
}

/**
 * Registry key: name plus tags sorted by key
 */
export function meterKey(id: MeterId): string {
  const sorted = Object.keys(id.tags)
    .sort()
    .map((key) => `${key}="${id.tags[key] ?? ''}"`)
    .join(',');
  return sorted ? `${id.name}{${sorted}}` : id.name;
}
