/**
 * Per-record attributes derived from a meter's id.
 *
 * @module transform/attributes
 */

import type { Attributes } from '../types/common.js';
import type { Meter } from '../types/meter.js';

/**
 * Attributes for every record of `meter`: `source.type`, then `description`
 * and `baseUnit` when present, then the meter's tags. `overrides` are
 * applied last.
 */
export function buildAttributes(meter: Meter, overrides?: Attributes): Readonly<Attributes> {
  const attributes: Attributes = { 'source.type': meter.kind };
  const { description, baseUnit, tags } = meter.id;

  if (description !== undefined) {
    attributes['description'] = description;
  }
  if (baseUnit !== undefined) {
    attributes['baseUnit'] = baseUnit;
  }
  Object.assign(attributes, tags, overrides);
  attributes['source.type'] = meter.kind;

  return Object.freeze(attributes);
}
