/**
 * Common types shared by meters, records and batches.
 */

/**
 * Attribute value can be a string, number, or boolean
 */
export type AttributeValue = string | number | boolean;

/**
 * Attributes are key-value pairs attached to metric records and batches
 */
export type Attributes = Record<string, AttributeValue>;

/**
 * Tags identify a meter alongside its name; values are always strings
 */
export type Tags = Record<string, string>;
