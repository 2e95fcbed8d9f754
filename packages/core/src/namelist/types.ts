/**
 * Namelist value types
 *
 * A namelist is a two-level mapping: group (section) name -> parameter name -> value.
 * Names are case-insensitive in the executable's format and are stored lower-cased.
 */

export type NamelistScalar = string | number | boolean;

export type NamelistValue = NamelistScalar | NamelistScalar[];

export type NamelistSectionData = Record<string, NamelistValue>;

export type NamelistData = Record<string, NamelistSectionData>;

/**
 * Partial namelist applied by bulk update: section -> key -> value
 */
export type NamelistPatch = Record<string, Record<string, NamelistValue>>;
