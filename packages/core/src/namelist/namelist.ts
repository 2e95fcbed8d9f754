/**
 * Namelist
 * ========
 * Typed two-level parameter store with explicit merge and overwrite operations.
 *
 * - `set` overwrites one key, creating the section if absent
 * - `update` applies a partial namelist section-by-section, key-by-key
 * - `merge` folds another namelist in; colliding keys take the other's value
 *
 * Reads go through `get` (throws when the section or key is missing) or
 * `getOptional`; sections are never created implicitly by a read.
 */

import { NotFoundError, ValidationError } from '@gcmrun/utils';
import type {
  NamelistData,
  NamelistPatch,
  NamelistScalar,
  NamelistSectionData,
  NamelistValue,
} from './types.js';

const NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

export function normalizeName(name: string, kind: 'section' | 'key'): string {
  const normalized = name.trim().toLowerCase();
  if (!NAME_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid namelist ${kind} name '${name}'`, { [kind]: name });
  }
  return normalized;
}

function checkScalar(value: NamelistScalar, section: string, key: string): NamelistScalar {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new ValidationError(`Namelist value ${section}.${key} must be a finite number`, {
      section,
      key,
      value,
    });
  }
  return value;
}

function copyValue(value: NamelistValue, section: string, key: string): NamelistValue {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new ValidationError(`Namelist value ${section}.${key} must not be an empty list`, {
        section,
        key,
      });
    }
    return value.map((item) => checkScalar(item, section, key));
  }
  return checkScalar(value, section, key);
}

export class Namelist {
  private readonly sections = new Map<string, Map<string, NamelistValue>>();

  static fromObject(data: NamelistData): Namelist {
    return new Namelist().update(data);
  }

  set(section: string, key: string, value: NamelistValue): this {
    const sectionName = normalizeName(section, 'section');
    const keyName = normalizeName(key, 'key');
    const stored = copyValue(value, sectionName, keyName);

    let entries = this.sections.get(sectionName);
    if (!entries) {
      entries = new Map();
      this.sections.set(sectionName, entries);
    }
    entries.set(keyName, stored);
    return this;
  }

  get(section: string, key: string): NamelistValue {
    const value = this.getOptional(section, key);
    if (value === undefined) {
      const sectionName = normalizeName(section, 'section');
      if (!this.sections.has(sectionName)) {
        throw new NotFoundError('Namelist section', sectionName);
      }
      throw new NotFoundError('Namelist key', `${sectionName}.${normalizeName(key, 'key')}`);
    }
    return value;
  }

  getOptional(section: string, key: string): NamelistValue | undefined {
    const entries = this.sections.get(normalizeName(section, 'section'));
    const value = entries?.get(normalizeName(key, 'key'));
    if (value === undefined) return undefined;
    return Array.isArray(value) ? [...value] : value;
  }

  has(section: string, key: string): boolean {
    return this.getOptional(section, key) !== undefined;
  }

  hasSection(section: string): boolean {
    return this.sections.has(normalizeName(section, 'section'));
  }

  /**
   * Copy of one section's entries
   */
  section(section: string): NamelistSectionData {
    const sectionName = normalizeName(section, 'section');
    const entries = this.sections.get(sectionName);
    if (!entries) {
      throw new NotFoundError('Namelist section', sectionName);
    }
    const result: NamelistSectionData = {};
    for (const [key, value] of entries) {
      result[key] = Array.isArray(value) ? [...value] : value;
    }
    return result;
  }

  sectionNames(): string[] {
    return [...this.sections.keys()];
  }

  /**
   * Bulk update: creates missing sections, overwrites the given keys,
   * leaves every other key alone
   */
  update(patch: NamelistPatch): this {
    for (const [section, entries] of Object.entries(patch)) {
      const sectionName = normalizeName(section, 'section');
      if (!this.sections.has(sectionName)) {
        this.sections.set(sectionName, new Map());
      }
      for (const [key, value] of Object.entries(entries)) {
        this.set(sectionName, key, value);
      }
    }
    return this;
  }

  /**
   * Merge another namelist into this one; its keys win on collision
   */
  merge(other: Namelist): this {
    return this.update(other.toObject());
  }

  clone(): Namelist {
    return Namelist.fromObject(this.toObject());
  }

  toObject(): NamelistData {
    const result: NamelistData = {};
    for (const name of this.sections.keys()) {
      result[name] = this.section(name);
    }
    return result;
  }
}
