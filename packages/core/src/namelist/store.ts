/**
 * Namelist Store
 *
 * Builds the effective namelist from an ordered list of base sources and
 * writes it out for the executable.
 */

import { readFile, writeFile } from 'fs/promises';
import { NamelistParseError } from '@gcmrun/utils';
import { Namelist } from './namelist.js';
import { parseNamelist } from './parser.js';
import { serializeNamelist } from './serializer.js';

export async function readNamelistFile(path: string): Promise<Namelist> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NamelistParseError(`cannot read namelist source (${reason})`, path);
  }
  return parseNamelist(text, path);
}

/**
 * Read and merge sources in order. A later source overwrites colliding keys
 * and keeps the earlier sources' other keys in the same section. Every
 * source is parsed before anything is merged, so a bad source leaves no
 * partial result behind.
 */
export async function buildNamelist(sources: readonly string[]): Promise<Namelist> {
  const parsed: Namelist[] = [];
  for (const source of sources) {
    parsed.push(await readNamelistFile(source));
  }

  const namelist = new Namelist();
  for (const next of parsed) {
    namelist.merge(next);
  }
  return namelist;
}

export async function writeNamelistFile(namelist: Namelist, path: string): Promise<void> {
  await writeFile(path, serializeNamelist(namelist), 'utf8');
}
