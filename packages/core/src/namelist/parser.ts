/**
 * Namelist Parser
 * ===============
 * Reads the executable's namelist format:
 *
 *   &main_nml
 *       calendar = 'thirty_day'       ! comment
 *       current_date = 2000, 1, 1, 0, 0, 0
 *       do_seasonal = .false.
 *   /
 *
 * Supported: `&name ... /` and `&name ... &end` groups, comma or blank
 * separated lists, `n*value` repeats, quoted strings (doubled quote escapes),
 * logicals (.true./.false./T/F), integers and reals with `e` or `d` exponents.
 * Indexed (`x(2) = ...`), derived-type (`a%b = ...`) and complex values are
 * rejected. A group that appears twice is merged, later keys winning.
 */

import { NamelistParseError } from '@gcmrun/utils';
import { Namelist, normalizeName } from './namelist.js';
import type { NamelistScalar } from './types.js';

type Token =
  | { kind: 'group-start'; name: string; line: number }
  | { kind: 'group-end'; line: number }
  | { kind: 'equals'; line: number }
  | { kind: 'comma'; line: number }
  | { kind: 'string'; value: string; line: number }
  | { kind: 'word'; text: string; line: number };

const WORD_BREAK = new Set([',', '=', '/', '!', "'", '"']);
const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;
const INTEGER = /^[+-]?\d+$/;
const REAL = /^[+-]?(\d+\.?\d*|\.\d+)([eEdD][+-]?\d+)?$/;
const LOGICAL_TRUE = /^\.?t(rue)?\.?$/i;
const LOGICAL_FALSE = /^\.?f(alse)?\.?$/i;
const REPEAT = /^(\d+)\*(.*)$/;

function tokenize(text: string, source: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '\n') {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === '!') {
      while (i < text.length && text.charAt(i) !== '\n') i++;
    } else if (ch === '&' || ch === '$') {
      let j = i + 1;
      while (j < text.length && IDENTIFIER_CHAR.test(text.charAt(j))) j++;
      const name = text.slice(i + 1, j);
      if (name === '') {
        throw new NamelistParseError(`expected a group name after '${ch}'`, source, line);
      }
      tokens.push(
        name.toLowerCase() === 'end' ? { kind: 'group-end', line } : { kind: 'group-start', name, line }
      );
      i = j;
    } else if (ch === '/') {
      tokens.push({ kind: 'group-end', line });
      i++;
    } else if (ch === '=') {
      tokens.push({ kind: 'equals', line });
      i++;
    } else if (ch === ',') {
      tokens.push({ kind: 'comma', line });
      i++;
    } else if (ch === "'" || ch === '"') {
      const startLine = line;
      let value = '';
      let j = i + 1;
      for (;;) {
        if (j >= text.length) {
          throw new NamelistParseError('unterminated string', source, startLine);
        }
        const c = text.charAt(j);
        if (c === ch) {
          if (text.charAt(j + 1) === ch) {
            value += ch;
            j += 2;
            continue;
          }
          j++;
          break;
        }
        if (c === '\n') line++;
        value += c;
        j++;
      }
      tokens.push({ kind: 'string', value, line: startLine });
      i = j;
    } else {
      let j = i;
      while (j < text.length && !/\s/.test(text.charAt(j)) && !WORD_BREAK.has(text.charAt(j))) j++;
      tokens.push({ kind: 'word', text: text.slice(i, j), line });
      i = j;
    }
  }

  return tokens;
}

function parseKey(text: string, source: string, line: number): string {
  if (text.includes('(') || text.includes('%')) {
    throw new NamelistParseError(`indexed or derived-type name '${text}' is not supported`, source, line);
  }
  try {
    return normalizeName(text, 'key');
  } catch {
    throw new NamelistParseError(`invalid parameter name '${text}'`, source, line);
  }
}

function parseScalar(text: string, source: string, line: number): NamelistScalar {
  if (LOGICAL_TRUE.test(text)) return true;
  if (LOGICAL_FALSE.test(text)) return false;
  if (INTEGER.test(text)) return Number(text);
  if (REAL.test(text)) return Number(text.replace(/[dD]/, 'e'));
  if (text.includes('(') || text.includes(')')) {
    throw new NamelistParseError(`complex value '${text}' is not supported`, source, line);
  }
  return text;
}

/**
 * Parse namelist text; `source` names the origin in error messages
 */
export function parseNamelist(text: string, source: string = '<inline>'): Namelist {
  const tokens = tokenize(text, source);
  const namelist = new Namelist();

  let group: string | undefined;
  let groupLine = 0;
  let key: string | undefined;
  let keyLine = 0;
  let values: NamelistScalar[] = [];
  let pendingRepeat: number | undefined;

  const push = (value: NamelistScalar): void => {
    const count = pendingRepeat ?? 1;
    for (let n = 0; n < count; n++) values.push(value);
    pendingRepeat = undefined;
  };

  const flush = (): void => {
    if (group === undefined || key === undefined) return;
    if (pendingRepeat !== undefined) {
      throw new NamelistParseError(`repeat count without a value for '${key}'`, source, keyLine);
    }
    const [first, ...rest] = values;
    if (first === undefined) {
      throw new NamelistParseError(`missing value for '${key}'`, source, keyLine);
    }
    namelist.set(group, key, rest.length === 0 ? first : values);
    key = undefined;
    values = [];
  };

  for (let idx = 0; idx < tokens.length; idx++) {
    const token = tokens[idx];
    if (token === undefined) break;

    if (group === undefined) {
      // Text between groups is not part of any group
      if (token.kind === 'group-start') {
        try {
          group = normalizeName(token.name, 'section');
        } catch {
          throw new NamelistParseError(`invalid group name '${token.name}'`, source, token.line);
        }
        groupLine = token.line;
        namelist.update({ [group]: {} });
      }
      continue;
    }

    switch (token.kind) {
      case 'group-start':
        throw new NamelistParseError(
          `group '${group}' is not terminated before '&${token.name}'`,
          source,
          token.line
        );
      case 'group-end':
        flush();
        group = undefined;
        break;
      case 'equals':
        throw new NamelistParseError("unexpected '='", source, token.line);
      case 'comma':
        if (pendingRepeat !== undefined) {
          throw new NamelistParseError('repeat count without a value', source, token.line);
        }
        break;
      case 'string':
        if (key === undefined) {
          throw new NamelistParseError(`expected 'name = value', found '${token.value}'`, source, token.line);
        }
        push(token.value);
        break;
      case 'word': {
        if (tokens[idx + 1]?.kind === 'equals') {
          flush();
          key = parseKey(token.text, source, token.line);
          keyLine = token.line;
          idx++;
          break;
        }
        if (key === undefined) {
          throw new NamelistParseError(`expected 'name = value', found '${token.text}'`, source, token.line);
        }
        const repeat = REPEAT.exec(token.text);
        if (repeat) {
          const count = Number(repeat[1]);
          const rest = repeat[2] ?? '';
          if (count < 1) {
            throw new NamelistParseError(`invalid repeat count in '${token.text}'`, source, token.line);
          }
          pendingRepeat = count;
          if (rest !== '') push(parseScalar(rest, source, token.line));
          break;
        }
        push(parseScalar(token.text, source, token.line));
        break;
      }
    }
  }

  if (group !== undefined) {
    throw new NamelistParseError(`group '${group}' is not terminated`, source, groupLine);
  }

  return namelist;
}
