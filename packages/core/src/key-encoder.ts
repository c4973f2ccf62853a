/**
 * Deterministic key hashing and the reversible escapes used to keep
 * translated text on a single line in language files.
 */

const CRC32_POLYNOMIAL = 0xedb88320;

const CRC32_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let index = 0; index < 256; index += 1) {
    let value = index;
    for (let bit = 0; bit < 8; bit += 1) {
      value = value & 1 ? (value >>> 1) ^ CRC32_POLYNOMIAL : value >>> 1;
    }
    table[index] = value >>> 0;
  }
  return table;
})();

function updateCrc(crc: number, byte: number): number {
  return (crc >>> 8) ^ CRC32_TABLE[(crc ^ byte) & 0xff];
}

/**
 * CRC-32 of a string, feeding the low byte and then the high byte of every
 * UTF-16 code unit.
 */
export function crc32OfString(input: string): number {
  let crc = 0xffffffff;
  for (let index = 0; index < input.length; index += 1) {
    const unit = input.charCodeAt(index);
    crc = updateCrc(crc, unit & 0xff);
    crc = updateCrc(crc, (unit >>> 8) & 0xff);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Eight upper-case hex digits identifying `input` in a translation table.
 */
export function hashKey(input: string): string {
  return crc32OfString(input).toString(16).toUpperCase().padStart(8, '0');
}

export const HASH_KEY_PATTERN = /^[0-9A-F]{8}$/;

export function isHashKey(value: string): boolean {
  return HASH_KEY_PATTERN.test(value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Value escaping
// ─────────────────────────────────────────────────────────────────────────────

/** Separator used when list values are stored as one string. */
export const LIST_SEPARATOR = '§';

const ESCAPE_TOKENS: Record<string, string> = {
  '[': '[[]',
  [LIST_SEPARATOR]: `[${LIST_SEPARATOR}]`,
  '\r\n': '[CRLF]',
  '\n': '[LF]',
  '\r': '[CR]',
};

const UNESCAPE_TOKENS: Record<string, string> = Object.fromEntries(
  Object.entries(ESCAPE_TOKENS).map(([raw, token]) => [token, raw])
);

const ESCAPE_PATTERN = new RegExp(`\\[|${LIST_SEPARATOR}|\\r\\n|\\n|\\r`, 'g');
const UNESCAPE_PATTERN = new RegExp(`\\[\\[\\]|\\[${LIST_SEPARATOR}\\]|\\[CRLF\\]|\\[LF\\]|\\[CR\\]`, 'g');

/**
 * Replaces line breaks and the list separator with bracket tokens.
 * Every `[` in the output starts a token, which keeps the mapping reversible.
 */
export function escapeValue(input: string): string {
  return input.replace(ESCAPE_PATTERN, (match) => ESCAPE_TOKENS[match] ?? match);
}

export function unescapeValue(input: string): string {
  return input.replace(UNESCAPE_PATTERN, (match) => UNESCAPE_TOKENS[match] ?? match);
}

/**
 * Stores a list as one string: items are escaped, then joined with `§`.
 */
export function joinList(items: readonly string[]): string {
  return items.map(escapeValue).join(LIST_SEPARATOR);
}

/**
 * Splits a value written by {@link joinList}. Separators inside bracket
 * tokens do not split. An empty string is an empty list.
 */
export function splitList(text: string): string[] {
  if (text === '') {
    return [];
  }

  const items: string[] = [];
  let current = '';
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '[') {
      const close = text.indexOf(']', index + 1);
      const end = close === -1 ? text.length - 1 : close;
      current += text.slice(index, end + 1);
      index = end;
      continue;
    }
    if (char === LIST_SEPARATOR) {
      items.push(unescapeValue(current));
      current = '';
      continue;
    }
    current += char;
  }
  items.push(unescapeValue(current));
  return items;
}

// ─────────────────────────────────────────────────────────────────────────────
// Multiline values
// ─────────────────────────────────────────────────────────────────────────────

export const MULTILINE_PLACEHOLDER = '~~';

const JOIN_TOKENS: Record<string, string> = {
  '~': '~.',
  '\n': MULTILINE_PLACEHOLDER,
  '\r': '~r',
};

const RESTORE_TOKENS: Record<string, string> = {
  '~.': '~',
  [MULTILINE_PLACEHOLDER]: '\n',
  '~r': '\r',
};

/**
 * Folds a multiline value onto one line: LF becomes `~~`.
 * Literal tildes and carriage returns get their own two-character tokens.
 */
export function joinMultiline(input: string): string {
  return input.replace(/[~\n\r]/g, (match) => JOIN_TOKENS[match] ?? match);
}

export function restoreMultiline(input: string): string {
  return input.replace(/~[~.r]/g, (match) => RESTORE_TOKENS[match] ?? match);
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage keys
// ─────────────────────────────────────────────────────────────────────────────

const KEY_ESCAPES: Record<string, string> = {
  '[': '[[]',
  "'": "''",
  ';': '[SEMICOLON]',
  '=': '[EQUAL]',
};

const KEY_UNESCAPES: Record<string, string> = Object.fromEntries(
  Object.entries(KEY_ESCAPES).map(([raw, token]) => [token, raw])
);

/**
 * Escapes the characters an INI reader treats specially inside a key.
 * A literal `[` becomes `[[]` so that token text in a key survives the round trip.
 */
export function normalizeKey(input: string): string {
  return input.replace(/[[';=]/g, (match) => KEY_ESCAPES[match] ?? match);
}

export function denormalizeKey(input: string): string {
  return input.replace(/\[\[\]|''|\[SEMICOLON\]|\[EQUAL\]/g, (match) => KEY_UNESCAPES[match] ?? match);
}

export function normalizePath(input: string): string {
  return input.replace(/\\/g, '\\\\');
}
