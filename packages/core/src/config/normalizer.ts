/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import { isPersistenceFormat, type PersistenceFormat } from '../engine.js';
import type { LingoConfig, RawLingoConfig } from './types.js';
import {
  DEFAULT_CREATE_IF_MISSING,
  DEFAULT_EXCLUDE_ON_ACTION,
  DEFAULT_FORMAT,
  DEFAULT_LANGUAGE,
  DEFAULT_ROOT_PATH,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureUniqueStrings(value: unknown): string[] {
  return Array.from(new Set(ensureStringArray(value)));
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length) {
      return trimmed;
    }
  }
  return fallback;
}

export function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return fallback;
}

/**
 * Unknown formats are kept as written so validation can report them.
 */
export function normalizeFormat(value: unknown): PersistenceFormat | string {
  if (typeof value !== 'string' || !value.trim()) {
    return DEFAULT_FORMAT;
  }
  const normalized = value.trim().toLowerCase();
  return isPersistenceFormat(normalized) ? normalized : value.trim();
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Config Normalizer
// ─────────────────────────────────────────────────────────────────────────────

export interface NormalizedConfig extends Omit<LingoConfig, 'format'> {
  format: PersistenceFormat | string;
}

export function normalizeConfig(raw: RawLingoConfig = {}): NormalizedConfig {
  return {
    rootPath: normalizeString(raw.rootPath, DEFAULT_ROOT_PATH),
    language: normalizeString(raw.language, DEFAULT_LANGUAGE),
    format: normalizeFormat(raw.format),
    createIfMissing: normalizeBoolean(raw.createIfMissing, DEFAULT_CREATE_IF_MISSING),
    excludeOnAction: normalizeBoolean(raw.excludeOnAction, DEFAULT_EXCLUDE_ON_ACTION),
    excludeTypes: ensureUniqueStrings(raw.excludeTypes),
    excludeAttributes: ensureUniqueStrings(raw.excludeAttributes),
  };
}
