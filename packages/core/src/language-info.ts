import fs from 'fs';
import { IniDocument } from './utils/ini-document.js';

/**
 * Describes one language: identifiers, display names, writing direction and
 * optional UI font hints.
 */
export interface LanguageInfo {
  /** BCP-47 identifier such as "it-IT" or "ar-SA". */
  readonly id: string;
  /** English name of the language. */
  readonly name: string;
  /** Name of the language as written by its speakers. */
  readonly nativeName: string;
  readonly isRightToLeft: boolean;
  /** Suggested UI font; empty when none is recommended. */
  readonly uiFont: string;
  /** Font to use when `uiFont` is unavailable. */
  readonly fallbackFont: string;
}

export const EMPTY_LANGUAGE_INFO: LanguageInfo = Object.freeze({
  id: '',
  name: '',
  nativeName: '',
  isRightToLeft: false,
  uiFont: '',
  fallbackFont: '',
});

export function createLanguageInfo(fields: Partial<LanguageInfo> = {}): LanguageInfo {
  return Object.freeze({ ...EMPTY_LANGUAGE_INFO, ...fields });
}

export interface LanguageInfoLoader {
  loadFromFile(filePath: string): LanguageInfo;
}

export const LANGUAGE_SECTION = 'Language';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

export class IniLanguageInfoLoader implements LanguageInfoLoader {
  public loadFromFile(filePath: string): LanguageInfo {
    const document = IniDocument.parse(fs.readFileSync(filePath, 'utf8'));
    const read = (key: string) => document.read(LANGUAGE_SECTION, key)?.trim() ?? '';

    return createLanguageInfo({
      id: read('Id'),
      name: read('Name'),
      nativeName: read('NativeName'),
      isRightToLeft: TRUE_VALUES.has(read('IsRightToLeft').toLowerCase()),
      uiFont: read('UIFont'),
      fallbackFont: read('FallbackFont'),
    });
  }
}

export const LANGUAGE_JSON_KEY = 'language';

export class JsonLanguageInfoLoader implements LanguageInfoLoader {
  public loadFromFile(filePath: string): LanguageInfo {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (!isPlainRecord(parsed) || !isPlainRecord(parsed[LANGUAGE_JSON_KEY])) {
      return EMPTY_LANGUAGE_INFO;
    }

    const language = parsed[LANGUAGE_JSON_KEY];
    const readString = (key: string) => {
      const value = language[key];
      return typeof value === 'string' ? value : '';
    };

    return createLanguageInfo({
      id: readString('id'),
      name: readString('name'),
      nativeName: readString('nativeName'),
      isRightToLeft: language.isRightToLeft === true,
      uiFont: readString('uiFont'),
      fallbackFont: readString('fallbackFont'),
    });
  }
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
