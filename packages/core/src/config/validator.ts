import { PERSISTENCE_FORMATS, isPersistenceFormat } from '../engine.js';
import { ConfigurationError } from '../errors.js';
import type { NormalizedConfig } from './normalizer.js';
import type { LingoConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const SHELL_META_PATTERN = /[;"'`|&<>$]/;
const LANGUAGE_FOLDER_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const TYPE_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const MAX_PATH_LIKE_LENGTH = 320;

function hasUnsafeConfigValue(value: string): boolean {
  return containsControlCharacters(value) || SHELL_META_PATTERN.test(value);
}

/** Language folder names double as path segments. */
export function isSafeLanguageFolder(value: string): boolean {
  return LANGUAGE_FOLDER_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (hasUnsafeConfigValue(value)) {
    issues.push({ field, message: 'contains control characters or shell metacharacters' });
  }
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeLanguageFolder(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

function validateNameList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    if (!TYPE_NAME_PATTERN.test(entry)) {
      issues.push({ field: `${field}[${index}]`, message: 'must be a plain identifier' });
    }
  });
}

export function validateConfig(config: NormalizedConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePathLike('rootPath', config.rootPath, issues);
  validateLanguage('language', config.language, issues);
  if (!isPersistenceFormat(config.format)) {
    issues.push({ field: 'format', message: `must be one of ${PERSISTENCE_FORMATS.join(', ')}` });
  }
  validateNameList('excludeTypes', config.excludeTypes, issues);
  validateNameList('excludeAttributes', config.excludeAttributes, issues);

  return issues;
}

export function assertConfigValid(config: NormalizedConfig): asserts config is LingoConfig {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new ConfigurationError('invalid-config', `Invalid lingolayer configuration:\n${details}`);
}
