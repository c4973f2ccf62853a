export type ConfigurationErrorCode =
  | 'empty-language'
  | 'no-file'
  | 'engine-not-registered'
  | 'engine-contract'
  | 'invalid-config';

export type DomainErrorCode = 'missing-file' | 'engine-unavailable';

/**
 * Base class for every error raised by the language engine.
 * `kind` lets callers switch on the variant instead of testing subclasses.
 */
export abstract class LanguageError extends Error {
  abstract readonly kind: 'configuration' | 'domain';
  abstract readonly code: ConfigurationErrorCode | DomainErrorCode;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
  }
}

/**
 * Fatal misconfiguration. Always reaches the caller.
 */
export class ConfigurationError extends LanguageError {
  readonly kind = 'configuration' as const;

  constructor(public readonly code: ConfigurationErrorCode, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-fatal failure. Coordinators report it through their error hook.
 */
export class DomainError extends LanguageError {
  readonly kind = 'domain' as const;

  constructor(public readonly code: DomainErrorCode, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DomainError';
  }
}

export function isLanguageError(error: unknown): error is LanguageError {
  return error instanceof LanguageError;
}

export type EngineOutcome =
  | { ok: true }
  | { ok: false; error: ConfigurationError | DomainError };

export const OK: EngineOutcome = Object.freeze({ ok: true });

export function failed(error: ConfigurationError | DomainError): EngineOutcome {
  return { ok: false, error };
}

export const ERROR_MESSAGES = {
  cantCreatePath: (target: string) => `Can't create ${target} path.`,
  engineNotRegistered: (format: string) => `No language engine registered for format "${format}".`,
  engineUnavailable: (format: string) => `The language engine for format "${format}" could not be created.`,
  engineContract: (className: string) => `The class ${className} does not implement the language engine contract.`,
  emptyLanguage: 'Language can not be empty.',
  noFileSelected: 'No language file selected.',
  missingFile: (filePath: string) => `Language file not found: ${filePath}`,
} as const;
