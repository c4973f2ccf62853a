import { LanguageEngine, type EngineOptions, type EngineStrategy, type EngineStrategyClass, type PersistenceFormat } from './engine.js';
import { IniEngine, IniFlatEngine } from './engines/ini-engine.js';
import { JsonEngine } from './engines/json-engine.js';
import { ConfigurationError, ERROR_MESSAGES } from './errors.js';

interface RegisteredEngine {
  strategyClass: EngineStrategyClass;
  extension: string;
}

const CONTRACT_METHODS = ['deserialize', 'serialize', 'writeRuntimeStrings', 'createInfoLoader'] as const;

function satisfiesContract(candidate: EngineStrategy, format: PersistenceFormat): boolean {
  return (
    candidate.format === format &&
    typeof candidate.extension === 'string' &&
    CONTRACT_METHODS.every((method) => typeof candidate[method] === 'function')
  );
}

/**
 * Maps persistence formats to engine strategy classes. Every class is
 * checked on registration; the first valid class for a format wins.
 */
export class EngineRegistry {
  private readonly engines = new Map<PersistenceFormat, RegisteredEngine>();

  /**
   * Registers `strategyClass` for `format` after instantiating it once to
   * check that it implements the strategy contract for that format.
   */
  register(format: PersistenceFormat, strategyClass: EngineStrategyClass): void {
    let probe: EngineStrategy;
    try {
      probe = new strategyClass();
    } catch (error) {
      throw new ConfigurationError('engine-contract', ERROR_MESSAGES.engineContract(strategyClass.name), error);
    }
    if (!satisfiesContract(probe, format)) {
      throw new ConfigurationError('engine-contract', ERROR_MESSAGES.engineContract(strategyClass.name));
    }
    if (this.engines.has(format)) {
      return;
    }

    this.engines.set(format, { strategyClass, extension: probe.extension });
  }

  unregister(format: PersistenceFormat): void {
    this.engines.delete(format);
  }

  has(format: PersistenceFormat): boolean {
    return this.engines.has(format);
  }

  formats(): PersistenceFormat[] {
    return Array.from(this.engines.keys());
  }

  extensionOf(format: PersistenceFormat): string | undefined {
    return this.engines.get(format)?.extension;
  }

  /**
   * Builds a fresh engine for `format`.
   * @throws ConfigurationError when nothing is registered for the format
   */
  create(format: PersistenceFormat, options: EngineOptions = {}): LanguageEngine {
    const entry = this.engines.get(format);
    if (!entry) {
      throw new ConfigurationError('engine-not-registered', ERROR_MESSAGES.engineNotRegistered(format));
    }
    return new LanguageEngine(new entry.strategyClass(), options);
  }
}

export function createDefaultEngineRegistry(): EngineRegistry {
  const registry = new EngineRegistry();
  registry.register('ini', IniEngine);
  registry.register('ini-flat', IniFlatEngine);
  registry.register('json', JsonEngine);
  return registry;
}

/** Process-wide registry holding the built-in engines. */
export const defaultEngineRegistry = createDefaultEngineRegistry();
