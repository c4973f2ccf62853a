import fs from 'fs';
import path from 'path';
import {
  AttributeDescriptor,
  AttributeRegistry,
  Container,
  ObjectAttribute,
  StringAttribute,
  StringListAttribute,
  defaultAttributeRegistry,
} from './container.js';
import { DomainError, ERROR_MESSAGES, EngineOutcome, OK, failed } from './errors.js';
import { hashKey, isHashKey } from './key-encoder.js';
import type { LanguageInfo, LanguageInfoLoader } from './language-info.js';
import { Logger, defaultLogger } from './logger.js';
import type { TranslationStore } from './translation-store.js';

export type PersistenceFormat = 'json' | 'ini' | 'ini-flat';

export const PERSISTENCE_FORMATS: readonly PersistenceFormat[] = ['json', 'ini', 'ini-flat'];

export function isPersistenceFormat(value: unknown): value is PersistenceFormat {
  return typeof value === 'string' && (PERSISTENCE_FORMATS as readonly string[]).includes(value);
}

/** Attribute that identifies a container and is never translated. */
export const IDENTITY_ATTRIBUTE = 'Name';

/** Attributes an action delegate owns when one is bound to the container. */
export const DEFAULT_ACTION_ATTRIBUTES = ['Caption', 'Hint', 'Text'];

/**
 * Format-specific half of an engine. Implementations only move values
 * between a file and the tree; every eligibility decision goes through the
 * {@link EngineContext} they receive.
 */
export interface EngineStrategy {
  readonly format: PersistenceFormat;
  /** File extension including the leading dot. */
  readonly extension: string;
  /**
   * Parses `filePath`, applies attribute values onto `container` (when given)
   * and hands every runtime string to the context.
   */
  deserialize(context: EngineContext, container: Container | undefined, filePath: string): void;
  /** Writes the persistable attributes of `container` and its descendants. */
  serialize(context: EngineContext, container: Container, filePath: string): void;
  /** Merges hashed runtime strings into `filePath`, keeping everything else. */
  writeRuntimeStrings(filePath: string, entries: Iterable<[string, string]>): void;
  createInfoLoader(): LanguageInfoLoader;
}

export type EngineStrategyClass = new () => EngineStrategy;

/**
 * Shared rules and sinks offered to strategies while they run.
 */
export interface EngineContext {
  readonly attributes: AttributeRegistry;
  readonly logger: Logger;
  isEligibleType(typeName: string): boolean;
  isTranslatable(descriptor: AttributeDescriptor): descriptor is StringAttribute;
  shouldPersist(descriptor: AttributeDescriptor): boolean;
  shouldTranslate(descriptor: AttributeDescriptor, owner: Container | undefined): boolean;
  persistedStrings(target: object, typeName: string): Array<[string, string]>;
  persistedLists(target: object, typeName: string): Array<[string, readonly string[]]>;
  persistedObjects(target: object, typeName: string): Array<[ObjectAttribute, object]>;
  applyString(target: object, typeName: string, attributeName: string, value: string, owner?: Container): boolean;
  applyList(target: object, typeName: string, attributeName: string, value: string[]): boolean;
  addRuntimeString(key: string, value: string): void;
}

export interface EngineOptions {
  createIfMissing?: boolean;
  excludeOnAction?: boolean;
  excludeTypes?: Iterable<string>;
  excludeAttributes?: Iterable<string>;
  actionAttributes?: Iterable<string>;
  attributes?: AttributeRegistry;
  logger?: Logger;
}

function toNameSet(values: Iterable<string> | undefined): Set<string> {
  const result = new Set<string>();
  for (const value of values ?? []) {
    const trimmed = value.trim();
    if (trimmed) {
      result.add(trimmed.toLowerCase());
    }
  }
  return result;
}

function hasAction(container: Container | undefined): boolean {
  return container?.action !== undefined && container.action !== null;
}

/**
 * Orchestrates one {@link EngineStrategy}: existence and auto-create policy,
 * the two-level eligibility rules and the runtime string dictionary.
 *
 * Structural eligibility is a static property of a descriptor. Contextual
 * eligibility also looks at the owning container. Save writes everything
 * structurally eligible that is not excluded by name, load only applies what
 * is contextually eligible, so values owned by an action delegate are kept
 * in the file without overriding the delegate.
 */
export class LanguageEngine implements EngineContext {
  public readonly attributes: AttributeRegistry;
  public readonly logger: Logger;

  private createIfMissingFlag: boolean;
  private excludeOnActionFlag: boolean;
  private excludedTypes: Set<string>;
  private excludedAttributes: Set<string>;
  private readonly actionAttributes: Set<string>;
  private readonly runtimeStrings = new Map<string, string>();
  private activeStore: TranslationStore | undefined;

  constructor(private readonly strategy: EngineStrategy, options: EngineOptions = {}) {
    this.attributes = options.attributes ?? defaultAttributeRegistry;
    this.logger = options.logger ?? defaultLogger;
    this.createIfMissingFlag = options.createIfMissing ?? false;
    this.excludeOnActionFlag = options.excludeOnAction ?? false;
    this.excludedTypes = toNameSet(options.excludeTypes);
    this.excludedAttributes = toNameSet(options.excludeAttributes);
    this.actionAttributes = toNameSet(options.actionAttributes ?? DEFAULT_ACTION_ATTRIBUTES);
  }

  public get format(): PersistenceFormat {
    return this.strategy.format;
  }

  public get extension(): string {
    return this.strategy.extension;
  }

  public get createIfMissing(): boolean {
    return this.createIfMissingFlag;
  }

  public set createIfMissing(value: boolean) {
    this.createIfMissingFlag = value;
  }

  public get excludeOnAction(): boolean {
    return this.excludeOnActionFlag;
  }

  public set excludeOnAction(value: boolean) {
    this.excludeOnActionFlag = value;
  }

  public get excludeTypes(): string[] {
    return Array.from(this.excludedTypes);
  }

  public set excludeTypes(values: Iterable<string>) {
    this.excludedTypes = toNameSet(values);
  }

  public get excludeAttributes(): string[] {
    return Array.from(this.excludedAttributes);
  }

  public set excludeAttributes(values: Iterable<string>) {
    this.excludedAttributes = toNameSet(values);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Applies `filePath` onto `container` and collects its runtime strings into
   * the engine dictionary and `store`. Pass no container to read runtime
   * strings only.
   */
  public load(container: Container | undefined, filePath: string, store?: TranslationStore): EngineOutcome {
    if (!this.ensureLanguageFile(container, filePath)) {
      return failed(new DomainError('missing-file', ERROR_MESSAGES.missingFile(filePath)));
    }

    this.runtimeStrings.clear();
    this.activeStore = store;
    try {
      this.strategy.deserialize(this, container, filePath);
    } finally {
      this.activeStore = undefined;
    }
    this.logger.debug(`Loaded ${this.format} language file ${filePath} (${this.runtimeStrings.size} runtime strings)`);
    return OK;
  }

  public save(container: Container, filePath: string): EngineOutcome {
    this.ensureDirectory(filePath);
    this.strategy.serialize(this, container, filePath);
    this.logger.debug(`Saved ${this.format} language file ${filePath}`);
    return OK;
  }

  public saveRuntimeStrings(filePath: string, entries: Iterable<[string, string]>): EngineOutcome {
    this.ensureDirectory(filePath);
    this.strategy.writeRuntimeStrings(filePath, entries);
    return OK;
  }

  public readLanguageInfo(filePath: string): LanguageInfo {
    return this.strategy.createInfoLoader().loadFromFile(filePath);
  }

  /**
   * Looks `text` up in the runtime strings of the last load. Never throws.
   */
  public translate(text: string): string {
    return this.runtimeStrings.get(hashKey(text)) ?? text;
  }

  private ensureDirectory(filePath: string): void {
    const directory = path.dirname(filePath);
    if (this.createIfMissingFlag && !fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
  }

  private ensureLanguageFile(container: Container | undefined, filePath: string): boolean {
    this.ensureDirectory(filePath);
    if (fs.existsSync(filePath)) {
      return true;
    }
    if (!this.createIfMissingFlag) {
      return false;
    }

    if (container) {
      this.save(container, filePath);
    } else {
      this.saveRuntimeStrings(filePath, []);
    }
    return true;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // EngineContext
  // ───────────────────────────────────────────────────────────────────────────

  public isEligibleType(typeName: string): boolean {
    return !this.excludedTypes.has(typeName.toLowerCase());
  }

  public isTranslatable(descriptor: AttributeDescriptor): descriptor is StringAttribute {
    return (
      descriptor.kind === 'string' &&
      typeof descriptor.get === 'function' &&
      typeof descriptor.set === 'function' &&
      descriptor.published !== false &&
      descriptor.name !== IDENTITY_ATTRIBUTE
    );
  }

  public shouldPersist(descriptor: AttributeDescriptor): boolean {
    return this.isTranslatable(descriptor) && !this.isExcludedName(descriptor.name);
  }

  public shouldTranslate(descriptor: AttributeDescriptor, owner: Container | undefined): boolean {
    if (!this.shouldPersist(descriptor)) {
      return false;
    }
    return !(
      this.excludeOnActionFlag &&
      hasAction(owner) &&
      this.actionAttributes.has(descriptor.name.toLowerCase())
    );
  }

  public persistedStrings(target: object, typeName: string): Array<[string, string]> {
    const values: Array<[string, string]> = [];
    for (const descriptor of this.attributes.describe(typeName)) {
      if (this.isTranslatable(descriptor) && this.shouldPersist(descriptor) && descriptor.get) {
        values.push([descriptor.name, descriptor.get(target)]);
      }
    }
    return values;
  }

  public persistedLists(target: object, typeName: string): Array<[string, readonly string[]]> {
    const values: Array<[string, readonly string[]]> = [];
    for (const descriptor of this.attributes.describe(typeName)) {
      if (this.isPersistableList(descriptor) && descriptor.get) {
        values.push([descriptor.name, descriptor.get(target)]);
      }
    }
    return values;
  }

  public persistedObjects(target: object, typeName: string): Array<[ObjectAttribute, object]> {
    const values: Array<[ObjectAttribute, object]> = [];
    for (const descriptor of this.attributes.describe(typeName)) {
      if (
        descriptor.kind !== 'object' ||
        descriptor.published === false ||
        !descriptor.get ||
        this.isExcludedName(descriptor.name) ||
        !this.isEligibleType(descriptor.typeName)
      ) {
        continue;
      }
      const value = descriptor.get(target);
      if (value) {
        values.push([descriptor, value]);
      }
    }
    return values;
  }

  public applyString(
    target: object,
    typeName: string,
    attributeName: string,
    value: string,
    owner?: Container
  ): boolean {
    const descriptor = this.attributes.find(typeName, attributeName);
    if (!descriptor || !this.isTranslatable(descriptor) || !this.shouldTranslate(descriptor, owner)) {
      return false;
    }
    descriptor.set?.(target, value);
    return true;
  }

  public applyList(target: object, typeName: string, attributeName: string, value: string[]): boolean {
    const descriptor = this.attributes.find(typeName, attributeName);
    if (!descriptor || !this.isPersistableList(descriptor)) {
      return false;
    }
    descriptor.set?.(target, value);
    return true;
  }

  /**
   * Records a runtime string read from a file. Keys that are not already
   * hashes are treated as original text and hashed.
   */
  public addRuntimeString(key: string, value: string): void {
    const trimmed = key.trim();
    const hashed = isHashKey(trimmed.toUpperCase()) ? trimmed.toUpperCase() : hashKey(trimmed);
    this.runtimeStrings.set(hashed, value);
    this.activeStore?.setRaw(hashed, value);
  }

  private isPersistableList(descriptor: AttributeDescriptor): descriptor is StringListAttribute {
    return (
      descriptor.kind === 'string-list' &&
      typeof descriptor.get === 'function' &&
      typeof descriptor.set === 'function' &&
      descriptor.published !== false &&
      !this.isExcludedName(descriptor.name)
    );
  }

  private isExcludedName(name: string): boolean {
    return this.excludedAttributes.has(name.toLowerCase());
  }
}
