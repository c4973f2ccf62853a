import path from 'path';
import type { AttributeRegistry, Container } from './container.js';
import type { EngineOptions, LanguageEngine, PersistenceFormat } from './engine.js';
import { EngineRegistry, defaultEngineRegistry } from './engine-registry.js';
import { ConfigurationError, DomainError, ERROR_MESSAGES, type EngineOutcome } from './errors.js';
import { EMPTY_LANGUAGE_INFO, LanguageInfo } from './language-info.js';
import type { LanguageClient, LanguageServer, LanguageSettings } from './language-server.js';
import { Logger, defaultLogger } from './logger.js';
import { TranslationStore } from './translation-store.js';

/**
 * Load and save hooks receive the container and file actually processed,
 * which differ from the coordinator's own when `load`/`save` get arguments.
 */
export interface LanguageCoordinatorHooks {
  /** Return `false` to cancel the load. */
  beforeLoad?(coordinator: LanguageCoordinator, container: Container, filePath: string): boolean | void;
  afterLoad?(coordinator: LanguageCoordinator, container: Container, filePath: string): void;
  /** Return `false` to cancel the save. */
  beforeSave?(coordinator: LanguageCoordinator, container: Container, filePath: string): boolean | void;
  afterSave?(coordinator: LanguageCoordinator, container: Container, filePath: string): void;
  /** Receives non-fatal failures such as a missing language file. */
  onError?(message: string, error: DomainError): void;
}

export interface LanguageCoordinatorOptions {
  container?: Container;
  server?: LanguageServer;
  registry?: EngineRegistry;
  /** Register with `server` while constructing. Defaults to true. */
  registerOnStart?: boolean;
  format?: PersistenceFormat;
  rootPath?: string;
  language?: string;
  /** Explicit language file; its folder names the language and its parent the root. */
  filePath?: string;
  createIfMissing?: boolean;
  /** Defaults to true. */
  excludeOnAction?: boolean;
  excludeTypes?: Iterable<string>;
  excludeAttributes?: Iterable<string>;
  actionAttributes?: Iterable<string>;
  attributes?: AttributeRegistry;
  hooks?: LanguageCoordinatorHooks;
  logger?: Logger;
}

/**
 * Binds one container to its language file.
 *
 * The file lives at `<rootPath>/<language>/<container name><extension>`.
 * An explicitly assigned `filePath` wins over that rule until the language
 * or the root changes. Changing the language, the root or the format after
 * construction reloads the container. Runtime strings are looked up in the coordinator's own
 * store first and then in the server's shared store.
 */
export class LanguageCoordinator implements LanguageClient {
  private readonly registry: EngineRegistry;
  private readonly hooks: LanguageCoordinatorHooks;
  private readonly logger: Logger;
  private readonly store = new TranslationStore();
  private readonly engineOptions: EngineOptions;
  private server: LanguageServer | undefined;
  private engine: LanguageEngine | undefined;
  private currentContainer: Container | undefined;
  private currentFormat: PersistenceFormat;
  private currentLanguage = '';
  private currentRootPath = '';
  private currentFilePath = '';
  private explicitFilePath = false;
  private info: LanguageInfo = EMPTY_LANGUAGE_INFO;
  private batching = false;
  private reloadPending = false;

  constructor(options: LanguageCoordinatorOptions = {}) {
    this.registry = options.registry ?? defaultEngineRegistry;
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? defaultLogger;
    this.server = options.server;
    this.currentContainer = options.container;
    this.currentFormat = options.format ?? 'ini';
    this.engineOptions = {
      createIfMissing: options.createIfMissing ?? false,
      excludeOnAction: options.excludeOnAction ?? true,
      excludeTypes: Array.from(options.excludeTypes ?? []),
      excludeAttributes: Array.from(options.excludeAttributes ?? []),
      actionAttributes: options.actionAttributes,
      attributes: options.attributes,
      logger: this.logger,
    };

    this.assertRegistered(this.currentFormat);
    if (options.filePath) {
      this.adoptFilePath(options.filePath);
    } else {
      this.currentRootPath = options.rootPath ?? '';
      this.currentLanguage = options.language ?? '';
      this.recomputeFilePath();
    }

    if (options.registerOnStart ?? true) {
      this.register();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Settings
  // ───────────────────────────────────────────────────────────────────────────

  get container(): Container | undefined {
    return this.currentContainer;
  }

  set container(value: Container | undefined) {
    this.currentContainer = value;
    if (!this.explicitFilePath) {
      this.recomputeFilePath();
    }
  }

  get language(): string {
    return this.currentLanguage;
  }

  set language(value: string) {
    if (!value) {
      throw new ConfigurationError('empty-language', ERROR_MESSAGES.emptyLanguage);
    }
    if (value === this.currentLanguage) {
      return;
    }
    this.currentLanguage = value;
    this.explicitFilePath = false;
    if (this.recomputeFilePath()) {
      this.reload();
    }
  }

  get rootPath(): string {
    return this.currentRootPath;
  }

  set rootPath(value: string) {
    if (value === this.currentRootPath) {
      return;
    }
    this.currentRootPath = value;
    this.explicitFilePath = false;
    if (this.recomputeFilePath()) {
      this.reload();
    }
  }

  get filePath(): string {
    return this.currentFilePath;
  }

  /** Setting a file path also derives the language and root from it. */
  set filePath(value: string) {
    if (value === this.currentFilePath) {
      return;
    }
    if (value) {
      this.adoptFilePath(value);
    } else {
      this.currentFilePath = '';
      this.explicitFilePath = false;
    }
    this.reload();
  }

  get format(): PersistenceFormat {
    return this.currentFormat;
  }

  set format(value: PersistenceFormat) {
    if (value === this.currentFormat) {
      return;
    }
    this.assertRegistered(value);
    this.currentFormat = value;
    this.engine = undefined;
    if (!this.explicitFilePath) {
      this.recomputeFilePath();
    }
    this.reload();
  }

  get createIfMissing(): boolean {
    return this.engineOptions.createIfMissing ?? false;
  }

  set createIfMissing(value: boolean) {
    this.engineOptions.createIfMissing = value;
    if (this.engine) {
      this.engine.createIfMissing = value;
    }
  }

  get excludeOnAction(): boolean {
    return this.engineOptions.excludeOnAction ?? true;
  }

  set excludeOnAction(value: boolean) {
    this.engineOptions.excludeOnAction = value;
    if (this.engine) {
      this.engine.excludeOnAction = value;
    }
  }

  get excludeTypes(): string[] {
    return Array.from(this.engineOptions.excludeTypes ?? []);
  }

  set excludeTypes(values: Iterable<string>) {
    const names = Array.from(values);
    this.engineOptions.excludeTypes = names;
    if (this.engine) {
      this.engine.excludeTypes = names;
    }
  }

  get excludeAttributes(): string[] {
    return Array.from(this.engineOptions.excludeAttributes ?? []);
  }

  set excludeAttributes(values: Iterable<string>) {
    const names = Array.from(values);
    this.engineOptions.excludeAttributes = names;
    if (this.engine) {
      this.engine.excludeAttributes = names;
    }
  }

  get languageInfo(): LanguageInfo {
    return this.info;
  }

  get translations(): TranslationStore {
    return this.store;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Server link
  // ───────────────────────────────────────────────────────────────────────────

  /** Registers with the server given at construction, if any. */
  register(): void {
    this.server?.registerClient(this);
  }

  /**
   * Applies settings pushed by the server, reloading at most once.
   * A format this coordinator cannot build an engine for is reported through
   * `onError` and the other settings are still applied.
   */
  synchronize(settings: LanguageSettings): void {
    this.batching = true;
    try {
      if (settings.format !== this.currentFormat) {
        if (this.registry.has(settings.format)) {
          this.format = settings.format;
        } else {
          this.report(
            new DomainError('engine-unavailable', ERROR_MESSAGES.engineUnavailable(settings.format))
          );
        }
      }
      this.rootPath = settings.rootPath;
      if (settings.language) {
        this.language = settings.language;
      }
    } finally {
      this.batching = false;
    }

    if (this.reloadPending) {
      this.reloadPending = false;
      this.load();
    }
  }

  setLanguageInfo(info: LanguageInfo): void {
    this.info = info;
  }

  detach(): void {
    this.server = undefined;
  }

  dispose(): void {
    this.server?.unregisterClient(this);
    this.server = undefined;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Load / save
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Applies the language file onto the container. Does nothing until both a
   * container and a file path are known.
   */
  load(container?: Container, filePath?: string): void {
    const target = container ?? this.currentContainer;
    const file = filePath ?? this.currentFilePath;
    if (!target || !file) {
      return;
    }
    if (this.hooks.beforeLoad?.(this, target, file) === false) {
      return;
    }

    this.store.clear();
    const outcome = this.withEngine((engine) => engine.load(target, file, this.store));
    if (!this.handleOutcome(outcome)) {
      return;
    }
    this.hooks.afterLoad?.(this, target, file);
  }

  /**
   * Writes the container's translatable attributes to the language file.
   * @throws ConfigurationError when no file path is known
   */
  save(container?: Container, filePath?: string): void {
    const file = filePath ?? this.currentFilePath;
    if (!file) {
      throw new ConfigurationError('no-file', ERROR_MESSAGES.noFileSelected);
    }
    const target = container ?? this.currentContainer;
    if (!target) {
      return;
    }
    if (this.hooks.beforeSave?.(this, target, file) === false) {
      return;
    }

    const outcome = this.withEngine((engine) => engine.save(target, file));
    if (!this.handleOutcome(outcome)) {
      return;
    }
    this.hooks.afterSave?.(this, target, file);
  }

  /**
   * Translation of a runtime string: own store first, then the server.
   * Returns `text` unchanged when neither knows it.
   */
  translate(text: string): string {
    const lookup = this.store.tryGet(text);
    if (lookup.found) {
      return lookup.value;
    }
    return this.server ? this.server.translate(text) : text;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private withEngine(run: (engine: LanguageEngine) => EngineOutcome): EngineOutcome {
    if (!this.engine) {
      try {
        this.engine = this.registry.create(this.currentFormat, this.engineOptions);
      } catch (error) {
        return {
          ok: false,
          error: new DomainError('engine-unavailable', ERROR_MESSAGES.engineUnavailable(this.currentFormat), error),
        };
      }
    }
    return run(this.engine);
  }

  private handleOutcome(outcome: EngineOutcome): boolean {
    if (outcome.ok) {
      return true;
    }
    if (outcome.error.kind === 'configuration') {
      throw outcome.error;
    }
    this.report(outcome.error);
    return false;
  }

  private report(error: DomainError): void {
    this.logger.debug(error.message);
    this.hooks.onError?.(error.message, error);
  }

  private reload(): void {
    if (this.batching) {
      this.reloadPending = true;
      return;
    }
    this.load();
  }

  private assertRegistered(format: PersistenceFormat): void {
    if (!this.registry.has(format)) {
      throw new ConfigurationError('engine-not-registered', ERROR_MESSAGES.engineNotRegistered(format));
    }
  }

  private adoptFilePath(filePath: string): void {
    const folder = path.dirname(filePath);
    this.currentFilePath = filePath;
    this.explicitFilePath = true;
    this.currentLanguage = path.basename(folder);
    this.currentRootPath = path.dirname(folder);
  }

  /** Returns false, keeping the current path, until every part is known. */
  private recomputeFilePath(): boolean {
    const extension = this.registry.extensionOf(this.currentFormat);
    if (!this.currentContainer || !this.currentRootPath || !this.currentLanguage || !extension) {
      return false;
    }
    this.currentFilePath = path.join(
      this.currentRootPath,
      this.currentLanguage,
      `${this.currentContainer.name}${extension}`
    );
    return true;
  }
}
