import { hashKey } from './key-encoder.js';

export type TranslationLookup = { found: true; value: string } | { found: false };

/**
 * In-memory table of runtime translations.
 *
 * Keys are always derived from the original (untranslated) string through
 * {@link hashKey}; callers pass the original text, never the hash, except
 * through {@link TranslationStore.setRaw} when a file already holds hashed keys.
 */
export class TranslationStore {
  private items = new Map<string, string>();

  public clear(): void {
    this.items.clear();
  }

  public set(originalKey: string, value: string): void {
    this.items.set(hashKey(originalKey), value);
  }

  public setRaw(hashedKey: string, value: string): void {
    this.items.set(hashedKey, value);
  }

  public tryGet(originalKey: string): TranslationLookup {
    const value = this.items.get(hashKey(originalKey));
    return value === undefined ? { found: false } : { found: true, value };
  }

  public get(originalKey: string): string | undefined {
    return this.items.get(hashKey(originalKey));
  }

  public isEmpty(): boolean {
    return this.items.size === 0;
  }

  public get size(): number {
    return this.items.size;
  }

  /** Hashed keys and their values, in insertion order. */
  public entries(): IterableIterator<[string, string]> {
    return this.items.entries();
  }

  /**
   * Replaces the whole table with the contents of `source` in one step.
   */
  public assign(source: TranslationStore): void {
    this.items = new Map(source.items);
  }
}
