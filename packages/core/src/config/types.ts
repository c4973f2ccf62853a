/**
 * Configuration type definitions for lingolayer
 */

import type { PersistenceFormat } from '../engine.js';

export interface LingoConfig {
  /** Folder holding one sub-folder per language. Resolved against the config file's folder. */
  rootPath: string;
  /** Language folder loaded at start. */
  language: string;
  format: PersistenceFormat;
  /** Create missing language folders and files instead of reporting them. */
  createIfMissing: boolean;
  /** Leave action-owned attributes alone when loading. */
  excludeOnAction: boolean;
  /** Container and object types skipped together with their subtree. */
  excludeTypes: string[];
  /** Attribute names never persisted nor applied. */
  excludeAttributes: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Loader Result Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadConfigResult {
  config: LingoConfig;
  /** Undefined when defaults were used because no file was found. */
  configPath?: string;
  projectRoot: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Internal Types (for normalization)
// ─────────────────────────────────────────────────────────────────────────────

export type RawLingoConfig = { [K in keyof LingoConfig]?: unknown };
