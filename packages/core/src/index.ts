export * from './config/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './key-encoder.js';
export * from './translation-store.js';
export * from './language-info.js';
export * from './container.js';
export * from './engine.js';
export * from './engines/json-engine.js';
export * from './engines/ini-engine.js';
export * from './engine-registry.js';
export * from './language-server.js';
export * from './language-coordinator.js';
export * from './language-catalog.js';
export { IniDocument } from './utils/ini-document.js';
