export { ConfigManager, expandHome } from './config/config-manager.js';
export { ConfigError, configFileSchema } from './config/schemas.js';
export type { AdapterConfig, AgentSyncConfig } from './config/schemas.js';
export { MirrorAdapter, MirrorIntegrationManager } from './integrations/mirror-manager.js';
export type * from './integrations/types.js';
export * from './sync/index.js';
export { WATCH_TARGETS, WatchEventType, WatchTarget } from './types/watch.js';
export type { RawFileEvent, WatchCallback, WatchEvent, WatchPatterns } from './types/watch.js';
export * from './utils/errors.js';
export { logger, LogLevel } from './utils/logger.js';
export { classifyPath, DEFAULT_WATCH_PATTERNS } from './watch/classifier.js';
export { discoverWatchPaths } from './watch/default-paths.js';
export { createWatchEvent, FileWatcher, formatWatchEvent } from './watch/file-watcher.js';
