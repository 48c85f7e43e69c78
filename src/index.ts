/**
 * Public entry point.
 */

export { SceneManager } from './scene/SceneManager';
export type {
  CachedSceneInfo,
  SceneCacheInfo,
  SceneManagerDebugInfo,
  SceneManagerEvents,
  SceneManagerOptions,
  SceneObserver,
  SceneOperation,
  SwitchOptions,
} from './scene/SceneManager';
export { LoadChannel, LoadState } from './scene/LoadChannel';
export type { LoadOutcome, LoadPollResult } from './scene/LoadChannel';
export { NullPresentation, adaptPresentation } from './scene/Presentation';
export type { LoadingScreenLike } from './scene/Presentation';
export { NO_TRANSITION } from './scene/types';
export type {
  AsyncLoadPoll,
  Instantiator,
  LiveView,
  LoadMode,
  NoTransition,
  Presentation,
  ResourceResolver,
} from './scene/types';
export * from './config';
export * from './core/errors';
export { EventEmitter } from './utils/EventEmitter';
export type { EventMap } from './utils/EventEmitter';
export { Logger, LogLevel, parseLogLevel } from './utils/Logger';
export type { LogSink } from './utils/Logger';
export { LRUCache } from './utils/LRUCache';
export type { LRUCacheHooks } from './utils/LRUCache';
