/**
 * Scene manager tunables and their defaults.
 *
 * Managers take `Partial<SceneManagerConfig>` and merge it over
 * `DEFAULT_SCENE_MANAGER_CONFIG`.
 */

import { InvalidConfigError } from '../core/errors';
import type { LoadMode } from '../scene/types';

export interface SceneManagerConfig {
  /** Max inactive scene instances kept alive. */
  instanceCacheSize: number;
  /** Max loaded-but-not-instantiated resources kept. */
  preloadCacheSize: number;
  loadMode: LoadMode;
  /** Ignore per-switch presentations and always use the default one. */
  alwaysUseDefaultPresentation: boolean;
  /** Delay between load-status polls (ms). */
  pollIntervalMs: number;
  /** Minimum gap between progress log lines while waiting on a load (ms). */
  progressLogIntervalMs: number;
}

export const DEFAULT_INSTANCE_CACHE_SIZE = 8;
export const DEFAULT_PRELOAD_CACHE_SIZE = 4;
/** Roughly one frame at 60 Hz */
export const DEFAULT_POLL_INTERVAL_MS = 16;
export const DEFAULT_PROGRESS_LOG_INTERVAL_MS = 500;

export const DEFAULT_SCENE_MANAGER_CONFIG: SceneManagerConfig = {
  instanceCacheSize: DEFAULT_INSTANCE_CACHE_SIZE,
  preloadCacheSize: DEFAULT_PRELOAD_CACHE_SIZE,
  loadMode: 'async',
  alwaysUseDefaultPresentation: false,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  progressLogIntervalMs: DEFAULT_PROGRESS_LOG_INTERVAL_MS,
};

/**
 * Merge overrides over the defaults and validate the result.
 * @throws InvalidConfigError
 */
export function resolveSceneManagerConfig(
  overrides: Partial<SceneManagerConfig> = {}
): SceneManagerConfig {
  const config = { ...DEFAULT_SCENE_MANAGER_CONFIG, ...overrides };

  for (const key of ['instanceCacheSize', 'preloadCacheSize'] as const) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidConfigError(`${key} must be an integer >= 1 (got ${value})`);
    }
  }
  for (const key of ['pollIntervalMs', 'progressLogIntervalMs'] as const) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidConfigError(`${key} must be a non-negative number (got ${value})`);
    }
  }
  if (config.loadMode !== 'sync' && config.loadMode !== 'async') {
    throw new InvalidConfigError(`loadMode must be 'sync' or 'async' (got ${String(config.loadMode)})`);
  }

  return config;
}
