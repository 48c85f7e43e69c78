/**
 * Base error class for all scene manager errors.
 * Provides an error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Thrown when a scene path cannot be resolved by the resource resolver.
 * Raised before any state is touched.
 */
export class TargetNotFoundError extends AppError {
  constructor(public readonly path: string) {
    super(`Scene path does not exist: ${path}`, 'TARGET_NOT_FOUND');
    this.name = 'TargetNotFoundError';
  }
}

/**
 * Thrown when loading or instantiating a scene fails, or when the load a
 * caller was waiting on is reset by a cache clear.
 */
export class LoadFailedError extends AppError {
  constructor(
    public readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Failed to load ${path}: ${detail}`, 'LOAD_FAILED', { cause });
    this.name = 'LoadFailedError';
  }
}

/**
 * Thrown when the load channel is already working on a different path.
 */
export class ChannelBusyError extends AppError {
  constructor(
    public readonly requestedPath: string,
    public readonly busyPath: string
  ) {
    super(`Cannot load ${requestedPath}: channel busy with ${busyPath}`, 'CHANNEL_BUSY');
    this.name = 'ChannelBusyError';
  }
}

/**
 * Thrown for out-of-range configuration values (e.g. a cache bound below 1).
 */
export class InvalidConfigError extends AppError {
  constructor(detail: string) {
    super(detail, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

/**
 * Reported when an instance-cache hit holds an instance the host already
 * destroyed. The entry is purged and the switch falls back to a fresh load.
 */
export class StaleCacheEntryError extends AppError {
  constructor(public readonly path: string) {
    super(`Cached instance for ${path} is no longer valid`, 'STALE_CACHE_ENTRY');
    this.name = 'StaleCacheEntryError';
  }
}

export class NothingToConsumeError extends AppError {
  constructor(state: string) {
    super(`Load channel has no loaded resource (state: ${state})`, 'NOTHING_TO_CONSUME');
    this.name = 'NothingToConsumeError';
  }
}

/**
 * Thrown when the live view rejects readiness for a newly attached scene.
 * The switch has already taken effect: the new scene is active and the
 * previous one was cached or disposed.
 */
export class SceneNotReadyError extends AppError {
  constructor(
    public readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Scene ${path} did not become ready: ${detail}`, 'SCENE_NOT_READY', { cause });
    this.name = 'SceneNotReadyError';
  }
}

/**
 * Thrown when a loading screen fails to show or hide.
 */
export class PresentationError extends AppError {
  constructor(
    public readonly phase: 'show' | 'hide',
    detail: string,
    cause?: unknown
  ) {
    super(`Loading screen failed to ${phase}: ${detail}`, 'PRESENTATION_FAILED', { cause });
    this.name = 'PresentationError';
  }
}
