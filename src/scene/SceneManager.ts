/**
 * SceneManager - scene lifecycle and dual-cache state machine.
 *
 * A scene instance lives in exactly one place: the active slot (attached to
 * the live view), the instance cache (detached, inactive), or nowhere
 * (disposed). Loaded-but-not-instantiated resources live in a separate
 * preload cache. Both caches are bounded LRU stores.
 *
 * All loads go through one LoadChannel, so at most one load is in flight
 * across the manager. A fresh load of a different path while the channel
 * is busy fails with ChannelBusyError instead of queueing.
 *
 * Suspension points: presentation show/hide, load polling (one
 * `waitForFrame()` per poll) or waiting on someone else's load, and the new
 * instance's readiness. Everything between them runs synchronously.
 */

import { resolveSceneManagerConfig } from '../config';
import type { SceneManagerConfig } from '../config';
import {
  AppError,
  ChannelBusyError,
  InvalidConfigError,
  LoadFailedError,
  PresentationError,
  SceneNotReadyError,
  StaleCacheEntryError,
  TargetNotFoundError,
} from '../core/errors';
import { EventEmitter } from '../utils/EventEmitter';
import type { EventMap } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import { LRUCache } from '../utils/LRUCache';
import { LoadChannel, LoadState } from './LoadChannel';
import type { LoadOutcome } from './LoadChannel';
import { NullPresentation } from './Presentation';
import { NO_TRANSITION } from './types';
import type {
  Instantiator,
  LiveView,
  LoadMode,
  NoTransition,
  Presentation,
  ResourceResolver,
} from './types';

const log = new Logger('SceneManager');

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type SceneOperation = 'switch' | 'preload' | 'cache';

export interface SceneManagerEvents extends EventMap {
  preloadStarted: { path: string };
  preloadCompleted: { path: string };
  /** A preloaded resource was dropped for capacity. */
  preloadEvicted: { path: string };
  switchStarted: { from: string; to: string };
  switchCompleted: { path: string };
  sceneCached: { path: string };
  sceneRemovedFromCache: { path: string };
  loadScreenShown: { presentation: Presentation };
  loadScreenHidden: { presentation: Presentation };
  error: { operation: SceneOperation; path: string; error: AppError };
}

/** Handler object for `connectObserver`; every handler is optional. */
export interface SceneObserver {
  onPreloadStarted?(data: SceneManagerEvents['preloadStarted']): void;
  onPreloadCompleted?(data: SceneManagerEvents['preloadCompleted']): void;
  onPreloadEvicted?(data: SceneManagerEvents['preloadEvicted']): void;
  onSwitchStarted?(data: SceneManagerEvents['switchStarted']): void;
  onSwitchCompleted?(data: SceneManagerEvents['switchCompleted']): void;
  onSceneCached?(data: SceneManagerEvents['sceneCached']): void;
  onSceneRemovedFromCache?(data: SceneManagerEvents['sceneRemovedFromCache']): void;
  onLoadScreenShown?(data: SceneManagerEvents['loadScreenShown']): void;
  onLoadScreenHidden?(data: SceneManagerEvents['loadScreenHidden']): void;
  onError?(data: SceneManagerEvents['error']): void;
}

export interface SwitchOptions {
  /** Cache the outgoing scene and allow reuse of a cached instance. Default true. */
  useCache?: boolean;
  /** Loading screen for this switch; `NO_TRANSITION` skips it. Default: the manager's default. */
  presentation?: Presentation | NoTransition;
}

export interface SceneManagerOptions<R, I> {
  resolver: ResourceResolver<R>;
  instantiator: Instantiator<R, I>;
  liveView: LiveView<I>;
  config?: Partial<SceneManagerConfig>;
  defaultPresentation?: Presentation;
  /** Suspends between load polls. Defaults to a `pollIntervalMs` timer. */
  waitForFrame?: () => Promise<void>;
  /** Clock for cache timestamps and progress logging (ms). */
  now?: () => number;
}

export interface CachedSceneInfo {
  path: string;
  accessCount: number;
  cachedTime: number;
  instanceValid: boolean;
}

export interface SceneCacheInfo {
  instanceCache: CachedSceneInfo[];
  instanceMax: number;
  preloadCache: string[];
  preloadMax: number;
  accessOrders: { instance: string[]; preload: string[] };
}

export interface SceneManagerDebugInfo {
  currentPath: string;
  previousPath: string;
  instanceCacheSize: number;
  instanceCacheMax: number;
  preloadCacheSize: number;
  preloadCacheMax: number;
  accessOrders: { instance: string[]; preload: string[] };
  loadingPath: string;
  loadingState: LoadState;
  loadMode: LoadMode;
  alwaysUseDefaultPresentation: boolean;
}

// ---------------------------------------------------------------------------
// Internal types
// ---------------------------------------------------------------------------

interface CachedScene<I> {
  instance: I;
  cachedTime: number;
  accessCount: number;
}

interface ActiveScene<I> {
  path: string;
  instance: I;
  accessCount: number;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toAppError(err: unknown, path: string): AppError {
  if (err instanceof AppError) return err;
  return new LoadFailedError(path, describeError(err), err);
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class SceneManager<R extends object, I extends object> extends EventEmitter<SceneManagerEvents> {
  private readonly config: SceneManagerConfig;
  private readonly resolver: ResourceResolver<R>;
  private readonly instantiator: Instantiator<R, I>;
  private readonly liveView: LiveView<I>;
  private readonly defaultPresentation: Presentation;
  private readonly waitForFrame: () => Promise<void>;
  private readonly now: () => number;

  private readonly channel: LoadChannel<R>;
  private readonly instanceCache: LRUCache<string, CachedScene<I>>;
  private readonly preloadCache: LRUCache<string, R>;

  private active: ActiveScene<I> | null = null;
  private previousPath = '';

  constructor(options: SceneManagerOptions<R, I>) {
    super();
    this.config = resolveSceneManagerConfig(options.config);
    this.resolver = options.resolver;
    this.instantiator = options.instantiator;
    this.liveView = options.liveView;
    this.defaultPresentation = options.defaultPresentation ?? new NullPresentation();
    this.now = options.now ?? Date.now;
    this.waitForFrame =
      options.waitForFrame ??
      (() => new Promise<void>((resolve) => setTimeout(resolve, this.config.pollIntervalMs)));

    this.channel = new LoadChannel(this.resolver);
    this.instanceCache = new LRUCache<string, CachedScene<I>>(this.config.instanceCacheSize, {
      dispose: (_path, entry) => this.destroyInstance(entry.instance),
      onEvict: (path) => {
        log.info(`Evicted cached scene: ${path}`);
        this.emit('sceneRemovedFromCache', { path });
      },
    });
    this.preloadCache = new LRUCache<string, R>(this.config.preloadCacheSize, {
      dispose: (_path, resource) => this.resolver.release?.(resource),
      onEvict: (path) => {
        log.info(`Evicted preloaded resource: ${path}`);
        this.emit('preloadEvicted', { path });
      },
    });

    log.info(
      `Initialized (instance cache ${this.config.instanceCacheSize}, preload cache ${this.config.preloadCacheSize}, ${this.config.loadMode} loading)`
    );
  }

  // -----------------------------------------------------------------------
  // Switching
  // -----------------------------------------------------------------------

  /**
   * Make `path` the active scene.
   *
   * Resolves after the new scene is attached, reports ready and the
   * loading screen is hidden. When loading or instantiation fails the
   * previous scene stays active, an already-shown loading screen is hidden,
   * and the promise rejects.
   *
   * A readiness failure (`SceneNotReadyError`) or a failure to hide the
   * loading screen (`PresentationError`) arrives after the transition, so
   * the new scene is already active when the promise rejects.
   */
  async switchScene(path: string, options: SwitchOptions = {}): Promise<void> {
    const useCache = options.useCache ?? true;

    if (!this.resolver.exists(path)) {
      throw this.report('switch', path, new TargetNotFoundError(path));
    }

    const from = this.getCurrentPath();
    log.info(`Switching scene: ${from || '(none)'} -> ${path}`);
    this.emit('switchStarted', { from, to: path });

    if (path === from) {
      log.debug(`Scene already active: ${path}`);
      this.emit('switchCompleted', { path });
      return;
    }

    // Refuse before a loading screen goes up when only a fresh load would do
    if (this.needsFreshLoad(path, useCache) && this.channel.isBusyWith(path)) {
      throw this.report('switch', path, new ChannelBusyError(path, this.channel.path));
    }

    const presentation = this.resolvePresentation(options.presentation);
    if (presentation) {
      try {
        await this.showPresentation(presentation);
      } catch (err) {
        throw this.report('switch', path, new PresentationError('show', describeError(err), err));
      }
    }

    let next: ActiveScene<I>;
    try {
      next = await this.acquire(path, useCache);
      this.transition(path, next, useCache);
    } catch (err) {
      throw await this.abortSwitch(path, toAppError(err, path), presentation);
    }

    try {
      await this.liveView.awaitReady(next.instance);
    } catch (err) {
      // The transition already happened; only the readiness wait failed
      const error = new SceneNotReadyError(path, describeError(err), err);
      throw await this.abortSwitch(path, error, presentation);
    }

    if (presentation) {
      try {
        await this.hidePresentation(presentation);
      } catch (err) {
        throw this.report('switch', path, new PresentationError('hide', describeError(err), err));
      }
    }

    log.info(`Scene switch completed: ${path}`);
    this.emit('switchCompleted', { path });
  }

  /**
   * Adopt a scene the host already shows as the active slot (startup only).
   * The instance is assumed to be attached already.
   */
  setActiveScene(path: string, instance: I): void {
    if (this.active) {
      throw new InvalidConfigError(`Active scene already set (${this.active.path})`);
    }
    this.active = { path, instance, accessCount: 0 };
    log.info(`Active scene adopted: ${path}`);
  }

  // -----------------------------------------------------------------------
  // Preloading
  // -----------------------------------------------------------------------

  /**
   * Load `path` into the preload cache without instantiating it.
   *
   * No-op when the scene is already preloaded, already on the load channel,
   * or present in the instance cache. Resolves without caching anything if
   * the cache is cleared while the load is in flight.
   */
  async preload(path: string): Promise<void> {
    if (!this.resolver.exists(path)) {
      throw this.report('preload', path, new TargetNotFoundError(path));
    }

    if (this.preloadCache.has(path)) {
      log.debug(`Scene already preloaded: ${path}`);
      return;
    }
    if (this.channel.path === path || this.instanceCache.has(path)) {
      log.debug(`Scene already loading or cached: ${path}`);
      return;
    }
    if (this.channel.isBusyWith(path)) {
      throw this.report('preload', path, new ChannelBusyError(path, this.channel.path));
    }

    log.info(`Preloading scene: ${path}`);
    this.emit('preloadStarted', { path });

    let outcome: LoadOutcome<R>;
    try {
      outcome = await this.driveLoad(path);
    } catch (err) {
      throw this.report('preload', path, toAppError(err, path));
    }

    switch (outcome.status) {
      case 'loaded':
        this.preloadCache.insert(path, outcome.resource);
        log.info(`Preload completed: ${path}`);
        this.emit('preloadCompleted', { path });
        return;
      case 'failed':
        throw this.report('preload', path, outcome.error);
      case 'reset':
        log.info(`Preload discarded, cache cleared while loading: ${path}`);
        return;
    }
  }

  // -----------------------------------------------------------------------
  // Cache management
  // -----------------------------------------------------------------------

  /** Dispose both caches and reset the load channel. */
  clearCache(): void {
    log.info('Clearing scene caches');
    this.preloadCache.clear();

    const paths = this.instanceCache.keys();
    this.instanceCache.clear();
    for (const path of paths) {
      this.emit('sceneRemovedFromCache', { path });
    }

    // A stale channel would block later preloads of the same path
    this.channel.reset();
  }

  setInstanceCacheSize(size: number): void {
    try {
      this.instanceCache.setMaxSize(size);
    } catch (err) {
      throw this.report('cache', '', toAppError(err, ''));
    }
    log.info(`Instance cache size set to ${size}`);
  }

  setPreloadCacheSize(size: number): void {
    try {
      this.preloadCache.setMaxSize(size);
    } catch (err) {
      throw this.report('cache', '', toAppError(err, ''));
    }
    log.info(`Preload cache size set to ${size}`);
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  isCached(path: string): boolean {
    return this.instanceCache.has(path) || this.preloadCache.has(path);
  }

  /** 1 for cached scenes, last polled progress for the in-flight load, else 0. */
  getProgress(path: string): number {
    if (this.isCached(path)) return 1;
    if (this.channel.path === path) return this.channel.progress;
    return 0;
  }

  getCurrent(): { path: string; instance: I } | null {
    return this.active ? { path: this.active.path, instance: this.active.instance } : null;
  }

  getCurrentPath(): string {
    return this.active?.path ?? '';
  }

  getPreviousPath(): string {
    return this.previousPath;
  }

  getCacheInfo(): SceneCacheInfo {
    return {
      instanceCache: this.instanceCache.entries().map(([path, entry]) => ({
        path,
        accessCount: entry.accessCount,
        cachedTime: entry.cachedTime,
        instanceValid: this.isAlive(entry.instance),
      })),
      instanceMax: this.instanceCache.capacity,
      preloadCache: this.preloadCache.keys(),
      preloadMax: this.preloadCache.capacity,
      accessOrders: {
        instance: this.instanceCache.keys(),
        preload: this.preloadCache.keys(),
      },
    };
  }

  getDebugInfo(): SceneManagerDebugInfo {
    return {
      currentPath: this.getCurrentPath(),
      previousPath: this.previousPath,
      instanceCacheSize: this.instanceCache.size,
      instanceCacheMax: this.instanceCache.capacity,
      preloadCacheSize: this.preloadCache.size,
      preloadCacheMax: this.preloadCache.capacity,
      accessOrders: {
        instance: this.instanceCache.keys(),
        preload: this.preloadCache.keys(),
      },
      loadingPath: this.channel.path,
      loadingState: this.channel.state,
      loadMode: this.config.loadMode,
      alwaysUseDefaultPresentation: this.config.alwaysUseDefaultPresentation,
    };
  }

  /**
   * Check exclusive ownership of instances. Returns one message per
   * violation (each also logged at error level); empty when consistent.
   */
  validateOwnership(): string[] {
    const problems: string[] = [];
    const cachedAs = new Map<I, string>();

    for (const [path, entry] of this.instanceCache.entries()) {
      const other = cachedAs.get(entry.instance);
      if (other !== undefined) {
        problems.push(`instance cached under both ${other} and ${path}`);
      } else {
        cachedAs.set(entry.instance, path);
      }
      if (this.liveView.isAttached?.(entry.instance)) {
        problems.push(`cached instance still attached: ${path}`);
      }
    }

    if (this.active) {
      const other = cachedAs.get(this.active.instance);
      if (other !== undefined) {
        problems.push(`active instance ${this.active.path} also cached as ${other}`);
      }
    }

    for (const problem of problems) {
      log.error(`Ownership violation: ${problem}`);
    }
    return problems;
  }

  // -----------------------------------------------------------------------
  // Observers
  // -----------------------------------------------------------------------

  /** Subscribe every handler the observer defines. Returns one unsubscribe function. */
  connectObserver(observer: SceneObserver): () => void {
    const unsubscribers: (() => void)[] = [];
    const bind = <K extends keyof SceneManagerEvents>(
      event: K,
      handler: ((data: SceneManagerEvents[K]) => void) | undefined
    ): void => {
      if (!handler) return;
      unsubscribers.push(this.on(event, (data) => handler.call(observer, data)));
    };

    bind('preloadStarted', observer.onPreloadStarted);
    bind('preloadCompleted', observer.onPreloadCompleted);
    bind('preloadEvicted', observer.onPreloadEvicted);
    bind('switchStarted', observer.onSwitchStarted);
    bind('switchCompleted', observer.onSwitchCompleted);
    bind('sceneCached', observer.onSceneCached);
    bind('sceneRemovedFromCache', observer.onSceneRemovedFromCache);
    bind('loadScreenShown', observer.onLoadScreenShown);
    bind('loadScreenHidden', observer.onLoadScreenHidden);
    bind('error', observer.onError);

    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  dispose(): void {
    this.clearCache();
    this.removeAllListeners();
  }

  // -----------------------------------------------------------------------
  // Acquisition
  // -----------------------------------------------------------------------

  private needsFreshLoad(path: string, useCache: boolean): boolean {
    if (this.preloadCache.has(path) || this.channel.isLoading(path)) return false;
    return !(useCache && this.instanceCache.has(path));
  }

  /**
   * Obtain an instance for `path`, first match wins:
   * preload cache, in-flight load, instance cache, fresh load.
   */
  private async acquire(path: string, useCache: boolean): Promise<ActiveScene<I>> {
    const preloaded = this.preloadCache.remove(path);
    if (preloaded !== undefined) {
      log.debug(`Using preloaded resource: ${path}`);
      return { path, instance: this.instantiateOwned(path, preloaded), accessCount: 0 };
    }

    if (this.channel.isLoading(path)) {
      log.info(`Waiting for in-flight load: ${path}`);
      const resource = this.unwrap(path, await this.channel.whenSettled());
      // Leave it in the preload cache so a racing switch to the same path can use it
      if (this.preloadCache.get(path) !== resource) {
        this.preloadCache.insert(path, resource);
      }
      return { path, instance: this.instantiate(path, resource), accessCount: 0 };
    }

    if (useCache) {
      const cached = this.instanceCache.remove(path);
      if (cached) {
        if (this.isAlive(cached.instance)) {
          cached.accessCount++;
          cached.cachedTime = this.now();
          log.debug(`Reusing cached instance: ${path} (access ${cached.accessCount})`);
          return { path, instance: cached.instance, accessCount: cached.accessCount };
        }
        const stale = new StaleCacheEntryError(path);
        log.warn(`${stale.message}; loading fresh`);
        this.emit('sceneRemovedFromCache', { path });
        this.emit('error', { operation: 'switch', path, error: stale });
      }
    }

    log.debug(`Loading scene: ${path}`);
    const resource = this.unwrap(path, await this.driveLoad(path));
    return { path, instance: this.instantiateOwned(path, resource), accessCount: 0 };
  }

  /**
   * Start a load on the channel and poll it to a terminal state. If the
   * same path is already on the channel, wait for that load instead.
   */
  private async driveLoad(path: string): Promise<LoadOutcome<R>> {
    if (!this.channel.start(path, this.config.loadMode)) {
      return this.channel.whenSettled();
    }

    const generation = this.channel.generation;
    let lastProgressLog = this.now();
    for (;;) {
      if (this.channel.generation !== generation) {
        return { status: 'reset' };
      }
      const result = this.channel.poll();
      if (result.error) {
        return { status: 'failed', error: result.error };
      }
      if (result.state === LoadState.Loaded) {
        return { status: 'loaded', resource: this.channel.consume() };
      }

      const now = this.now();
      if (now - lastProgressLog >= this.config.progressLogIntervalMs) {
        log.debug(`Loading ${path}: ${Math.round(result.progress * 100)}%`);
        lastProgressLog = now;
      }
      await this.waitForFrame();
    }
  }

  private unwrap(path: string, outcome: LoadOutcome<R>): R {
    switch (outcome.status) {
      case 'loaded':
        return outcome.resource;
      case 'failed':
        throw outcome.error;
      case 'reset':
        throw new LoadFailedError(path, 'load was reset before it completed');
    }
  }

  private instantiate(path: string, resource: R): I {
    try {
      return this.instantiator.instantiate(resource);
    } catch (err) {
      throw new LoadFailedError(
        path,
        `instantiation failed: ${describeError(err)}`,
        err
      );
    }
  }

  /** Instantiate a resource nobody else holds; release it if instantiation fails. */
  private instantiateOwned(path: string, resource: R): I {
    try {
      return this.instantiate(path, resource);
    } catch (err) {
      this.resolver.release?.(resource);
      throw err;
    }
  }

  // -----------------------------------------------------------------------
  // Transition
  // -----------------------------------------------------------------------

  private transition(path: string, next: ActiveScene<I>, useCache: boolean): void {
    const old = this.active;

    if (old && old.instance !== next.instance) {
      this.liveView.detach(old.instance);
      if (useCache && old.path !== '' && old.path !== path) {
        this.instanceCache.insert(old.path, {
          instance: old.instance,
          cachedTime: this.now(),
          accessCount: old.accessCount,
        });
        log.debug(`Cached scene: ${old.path}`);
        this.emit('sceneCached', { path: old.path });
      } else {
        this.destroyInstance(old.instance);
      }
    }

    this.previousPath = old?.path ?? '';
    this.active = next;
    this.liveView.attach(next.instance);
  }

  private isAlive(instance: I): boolean {
    return this.instantiator.isAlive?.(instance) ?? true;
  }

  private destroyInstance(instance: I): void {
    // Skip instances the host already destroyed
    if (this.isAlive(instance)) {
      this.instantiator.dispose(instance);
    }
  }

  // -----------------------------------------------------------------------
  // Presentation
  // -----------------------------------------------------------------------

  private resolvePresentation(requested: Presentation | NoTransition | undefined): Presentation | null {
    if (this.config.alwaysUseDefaultPresentation) return this.defaultPresentation;
    if (requested === NO_TRANSITION) return null;
    return requested ?? this.defaultPresentation;
  }

  /**
   * Report a failed switch and take down its loading screen. A hide failure
   * is reported as well, but the original error is the one returned.
   */
  private async abortSwitch(
    path: string,
    error: AppError,
    presentation: Presentation | null
  ): Promise<AppError> {
    this.report('switch', path, error);
    if (presentation) {
      try {
        await this.hidePresentation(presentation);
      } catch (err) {
        this.report('switch', path, new PresentationError('hide', describeError(err), err));
      }
    }
    return error;
  }

  private async showPresentation(presentation: Presentation): Promise<void> {
    await presentation.show();
    this.emit('loadScreenShown', { presentation });
  }

  private async hidePresentation(presentation: Presentation): Promise<void> {
    await presentation.hide();
    this.emit('loadScreenHidden', { presentation });
  }

  // -----------------------------------------------------------------------
  // Errors
  // -----------------------------------------------------------------------

  private report(operation: SceneOperation, path: string, error: AppError): AppError {
    log.error(`${operation} failed${path ? ` (${path})` : ''}: ${error.message}`);
    this.emit('error', { operation, path, error });
    return error;
  }
}
