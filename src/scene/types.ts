/**
 * Collaborator contracts consumed by the scene manager.
 *
 * `R` is the loaded scene resource (template), `I` the live instance
 * created from it. Both are opaque to the manager.
 */

export type LoadMode = 'sync' | 'async';

export type AsyncLoadStatus = 'in-progress' | 'done' | 'failed';

export interface AsyncLoadPoll<R> {
  status: AsyncLoadStatus;
  /** 0..1 */
  progress: number;
  resource?: R;
  error?: unknown;
}

export interface ResourceResolver<R> {
  exists(path: string): boolean;
  /** Blocking load. Throws on failure. */
  load(path: string): R;
  loadAsyncStart(path: string): void;
  loadAsyncPoll(path: string): AsyncLoadPoll<R>;
  /** Release a resource dropped from the preload cache. */
  release?(resource: R): void;
}

export interface Instantiator<R, I> {
  /** Throws on failure. */
  instantiate(resource: R): I;
  dispose(instance: I): void;
  /** Liveness query for instances the host may destroy behind our back. */
  isAlive?(instance: I): boolean;
}

export interface LiveView<I> {
  attach(instance: I): void;
  detach(instance: I): void;
  /** Resolves once the attached instance reports ready. */
  awaitReady(instance: I): Promise<void> | void;
  isAttached?(instance: I): boolean;
}

/** Loading screen shown around a transition. */
export interface Presentation {
  show(): Promise<void> | void;
  hide(): Promise<void> | void;
}

/** Passed as a switch's presentation to skip the loading screen entirely. */
export const NO_TRANSITION = 'no_transition';
export type NoTransition = typeof NO_TRANSITION;
