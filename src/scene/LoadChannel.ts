/**
 * LoadChannel - the single in-flight scene load shared by the whole manager.
 *
 * State machine:
 *   NotLoaded --start--> Loading --poll(done)--> Loaded --consume--> NotLoaded
 *                        Loading --poll(failed)--> NotLoaded
 *   any --reset--> NotLoaded
 *
 * Only the caller that started a load drives it through `poll()`. Anyone
 * else interested in the same load awaits `whenSettled()`.
 */

import { ChannelBusyError, LoadFailedError, NothingToConsumeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { AsyncLoadPoll, LoadMode, ResourceResolver } from './types';

const log = new Logger('LoadChannel');

export const LoadState = {
  NotLoaded: 'not-loaded',
  Loading: 'loading',
  Loaded: 'loaded',
} as const;
export type LoadState = (typeof LoadState)[keyof typeof LoadState];

export type LoadOutcome<R> =
  | { status: 'loaded'; resource: R }
  | { status: 'failed'; error: LoadFailedError }
  | { status: 'reset' };

export interface LoadPollResult<R> {
  state: LoadState;
  path: string;
  progress: number;
  resource?: R;
  /** Set on the poll that observed the failure. */
  error?: LoadFailedError;
}

interface LoadTicket<R> {
  path: string;
  mode: LoadMode;
  state: LoadState;
  progress: number;
  loaded: { resource: R } | null;
  settled: Promise<LoadOutcome<R>>;
  settle: (outcome: LoadOutcome<R>) => void;
}

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class LoadChannel<R> {
  private ticket: LoadTicket<R> | null = null;
  private _generation = 0;

  constructor(private readonly resolver: ResourceResolver<R>) {}

  get state(): LoadState {
    return this.ticket?.state ?? LoadState.NotLoaded;
  }

  /** Path of the current load, '' when idle. */
  get path(): string {
    return this.ticket?.path ?? '';
  }

  /** Progress of the current load as of its last poll. */
  get progress(): number {
    return this.ticket?.progress ?? 0;
  }

  /** Bumps on every start and reset; a driver holding an older value must stop. */
  get generation(): number {
    return this._generation;
  }

  isLoading(path: string): boolean {
    return this.ticket?.path === path && this.ticket.state === LoadState.Loading;
  }

  /** True when the channel holds a load (loading or unconsumed) for another path. */
  isBusyWith(path: string): boolean {
    return this.ticket !== null && this.ticket.path !== path;
  }

  /**
   * Begin loading `path`.
   *
   * @returns `true` when a new load started, `false` when the same path is
   *   already loading or loaded (re-entrant no-op).
   * @throws ChannelBusyError when a different path occupies the channel.
   * @throws LoadFailedError when the async loader refuses to start.
   */
  start(path: string, mode: LoadMode): boolean {
    if (this.ticket) {
      if (this.ticket.path === path) return false;
      throw new ChannelBusyError(path, this.ticket.path);
    }

    let settle: (outcome: LoadOutcome<R>) => void = () => {};
    const settled = new Promise<LoadOutcome<R>>((resolve) => {
      settle = resolve;
    });
    const ticket: LoadTicket<R> = {
      path,
      mode,
      state: LoadState.Loading,
      progress: 0,
      loaded: null,
      settled,
      settle,
    };
    this.ticket = ticket;
    this._generation++;
    log.debug(`Load started (${mode}): ${path}`);

    if (mode === 'async') {
      try {
        this.resolver.loadAsyncStart(path);
      } catch (err) {
        const error = this.fail(ticket, err);
        throw error;
      }
    }
    return true;
  }

  /**
   * Advance the current load by one step. Synchronous loads complete on the
   * first poll. A terminal ticket is not polled again.
   */
  poll(): LoadPollResult<R> {
    const ticket = this.ticket;
    if (!ticket) {
      return { state: LoadState.NotLoaded, path: '', progress: 0 };
    }
    if (ticket.state === LoadState.Loaded) {
      return this.snapshot(ticket);
    }

    if (ticket.mode === 'sync') {
      try {
        return this.succeed(ticket, this.resolver.load(ticket.path));
      } catch (err) {
        return this.failedResult(ticket, this.fail(ticket, err));
      }
    }

    let status: AsyncLoadPoll<R>;
    try {
      status = this.resolver.loadAsyncPoll(ticket.path);
    } catch (err) {
      return this.failedResult(ticket, this.fail(ticket, err));
    }

    switch (status.status) {
      case 'in-progress':
        ticket.progress = clampProgress(status.progress);
        return this.snapshot(ticket);
      case 'done':
        if (status.resource === undefined) {
          return this.failedResult(ticket, this.fail(ticket, new Error('loader returned no resource')));
        }
        return this.succeed(ticket, status.resource);
      case 'failed':
        return this.failedResult(ticket, this.fail(ticket, status.error ?? new Error('loader reported failure')));
    }
  }

  /**
   * Take ownership of the loaded resource and return the channel to NotLoaded.
   * @throws NothingToConsumeError unless the channel is Loaded.
   */
  consume(): R {
    const ticket = this.ticket;
    if (!ticket || !ticket.loaded) {
      throw new NothingToConsumeError(this.state);
    }
    this.ticket = null;
    return ticket.loaded.resource;
  }

  /** Resolves when the current load reaches a terminal state. */
  whenSettled(): Promise<LoadOutcome<R>> {
    return this.ticket?.settled ?? Promise.resolve<LoadOutcome<R>>({ status: 'reset' });
  }

  /**
   * Force NotLoaded, discarding whatever is in flight or loaded. Waiters
   * settle with a `reset` outcome and the active driver stops on its next poll.
   */
  reset(): void {
    const ticket = this.ticket;
    this.ticket = null;
    this._generation++;
    if (ticket) {
      log.debug(`Load channel reset while ${ticket.state}: ${ticket.path}`);
      ticket.settle({ status: 'reset' });
    }
  }

  private succeed(ticket: LoadTicket<R>, resource: R): LoadPollResult<R> {
    ticket.state = LoadState.Loaded;
    ticket.progress = 1;
    ticket.loaded = { resource };
    ticket.settle({ status: 'loaded', resource });
    log.debug(`Load finished: ${ticket.path}`);
    return this.snapshot(ticket);
  }

  private fail(ticket: LoadTicket<R>, cause: unknown): LoadFailedError {
    const error = new LoadFailedError(ticket.path, describeError(cause), cause);
    if (this.ticket === ticket) {
      this.ticket = null;
    }
    ticket.state = LoadState.NotLoaded;
    ticket.progress = 0;
    ticket.settle({ status: 'failed', error });
    log.warn(`Load failed: ${ticket.path}`, cause);
    return error;
  }

  private snapshot(ticket: LoadTicket<R>): LoadPollResult<R> {
    return {
      state: ticket.state,
      path: ticket.path,
      progress: ticket.progress,
      resource: ticket.loaded?.resource,
    };
  }

  private failedResult(ticket: LoadTicket<R>, error: LoadFailedError): LoadPollResult<R> {
    return {
      state: LoadState.NotLoaded,
      path: ticket.path,
      progress: 0,
      error,
    };
  }
}
