/**
 * Long-running watch of one resource collection
 *
 * Each connection starts without a resourceVersion, so the API server first
 * replays every existing object as ADDED. When a connection ends it is
 * reopened: at once after a clean close, with exponential backoff and jitter
 * after an error.
 */

import { errorMessage } from '../core/errors.js';
import type { OperatorLogger } from '../core/logging/index.js';
import { backoffDelay, type BackoffOptions } from './backoff.js';

export type WatchPhase = 'ADDED' | 'MODIFIED' | 'DELETED';

/**
 * The part of `Watch` from @kubernetes/client-node the watcher uses
 */
export interface WatchClient {
  watch(
    path: string,
    queryParams: Record<string, string | number | boolean | undefined>,
    callback: (phase: string, apiObj: unknown, watchObj?: unknown) => void,
    done: (err: unknown) => void
  ): Promise<AbortController>;
}

export type WatchFactory = () => WatchClient;

export const DEFAULT_RECONNECT_BACKOFF: BackoffOptions = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

export interface ResourceWatcherOptions {
  /** API path of the collection, e.g. `/api/v1/secrets` */
  path: string;
  watchFactory: WatchFactory;
  onEvent: (phase: WatchPhase, object: unknown) => void;
  logger: OperatorLogger;
  /** Server-side timeout of one watch connection */
  timeoutSeconds?: number;
  reconnect?: BackoffOptions;
}

const PHASES: readonly string[] = ['ADDED', 'MODIFIED', 'DELETED'];

function isWatchPhase(phase: string): phase is WatchPhase {
  return PHASES.includes(phase);
}

function statusMessage(object: unknown): string | undefined {
  if (typeof object === 'object' && object !== null && 'message' in object) {
    return String(object.message);
  }
  return undefined;
}

export class ResourceWatcher {
  private readonly logger: OperatorLogger;
  private readonly reconnect: BackoffOptions;
  private controller: AbortController | undefined;
  private reconnectTimer: NodeJS.Timeout | undefined;
  private reconnectAttempts = 0;
  private running = false;

  constructor(private readonly options: ResourceWatcherOptions) {
    this.logger = options.logger.child({ watch: options.path });
    this.reconnect = options.reconnect ?? DEFAULT_RECONNECT_BACKOFF;
  }

  get attempts(): number {
    return this.reconnectAttempts;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.connect();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.controller?.abort();
    this.controller = undefined;
  }

  private connect(): void {
    const watch = this.options.watchFactory();
    let ended = false;
    const end = (error: unknown): void => {
      if (ended) {
        return;
      }
      ended = true;
      this.handleEnd(error);
    };

    watch
      .watch(
        this.options.path,
        {
          allowWatchBookmarks: true,
          ...(this.options.timeoutSeconds !== undefined && {
            timeoutSeconds: this.options.timeoutSeconds,
          }),
        },
        (phase, object) => this.handleEvent(phase, object),
        end
      )
      .then((controller) => {
        if (this.running && !ended) {
          this.controller = controller;
          this.logger.debug('Watch connected');
        } else {
          controller.abort();
        }
      })
      .catch(end);
  }

  private handleEvent(phase: string, object: unknown): void {
    if (phase === 'BOOKMARK') {
      return;
    }
    if (phase === 'ERROR') {
      this.logger.warn('Watch reported an error', { message: statusMessage(object) });
      return;
    }
    if (!isWatchPhase(phase)) {
      this.logger.warn('Ignoring watch event of unknown type', { phase });
      return;
    }
    this.reconnectAttempts = 0;
    try {
      this.options.onEvent(phase, object);
    } catch (error) {
      this.logger.warn('Watch event handler failed', { phase, error: errorMessage(error) });
    }
  }

  private handleEnd(error: unknown): void {
    this.controller = undefined;
    if (!this.running) {
      return;
    }

    if (error === null || error === undefined) {
      this.logger.debug('Watch closed, reconnecting');
      this.schedule(0);
      return;
    }

    this.reconnectAttempts++;
    const delay = backoffDelay(this.reconnectAttempts, this.reconnect);
    this.logger.warn('Watch connection error, scheduling reconnection', {
      error: errorMessage(error),
      attempt: this.reconnectAttempts,
      delayMs: delay,
    });
    this.schedule(delay);
  }

  private schedule(delayMs: number): void {
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.running) {
        this.connect();
      }
    }, delayMs);
  }
}
