import { DispatchError, collectorUrlToString, isDispatchError, toDispatchError } from '../domain/index.js';
import type { Payload } from '../domain/index.js';
import { sendPayload } from './http/collector-client.js';
import type { FetchLike } from './http/collector-client.js';

export interface DispatcherOptions {
  /**
   * HTTP client used for every exchange. Defaults to the platform
   * `fetch`, whose keep-alive pool is shared across submissions.
   */
  fetch?: FetchLike;
}

/**
 * Fire-and-forget delivery of Echo payloads.
 *
 * `submit` serializes the batch synchronously, starts the HTTP exchange
 * on the event loop and returns without waiting for it. Delivery outcome
 * only ever reaches the payload's logger; nothing is retried and there is
 * no ordering between submissions.
 */
export class Dispatcher {
  private readonly fetchImpl: FetchLike;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: DispatcherOptions = {}) {
    const fetchImpl = options.fetch ?? globalThis.fetch;
    if (typeof fetchImpl !== 'function') {
      throw new DispatchError('init', 'no fetch implementation available');
    }
    this.fetchImpl = fetchImpl;
  }

  /** Exchanges started but not yet settled. */
  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Schedules delivery of `payload`.
   *
   * Throws only when the events cannot be serialized, in which case
   * nothing is sent. The payload may be changed or dropped as soon as this
   * returns.
   */
  submit(payload: Payload): void {
    let body: string;
    try {
      body = JSON.stringify(payload.events);
    } catch (err: unknown) {
      throw toDispatchError('serialization', err);
    }

    const logger = payload.logger;
    const url = collectorUrlToString(payload.url);

    const task: Promise<void> = sendPayload(this.fetchImpl, { url, body, logger })
      .catch((err: unknown) => {
        // `run` failures were already logged with the response body
        if (isDispatchError(err, 'run')) return;
        const error = toDispatchError('transport', err);
        logger?.error({ err: error, kind: error.kind }, 'Echo payload delivery failed');
      })
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  /**
   * Resolves once every exchange in flight has settled, including any
   * submitted while waiting. Never rejects.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
