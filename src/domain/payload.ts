import type { Logger } from 'pino';
import type { Event } from './event.js';

/** The two collector endpoints. Anything else is unrepresentable. */
export const CollectorUrl = {
  Stage: 'stage',
  Prod: 'prod',
} as const;

export type CollectorUrl = (typeof CollectorUrl)[keyof typeof CollectorUrl];

const COLLECTOR_URLS: Record<CollectorUrl, string> = {
  stage: 'https://echocollector-stage.kroger.com/echo/messages',
  prod: 'https://echocollector.kroger.com/echo/messages',
};

export function collectorUrlToString(url: CollectorUrl): string {
  return COLLECTOR_URLS[url];
}

/**
 * One unit of work for the dispatcher: a batch of events, where to send
 * them, and an optional logger that receives the delivery outcome.
 */
export class Payload {
  private _url: CollectorUrl = CollectorUrl.Stage;
  private _events: Event[] = [];
  private _logger: Logger | undefined;

  get url(): CollectorUrl { return this._url; }
  get events(): readonly Event[] { return this._events; }
  get logger(): Logger | undefined { return this._logger; }

  /**
   * Failure and retry counters. Nothing increments them; delivery is
   * attempted exactly once.
   */
  get errorCount(): number { return 0; }
  get retryCount(): number { return 0; }

  setUrl(url: CollectorUrl): this {
    this._url = url;
    return this;
  }

  setEvents(events: Event[]): this {
    this._events = events;
    return this;
  }

  addEvent(event: Event): this {
    this._events.push(event);
    return this;
  }

  setLogger(logger: Logger | undefined): this {
    this._logger = logger;
    return this;
  }
}
