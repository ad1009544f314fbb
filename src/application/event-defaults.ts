import type { Event } from '../domain/index.js';
import type { EchoConfig } from './config.js';

/** Values filled into events that leave the matching field unset. */
export interface EventDefaults {
  readonly host?: string;
  readonly applicationVersion?: string;
  readonly dataCenter?: string;
  /** Clock for `timestamp`, epoch ms. Defaults to `Date.now`. */
  readonly now?: () => number;
}

export function eventDefaultsFromConfig(config: EchoConfig): EventDefaults {
  return {
    host: config.host,
    applicationVersion: config.applicationVersion,
    dataCenter: config.dataCenter,
  };
}

/**
 * Fills host, version, data center and timestamp on each event where the
 * caller has not set them. Set fields are never overwritten.
 */
export function applyEventDefaults(events: readonly Event[], defaults: EventDefaults): void {
  const now = defaults.now ?? Date.now;

  for (const event of events) {
    if (event.host === undefined) event.setHost(defaults.host);
    if (event.applicationVersion === undefined) event.setApplicationVersion(defaults.applicationVersion);
    if (event.dataCenter === undefined) event.setDataCenter(defaults.dataCenter);
    if (event.timestamp === undefined) event.setTimestamp(now());
  }
}
