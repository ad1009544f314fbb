import { pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { EchoConfig } from '../application/config.js';

/**
 * Root pino logger for the client.
 *
 * Pass the result (or a child of it) to `Payload.setLogger` to receive
 * delivery outcomes. `destination` defaults to stdout.
 */
export function createLogger(
  config: Pick<EchoConfig, 'logLevel'>,
  destination?: DestinationStream,
): Logger {
  const options = { name: 'echo-dispatch', level: config.logLevel };
  return destination ? pino(options, destination) : pino(options);
}
