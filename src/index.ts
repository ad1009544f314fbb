/**
 * Public surface of echo-dispatch.
 *
 * Typical use:
 *
 *   const config = loadEchoConfig();
 *   const log = createLogger(config);
 *   const dispatcher = new Dispatcher();
 *
 *   const event = new Event()
 *     .setRoutingKey('atlas-dev-promises')
 *     .setEventType(EventType.Info)
 *     .setMessage('order placed');
 *
 *   dispatcher.submit(new Payload().setUrl(config.collector).addEvent(event).setLogger(log));
 *   await dispatcher.drain();
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
