export { Dispatcher } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { sendPayload } from './http/collector-client.js';
export type { Exchange, FetchLike } from './http/collector-client.js';
export { userAgent } from './http/user-agent.js';
export { createLogger } from './logger.js';
