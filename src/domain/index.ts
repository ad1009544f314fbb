export { Event, EventType, EventResponse } from './event.js';
export type { EventJson, MessageDetail } from './event.js';
export { Payload, CollectorUrl, collectorUrlToString } from './payload.js';
export { Uuid } from './uuid.js';
export { DispatchError, classifyStatus, isDispatchError, toDispatchError } from './errors.js';
export type { DispatchErrorKind, DispatchErrorOptions, StatusClass } from './errors.js';
