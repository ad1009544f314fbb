/**
 * Core domain types for the Echo event model.
 *
 * An `Event` is a mutable builder: every setter changes the receiver in
 * place and returns it, so calls chain. Setters never throw: numeric
 * values a wire field cannot hold leave that field unset.
 */

import type { Uuid } from './uuid.js';

/**
 * Echo event type.
 *
 * - ERROR: a non-normal action or situation the system processed.
 * - INFO: a normal action or situation the system processed.
 * - PERFORMANCE: speed or time taken by an action the system processed.
 * - TRACKING: correlates two or more otherwise unrelated data points.
 * - SYSTEM: client machine data (CPU utilisation, heap usage, etc).
 */
export const EventType = {
  Error: 'ERROR',
  Info: 'INFO',
  Performance: 'PERFORMANCE',
  Tracking: 'TRACKING',
  System: 'SYSTEM',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

/** Generic outcome for events where an HTTP status makes no sense. */
export const EventResponse = {
  Success: 'success',
  Failure: 'failure',
} as const;

export type EventResponse = (typeof EventResponse)[keyof typeof EventResponse];

/** String key/value pairs with no appropriate root-level field. */
export type MessageDetail = Record<string, string>;

/** Wire form of a single event. Absent optional fields have no key at all. */
export interface EventJson {
  routingKey: string;
  type: EventType;
  message: string;
  correlationId?: string;
  timestamp?: number;
  messageDetail?: MessageDetail;
  host?: string;
  applicationVersion?: string;
  dataCenter?: string;
  clientHostName?: string;
  destinationHostName?: string;
  destinationPath?: string;
  startTimestamp?: number;
  finishTimestamp?: number;
  duration?: number;
  durationInMs?: number;
  responseCode?: number;
  response?: EventResponse;
}

const MAX_UINT16 = 0xffff;

/** Whole milliseconds, or unset when the value has no JSON number form. */
function toInteger(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

/** Unsigned wire fields: truncated, and unset when out of range. */
function toUnsigned(value: number | undefined, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const whole = toInteger(value);
  return whole !== undefined && whole >= 0 && whole <= max ? whole : undefined;
}

function isFiniteNumber(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

export class Event {
  private _routingKey = '';
  private _eventType: EventType = EventType.Info;
  private _message = '';
  private _correlationId: Uuid | undefined;
  private _timestamp: number | undefined;
  private _messageDetail: MessageDetail | undefined;
  private _host: string | undefined;
  private _applicationVersion: string | undefined;
  private _dataCenter: string | undefined;
  private _clientHostName: string | undefined;
  private _destinationHostName: string | undefined;
  private _destinationPath: string | undefined;
  private _startTimestamp: number | undefined;
  private _finishTimestamp: number | undefined;
  private _duration: number | undefined;
  private _durationInMs: number | undefined;
  private _responseCode: number | undefined;
  private _response: EventResponse | undefined;

  get routingKey(): string { return this._routingKey; }
  get eventType(): EventType { return this._eventType; }
  get message(): string { return this._message; }
  get correlationId(): Uuid | undefined { return this._correlationId; }
  get timestamp(): number | undefined { return this._timestamp; }
  get messageDetail(): Readonly<MessageDetail> | undefined { return this._messageDetail; }
  get host(): string | undefined { return this._host; }
  get applicationVersion(): string | undefined { return this._applicationVersion; }
  get dataCenter(): string | undefined { return this._dataCenter; }
  get clientHostName(): string | undefined { return this._clientHostName; }
  get destinationHostName(): string | undefined { return this._destinationHostName; }
  get destinationPath(): string | undefined { return this._destinationPath; }
  get startTimestamp(): number | undefined { return this._startTimestamp; }
  get finishTimestamp(): number | undefined { return this._finishTimestamp; }
  get duration(): number | undefined { return this._duration; }
  get durationInMs(): number | undefined { return this._durationInMs; }
  get responseCode(): number | undefined { return this._responseCode; }
  get response(): EventResponse | undefined { return this._response; }

  /**
   * Identifies the application; it becomes the collector's index name.
   * Expected format is `<group>-<name>-<environment>` using lowercase
   * alphanumerics and `-`. Not validated.
   */
  setRoutingKey(routingKey: string): this {
    this._routingKey = routingKey;
    return this;
  }

  setEventType(eventType: EventType): this {
    this._eventType = eventType;
    return this;
  }

  /** One line of information; deeper detail belongs in `messageDetail`. */
  setMessage(message: string): this {
    this._message = message;
    return this;
  }

  setCorrelationId(correlationId: Uuid | undefined): this {
    this._correlationId = correlationId;
    return this;
  }

  /** Milliseconds since the epoch; fractions are truncated, NaN and Infinity clear it. */
  setTimestamp(timestamp: number | undefined): this {
    this._timestamp = toInteger(timestamp);
    return this;
  }

  setMessageDetail(messageDetail: MessageDetail | undefined): this {
    this._messageDetail = messageDetail;
    return this;
  }

  /** Hostname where the event originated. */
  setHost(host: string | undefined): this {
    this._host = host;
    return this;
  }

  setApplicationVersion(applicationVersion: string | undefined): this {
    this._applicationVersion = applicationVersion;
    return this;
  }

  setDataCenter(dataCenter: string | undefined): this {
    this._dataCenter = dataCenter;
    return this;
  }

  /** Host of an external client calling into this system. */
  setClientHostName(clientHostName: string | undefined): this {
    this._clientHostName = clientHostName;
    return this;
  }

  /** Host of an external system this system is calling. */
  setDestinationHostName(destinationHostName: string | undefined): this {
    this._destinationHostName = destinationHostName;
    return this;
  }

  setDestinationPath(destinationPath: string | undefined): this {
    this._destinationPath = destinationPath;
    return this;
  }

  /**
   * Unsigned millisecond values. Fractions are truncated; negative,
   * non-finite or unsafe-integer values leave the field unset.
   */
  setStartTimestamp(startTimestamp: number | undefined): this {
    this._startTimestamp = toUnsigned(startTimestamp);
    return this;
  }

  setFinishTimestamp(finishTimestamp: number | undefined): this {
    this._finishTimestamp = toUnsigned(finishTimestamp);
    return this;
  }

  setDuration(duration: number | undefined): this {
    this._duration = toUnsigned(duration);
    return this;
  }

  setDurationInMs(durationInMs: number | undefined): this {
    this._durationInMs = toUnsigned(durationInMs);
    return this;
  }

  /** HTTP status observed by a performance event. Values outside 0–65535 leave it unset. */
  setResponseCode(responseCode: number | undefined): this {
    this._responseCode = toUnsigned(responseCode, MAX_UINT16);
    return this;
  }

  setResponse(response: EventResponse | undefined): this {
    this._response = response;
    return this;
  }

  clone(): Event {
    const copy = Object.assign(new Event(), this);
    if (this._messageDetail) {
      copy._messageDetail = { ...this._messageDetail };
    }
    return copy;
  }

  /**
   * Builds the wire object. Key order follows the collector schema and is
   * kept stable so serialized output can be compared byte for byte.
   */
  toJSON(): EventJson {
    const json: EventJson = {
      routingKey: this._routingKey,
      type: this._eventType,
      message: this._message,
    };

    if (this._correlationId !== undefined) json.correlationId = this._correlationId.toString();
    if (isFiniteNumber(this._timestamp)) json.timestamp = this._timestamp;
    if (this._messageDetail !== undefined) json.messageDetail = { ...this._messageDetail };
    if (this._host !== undefined) json.host = this._host;
    if (this._applicationVersion !== undefined) json.applicationVersion = this._applicationVersion;
    if (this._dataCenter !== undefined) json.dataCenter = this._dataCenter;
    if (this._clientHostName !== undefined) json.clientHostName = this._clientHostName;
    if (this._destinationHostName !== undefined) json.destinationHostName = this._destinationHostName;
    if (this._destinationPath !== undefined) json.destinationPath = this._destinationPath;
    if (isFiniteNumber(this._startTimestamp)) json.startTimestamp = this._startTimestamp;
    if (isFiniteNumber(this._finishTimestamp)) json.finishTimestamp = this._finishTimestamp;
    if (isFiniteNumber(this._duration)) json.duration = this._duration;
    if (isFiniteNumber(this._durationInMs)) json.durationInMs = this._durationInMs;
    if (isFiniteNumber(this._responseCode)) json.responseCode = this._responseCode;
    if (this._response !== undefined) json.response = this._response;

    return json;
  }
}
