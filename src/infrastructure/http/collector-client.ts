import type { Logger } from 'pino';
import { DispatchError, classifyStatus, toDispatchError } from '../../domain/index.js';
import { userAgent } from './user-agent.js';

/** Anything that performs a fetch-style exchange. Node's global `fetch` fits. */
export type FetchLike = (request: Request) => Promise<Response>;

/** State captured from a payload at submit time. */
export interface Exchange {
  readonly url: string;
  readonly body: string;
  readonly logger: Logger | undefined;
}

function buildRequest(url: string, body: string): Request {
  try {
    return new Request(url, {
      method: 'POST',
      headers: {
        'User-Agent': userAgent(),
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(body, 'utf-8')),
      },
      body,
      redirect: 'manual',
    });
  } catch (err: unknown) {
    throw toDispatchError('request', err);
  }
}

/**
 * POSTs one serialized batch to the collector and logs the outcome.
 *
 * Resolves on 2xx. Any other status is logged together with the response
 * body and rejects with a `run` DispatchError; failures before a response
 * arrives reject with `request`, `transport` or `io`.
 */
export async function sendPayload(fetchImpl: FetchLike, exchange: Exchange): Promise<void> {
  const { url, body, logger } = exchange;
  const request = buildRequest(url, body);

  let response: Response;
  try {
    response = await fetchImpl(request);
  } catch (err: unknown) {
    throw toDispatchError('transport', err);
  }

  if (response.ok) {
    logger?.trace({ status: response.status }, 'Successfully sent payload to echo');
    return;
  }

  const { status } = response;
  const statusClass = classifyStatus(status);
  logger?.error({ status, statusClass }, `${statusClass} error sending Echo payload: ${status}`);

  let text: string;
  try {
    // text() decodes UTF-8, replacing invalid sequences
    text = await response.text();
  } catch (err: unknown) {
    throw toDispatchError('io', err);
  }
  logger?.error({ status }, text);

  throw new DispatchError('run', `${statusClass} ${status}`, { status });
}
