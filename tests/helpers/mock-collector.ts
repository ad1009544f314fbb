import type { IncomingHttpHeaders } from 'node:http';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { FetchLike } from '../../src/infrastructure/index.js';

export interface ReceivedBatch {
  readonly host: string;
  readonly headers: IncomingHttpHeaders;
  readonly body: unknown;
}

export interface MockCollector {
  readonly app: FastifyInstance;
  readonly received: ReceivedBatch[];
  /** fetch that routes every request into `app` via inject, never the network. */
  readonly fetch: FetchLike;
  respondWith(status: number, body?: string): void;
}

/**
 * In-process Echo collector built on Fastify.
 *
 * Records each POST to /echo/messages and answers with the configured
 * status (200 by default).
 */
export function createMockCollector(): MockCollector {
  const app = Fastify({ logger: false });
  const received: ReceivedBatch[] = [];
  let status = 200;
  let responseBody = '';

  app.post('/echo/messages', async (request, reply) => {
    received.push({
      host: request.headers.host ?? '',
      headers: request.headers,
      body: request.body,
    });
    return reply.status(status).type('text/plain').send(responseBody);
  });

  const fetch: FetchLike = async (request) => {
    const url = new URL(request.url);
    const headers: Record<string, string> = {};
    request.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const res = await app.inject({
      method: 'POST',
      url: url.pathname,
      headers: { ...headers, host: url.host },
      payload: await request.text(),
    });

    return new Response(res.body === '' ? null : res.body, { status: res.statusCode });
  };

  return {
    app,
    received,
    fetch,
    respondWith(nextStatus: number, nextBody = '') {
      status = nextStatus;
      responseBody = nextBody;
    },
  };
}
