import { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export interface FakeReply {
  status: number;
  headers?: Record<string, string>;
  body?: string | string[];
  /** Rejects the request itself, as a timeout or reset connection would. */
  error?: Error;
  /** Fails the body stream after the chunks above were delivered. */
  bodyError?: Error;
}

export interface RecordedRequest {
  method: string;
  url: string;
  range?: string;
}

async function* chunksThenFail(chunks: Buffer[], error: Error): AsyncGenerator<Buffer> {
  yield* chunks;
  // let the consumer take the chunks before the stream is destroyed
  await delay(5);
  throw error;
}

export type FakeRoute = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

/**
 * axios instance served by an in-process adapter. Bodies are delivered as
 * streams, one chunk per array element.
 */
export function createFakeHttp(route: FakeRoute): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const range = config.headers.get('Range');
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toLowerCase(),
      url: config.url ?? '',
      range: typeof range === 'string' ? range : undefined,
    };
    requests.push(request);

    const reply = await route(request);
    if (reply.error) {
      throw reply.error;
    }
    const chunks =
      reply.body === undefined
        ? []
        : (Array.isArray(reply.body) ? reply.body : [reply.body]).map((chunk) =>
            Buffer.from(chunk)
          );
    return {
      data: reply.bodyError
        ? Readable.from(chunksThenFail(chunks, reply.bodyError))
        : Readable.from(chunks),
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
      request: {},
    };
  };

  return {
    http: axios.create({ adapter, validateStatus: () => true }),
    requests,
  };
}

/** Route table keyed by URL; unknown URLs answer 404. */
export function routes(table: Record<string, FakeReply>): FakeRoute {
  return (request) => table[request.url] ?? { status: 404 };
}
