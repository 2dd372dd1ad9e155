import http from 'http';
import https from 'https';
import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import { version } from '../config';
import { logger } from '../utils/logger';
import {
  ConnectivityError,
  HttpStatusError,
  PrintBridgeError,
  TimeoutError,
  errorMessage,
} from '../utils/errors';

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  readonly method?: HttpMethod;
  readonly query?: Readonly<Record<string, string | number>>;
  /** Serialized as the JSON request body */
  readonly json?: unknown;
  readonly headers?: Readonly<Record<string, string>>;
  /** Maximum socket inactivity, including while the body streams */
  readonly timeoutMs?: number;
}

export interface BufferedResponse {
  readonly status: number;
  readonly headers: IncomingHttpHeaders;
  readonly body: Buffer;
}

export interface StreamedResponse {
  readonly status: number;
  readonly headers: IncomingHttpHeaders;
  /** Lazy, finite, single-pass sequence of body chunks */
  readonly body: AsyncIterable<Buffer>;
  /** Release the connection; safe to call more than once */
  close(): void;
}

export interface Transport {
  fetch(url: string, options?: RequestOptions): Promise<BufferedResponse>;
  stream(url: string, options?: RequestOptions): Promise<StreamedResponse>;
}

const MAX_REDIRECTS = 5;
const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);
const ERROR_BODY_PREVIEW = 200;

export const DEFAULT_TIMEOUT_MS = 15_000;

/** Append query parameters to a URL */
export function buildUrl(url: string, query?: RequestOptions['query']): URL {
  const target = new URL(url);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      target.searchParams.append(key, String(value));
    }
  }
  return target;
}

/**
 * Open a response stream, consume it and release the connection on every exit
 * path, including a consumer failure mid-stream.
 */
export async function withStream<T>(
  transport: Transport,
  url: string,
  options: RequestOptions,
  consume: (response: StreamedResponse) => Promise<T>
): Promise<T> {
  const response = await transport.stream(url, options);
  try {
    return await consume(response);
  } finally {
    response.close();
  }
}

function toTransportError(error: unknown, target: URL): PrintBridgeError {
  if (error instanceof PrintBridgeError) return error;
  return new ConnectivityError(`Cannot reach ${target.host}: ${errorMessage(error)}`, { cause: error });
}

async function* readBody(res: IncomingMessage, target: URL): AsyncGenerator<Buffer> {
  try {
    for await (const chunk of res) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    }
  } catch (error) {
    if (error instanceof PrintBridgeError) throw error;
    throw new ConnectivityError(`Response from ${target.host} was interrupted: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/** Outbound HTTP(S) over Node's built-in clients */
export class HttpTransport implements Transport {
  constructor(
    private readonly defaultTimeoutMs = DEFAULT_TIMEOUT_MS,
    private readonly userAgent = `memobird-print-bridge/${version}`
  ) {}

  async fetch(url: string, options: RequestOptions = {}): Promise<BufferedResponse> {
    return withStream(this, url, options, async (response) => {
      const chunks: Buffer[] = [];
      for await (const chunk of response.body) {
        chunks.push(chunk);
      }
      return { status: response.status, headers: response.headers, body: Buffer.concat(chunks) };
    });
  }

  stream(url: string, options: RequestOptions = {}): Promise<StreamedResponse> {
    return this.open(buildUrl(url, options.query), options, MAX_REDIRECTS);
  }

  private open(target: URL, options: RequestOptions, redirectsLeft: number): Promise<StreamedResponse> {
    const method = options.method ?? 'GET';
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const body = options.json === undefined ? undefined : Buffer.from(JSON.stringify(options.json), 'utf-8');
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...options.headers,
    };
    if (body) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = String(body.length);
    }

    const client = target.protocol === 'https:' ? https : http;
    logger.debug({ method, url: `${target.origin}${target.pathname}`, timeoutMs }, 'HTTP request');

    return new Promise<StreamedResponse>((resolve, reject) => {
      let response: IncomingMessage | undefined;
      let settled = false;

      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        outcome();
      };

      const req = client.request(target, { method, headers });

      req.setTimeout(timeoutMs, () => {
        const error = new TimeoutError(`${target.origin}${target.pathname}`, timeoutMs);
        response?.destroy(error);
        req.destroy(error);
      });

      req.on('error', (error) => {
        settle(() => reject(toTransportError(error, target)));
      });

      req.on('response', (res) => {
        response = res;
        const status = res.statusCode ?? 0;
        const location = res.headers.location;

        if (REDIRECT_CODES.has(status) && location && method === 'GET') {
          res.resume();
          if (redirectsLeft <= 0) {
            settle(() => reject(new ConnectivityError(`Too many redirects from ${target.host}`)));
            return;
          }
          settle(() => resolve(this.open(new URL(location, target), options, redirectsLeft - 1)));
          return;
        }

        if (status < 200 || status >= 300) {
          const preview: Buffer[] = [];
          let previewSize = 0;
          res.on('data', (chunk: Buffer) => {
            if (previewSize < ERROR_BODY_PREVIEW) {
              preview.push(chunk);
              previewSize += chunk.length;
            }
          });
          res.on('end', () => {
            const detail = Buffer.concat(preview).toString('utf-8').slice(0, ERROR_BODY_PREVIEW);
            settle(() => reject(new HttpStatusError(status, `${target.origin}${target.pathname}`, detail)));
          });
          res.on('error', (error) => {
            settle(() => reject(toTransportError(error, target)));
          });
          return;
        }

        settle(() =>
          resolve({
            status,
            headers: res.headers,
            body: readBody(res, target),
            close: () => {
              if (!res.destroyed) res.destroy();
            },
          })
        );
      });

      req.end(body);
    });
  }
}
