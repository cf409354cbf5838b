import { Agent, fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { HttpError } from '../types.js';
import type { AppConfig } from '../types.js';
import { describeEndpoint } from '../config.js';
import { parseRetryAfter } from './middleware/retry.js';

export interface HttpResponse {
  readonly status: number;
  readonly body: unknown;
}

export interface HttpClient {
  readonly post: (url: string, body: unknown, timeoutMs: number) => Promise<HttpResponse>;
  readonly close: () => Promise<void>;
}

/**
 * JSON-over-HTTP POST client. Every failure (non-2xx, timeout, network error,
 * unparseable body) surfaces as an HttpError; status 0 marks the ones that
 * never produced a usable HTTP response.
 */
export function createHttpClient(
  config: Pick<AppConfig, 'sampleConcurrency'>,
  dispatcher: Dispatcher = new Agent({
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 60_000,
    connections: config.sampleConcurrency * 5 + 4,
  }),
): HttpClient {
  async function post(url: string, body: unknown, timeoutMs: number): Promise<HttpResponse> {
    const endpoint = describeEndpoint(url);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Accept': 'application/json',
          'Accept-Encoding': 'gzip, deflate',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
        dispatcher,
      });

      const text = await response.text();
      let responseBody: unknown;
      try {
        responseBody = JSON.parse(text);
      } catch {
        responseBody = text;
      }

      if (!response.ok) {
        throw new HttpError(
          `HTTP ${response.status} POST ${endpoint}`,
          response.status,
          'POST',
          url,
          responseBody,
          response.status === 429 ? parseRetryAfter(response.headers) : null,
        );
      }

      if (typeof responseBody === 'string') {
        throw new HttpError(`Malformed JSON response from POST ${endpoint}`, 0, 'POST', url, responseBody);
      }

      return {
        status: response.status,
        body: responseBody,
      };
    } catch (err) {
      if (err instanceof HttpError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new HttpError(`Request timeout after ${timeoutMs}ms`, 0, 'POST', url);
      }
      throw new HttpError(
        `Network error: ${err instanceof Error ? err.message : String(err)}`,
        0,
        'POST',
        url,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async function close(): Promise<void> {
    await dispatcher.close();
  }

  return { post, close };
}
