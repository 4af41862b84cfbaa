import { fetch as undiciFetch } from 'undici';
import { config } from '../config';
import { AppError } from '../lib/errors';
import type { RpcDispatcher } from './dispatcher';

/** Byte-in/byte-out request/response exchange. */
export interface Transport {
  send(payload: string): Promise<string>;
}

export interface HttpTransportOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchFn?: typeof undiciFetch;
}

export class HttpTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof undiciFetch;

  constructor(
    private readonly url: string,
    options: HttpTransportOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? config.http.requestTimeoutMs;
    this.headers = options.headers ?? {};
    this.fetchFn = options.fetchFn ?? undiciFetch;
  }

  public async send(payload: string): Promise<string> {
    let response: Awaited<ReturnType<typeof undiciFetch>>;
    try {
      response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...this.headers,
        },
        body: payload,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new AppError(`POST to ${this.url} failed: ${(error as Error).message}`, {
        status: 502,
        code: 'transport_error',
      });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '<unavailable>');
      throw new AppError(`POST to ${this.url} returned HTTP ${response.status}`, {
        status: 502,
        code: 'transport_error',
        details: { status: response.status, body },
      });
    }

    return response.text();
  }
}

/** Hands payloads straight to a dispatcher in the same process. */
export class InProcessTransport implements Transport {
  constructor(private readonly dispatcher: RpcDispatcher) {}

  public send(payload: string): Promise<string> {
    return this.dispatcher.invoke(payload);
  }
}
