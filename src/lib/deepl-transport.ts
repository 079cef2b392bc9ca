export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

/**
 * The part of a response the client reads. A fetch `Response` satisfies it.
 */
export interface TransportResponse {
  status: number;
  text(): Promise<string>;
}

/**
 * Sends one request and resolves with the response, whatever its status.
 * Rejects only when the round trip itself fails.
 */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

export interface FetchTransportOptions {
  /**
   * Abort requests that take longer than this, reading the body included.
   * No timeout when omitted.
   */
  timeoutMs?: number;
  /** fetch implementation; defaults to the global one, looked up per request. */
  fetch?: typeof fetch;
}

/**
 * Transport backed by fetch. This is the client's default.
 */
export function fetchTransport(options: FetchTransportOptions = {}): Transport {
  const { timeoutMs } = options;

  return async (request) => {
    const fetchImpl = options.fetch ?? globalThis.fetch;
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      body: request.body,
    };

    if (!timeoutMs || timeoutMs <= 0) {
      return fetchImpl(request.url, init);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let response: Response;
    try {
      response = await fetchImpl(request.url, { ...init, signal: controller.signal });
    } catch (error) {
      clearTimeout(timer);
      throw error;
    }

    // The timer stays armed until the body has been read.
    return {
      status: response.status,
      async text() {
        try {
          return await response.text();
        } finally {
          clearTimeout(timer);
        }
      },
    };
  };
}
