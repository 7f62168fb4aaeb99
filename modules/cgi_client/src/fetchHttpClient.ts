import type { HttpClient, HttpRequestOptions, HttpResponse } from './httpClient.js';

export interface FetchHttpClientOptions {
  /** Applied to every request that sets no timeout of its own. */
  timeoutMs?: number;
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly options: FetchHttpClientOptions = {}) {}

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    return this.send('GET', url, options);
  }

  async post(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    return this.send('POST', url, options);
  }

  private async send(method: 'GET' | 'POST', url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    if (timeoutMs && timeoutMs > 0) {
      timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);
    }

    try {
      const response = await fetch(url, {
        method,
        headers: { ...(options.headers ?? {}) },
        body: options.body,
        signal: controller.signal
      });
      const body = Buffer.from(await response.arrayBuffer());

      return {
        status: response.status,
        headers: collectHeaders(response.headers),
        body
      };
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }
}

function collectHeaders(headers: Headers): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      pairs.push([name, value]);
    }
  });
  for (const cookie of headers.getSetCookie()) {
    pairs.push(['set-cookie', cookie]);
  }
  return pairs;
}
