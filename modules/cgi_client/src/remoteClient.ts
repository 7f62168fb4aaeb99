import { BaseCgiClient } from './baseClient.js';
import { CgiError, configError, invocationError, isCgiError } from './cgiErrors.js';
import {
  DEFAULT_MIME_TYPE,
  encodeForm,
  encodePostData,
  type FormParams,
  type PostData
} from './formEncoding.js';
import { ResponseHeaders } from './headers.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from './httpClient.js';
import type { Logger } from './logger.js';
import type { CgiMethod, ResponseResult } from './types.js';

export interface RemoteClientDependencies {
  httpClient: HttpClient;
  logger: Logger;
}

/** Reaches a CGI program through HTTP at an `http` or `https` URL. */
export class RemoteCgiClient extends BaseCgiClient {
  readonly kind = 'remote' as const;
  private readonly url: URL;

  constructor(
    target: string,
    private readonly deps: RemoteClientDependencies
  ) {
    super(target, deps.logger);
    this.url = parseTargetUrl(target);
  }

  async get(query: FormParams = {}): Promise<ResponseResult> {
    return this.send('GET', appendQuery(this.url, encodeForm(query)), {});
  }

  async post(data: PostData, mime: string = DEFAULT_MIME_TYPE): Promise<ResponseResult> {
    const { body, contentType } = encodePostData(data, mime);
    return this.send('POST', this.url.toString(), {
      headers: {
        'Content-Type': contentType,
        'Content-Length': String(body.byteLength)
      },
      body
    });
  }

  private async send(method: CgiMethod, url: string, options: HttpRequestOptions): Promise<ResponseResult> {
    this.reset();
    const startedAt = Date.now();
    // Logged without the query, which can carry form data.
    const endpoint = `${this.url.origin}${this.url.pathname}`;

    let response: HttpResponse;
    try {
      response =
        method === 'GET'
          ? await this.deps.httpClient.get(url, options)
          : await this.deps.httpClient.post(url, options);
    } catch (error) {
      this.recordFailure(method, startedAt, 'INVOCATION', {
        url: endpoint,
        error: error instanceof Error ? error.message : String(error)
      });
      if (isCgiError(error)) {
        throw error;
      }
      throw invocationError(`${method} ${url} failed`, error);
    }

    const result = this.store({
      status: response.status,
      headers: ResponseHeaders.from(response.headers),
      content: response.body
    });

    if (response.status >= 400) {
      this.recordFailure(method, startedAt, 'EXIT_STATUS', { url: endpoint, status: response.status });
      throw new CgiError(`${method} ${url} responded with status ${response.status}`, 'EXIT_STATUS', {
        status: response.status
      });
    }

    this.recordSuccess(method, startedAt, response.status);
    return result;
  }
}

function parseTargetUrl(target: string): URL {
  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    throw configError(`Invalid remote CGI target: ${target}`, error);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw configError(`Invalid scheme for remote CGI target: ${target}`);
  }
  return url;
}

export function appendQuery(base: URL, queryString: string): string {
  if (queryString.length === 0) {
    return base.toString();
  }
  const url = new URL(base.toString());
  const existing = url.search.replace(/^\?/, '');
  url.search = existing.length > 0 ? `${existing}&${queryString}` : queryString;
  return url.toString();
}
