export interface HttpRequestOptions {
  headers?: Record<string, string>;
  body?: Uint8Array;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  /** One entry per header line; repeated names stay separate. */
  headers: Array<[string, string]>;
  body: Buffer;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}
