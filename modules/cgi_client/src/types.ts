import type { FormParams, PostData } from './formEncoding.js';
import type { ResponseHeaders } from './headers.js';

export type CgiMethod = 'GET' | 'POST';
export type ClientKind = 'local' | 'remote';

export interface ResponseResult {
  /** Absent when a local program printed no status line. */
  status?: number;
  headers: ResponseHeaders;
  content: Buffer;
  /** Local calls only. */
  stderr?: string;
}

/**
 * Operations shared by both backends. The result of the most recent call
 * is kept on the instance and replaced by the next call. Instances are
 * not safe for concurrent calls.
 */
export interface CgiCaller {
  readonly kind: ClientKind;
  readonly target: string;
  readonly status: number | undefined;
  readonly headers: ResponseHeaders;
  readonly content: Buffer;
  get(query?: FormParams): Promise<ResponseResult>;
  post(data: PostData, mime?: string): Promise<ResponseResult>;
}
