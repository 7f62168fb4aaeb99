import type { CgiErrorClassification } from './cgiErrors.js';
import type { FormParams, PostData } from './formEncoding.js';
import { ResponseHeaders } from './headers.js';
import type { Logger } from './logger.js';
import { recordCall } from './metrics.js';
import type { CgiCaller, CgiMethod, ClientKind, ResponseResult } from './types.js';

export function emptyResult(): ResponseResult {
  return { headers: new ResponseHeaders(), content: Buffer.alloc(0) };
}

export abstract class BaseCgiClient implements CgiCaller {
  abstract readonly kind: ClientKind;
  private current: ResponseResult = emptyResult();

  protected constructor(
    public readonly target: string,
    protected readonly logger: Logger
  ) {}

  get status(): number | undefined {
    return this.current.status;
  }

  get headers(): ResponseHeaders {
    return this.current.headers;
  }

  get content(): Buffer {
    return this.current.content;
  }

  get result(): ResponseResult {
    return this.current;
  }

  abstract get(query?: FormParams): Promise<ResponseResult>;
  abstract post(data: PostData, mime?: string): Promise<ResponseResult>;

  protected reset(): void {
    this.current = emptyResult();
  }

  protected store(result: ResponseResult): ResponseResult {
    this.current = result;
    return result;
  }

  protected recordSuccess(method: CgiMethod, startedAt: number, status: number | undefined): void {
    const durationMs = Date.now() - startedAt;
    recordCall({ backend: this.kind, method, outcome: 'success', durationMs });
    this.logger.info({
      level: 'info',
      message: 'CGI call completed',
      target: this.target,
      metadata: { backend: this.kind, method, status, durationMs }
    });
  }

  protected recordFailure(
    method: CgiMethod,
    startedAt: number,
    classification: CgiErrorClassification,
    metadata: Record<string, unknown> = {}
  ): void {
    const durationMs = Date.now() - startedAt;
    recordCall({ backend: this.kind, method, outcome: 'error', durationMs, classification });
    const record = {
      message: 'CGI call failed',
      target: this.target,
      metadata: { backend: this.kind, method, classification, durationMs, ...metadata }
    };
    if (classification === 'INVOCATION') {
      this.logger.error({ level: 'error', ...record });
      return;
    }
    this.logger.warn({ level: 'warn', ...record });
  }
}
