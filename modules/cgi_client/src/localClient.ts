import { BaseCgiClient, emptyResult } from './baseClient.js';
import { CgiError, configError, invocationError, isCgiError } from './cgiErrors.js';
import { splitCommandLine } from './commandLine.js';
import { decodeResponse, type DecodedResponse } from './decoder.js';
import {
  DEFAULT_MIME_TYPE,
  encodeForm,
  encodePostData,
  type FormParams,
  type PostData
} from './formEncoding.js';
import type { Logger } from './logger.js';
import type { ProcessResult, ProcessRunner } from './processRunner.js';
import type { CgiMethod, ResponseResult } from './types.js';

export interface LocalClientDependencies {
  runner: ProcessRunner;
  logger: Logger;
}

export interface LocalClientOptions {
  /**
   * Variables added to every CGI environment, such as `PATH`. The CGI
   * variables take precedence.
   */
  environment?: Record<string, string>;
}

/** One CGI request as seen by the program. */
export interface CgiRequest {
  method: CgiMethod;
  /** Already form-encoded. Always set for GET, optional for POST. */
  queryString?: string;
  body?: Uint8Array;
  contentType?: string;
}

/**
 * Runs a CGI program as a child process. The target is a command line,
 * split with shell quoting rules and executed without a shell. The child
 * sees only the CGI variables and the configured extra environment.
 */
export class LocalCgiClient extends BaseCgiClient {
  readonly kind = 'local' as const;
  private readonly command: string;
  private readonly args: string[];
  private lastEnvironment: Record<string, string> = {};
  private lastExitCode: number | null | undefined;

  constructor(
    target: string,
    private readonly deps: LocalClientDependencies,
    private readonly options: LocalClientOptions = {}
  ) {
    super(target, deps.logger);
    const [command, ...args] = splitCommandLine(target);
    if (command === undefined) {
      throw configError('Local CGI target is an empty command line');
    }
    this.command = command;
    this.args = args;
  }

  get stderr(): string {
    return this.result.stderr ?? '';
  }

  /** Environment passed to the most recent call. */
  get environment(): Record<string, string> {
    return { ...this.lastEnvironment };
  }

  get exitCode(): number | null | undefined {
    return this.lastExitCode;
  }

  async get(query: FormParams = {}): Promise<ResponseResult> {
    return this.invoke({ method: 'GET', queryString: encodeForm(query) });
  }

  async post(data: PostData, mime: string = DEFAULT_MIME_TYPE): Promise<ResponseResult> {
    const { body, contentType } = encodePostData(data, mime);
    return this.invoke({ method: 'POST', body, contentType });
  }

  async invoke(request: CgiRequest): Promise<ResponseResult> {
    this.reset();
    this.lastExitCode = undefined;
    const environment = buildEnvironment(request, this.options.environment);
    this.lastEnvironment = environment;
    const startedAt = Date.now();

    this.logger.debug({
      level: 'debug',
      message: 'Launching CGI program',
      target: this.target,
      metadata: { command: this.command, args: this.args, method: request.method }
    });

    let result: ProcessResult;
    try {
      result = await this.deps.runner.run(this.command, this.args, {
        env: environment,
        input: request.body
      });
    } catch (error) {
      this.recordFailure(request.method, startedAt, 'INVOCATION', {
        error: error instanceof Error ? error.message : String(error)
      });
      if (isCgiError(error)) {
        throw error;
      }
      throw invocationError(`Failed to run ${this.command}`, error);
    }

    this.lastExitCode = result.exitCode;
    const stderr = result.stderr.toString('utf-8');
    const { decoded, failure } = tryDecode(result.stdout);
    this.store({ ...(decoded ?? emptyResult()), stderr });

    if (result.exitCode !== 0) {
      this.recordFailure(request.method, startedAt, 'EXIT_STATUS', {
        exitCode: result.exitCode,
        signal: result.signal,
        decoded: decoded !== undefined
      });
      throw new CgiError(`${this.command} ${describeExit(result)}`, 'EXIT_STATUS', {
        exitCode: result.exitCode,
        signal: result.signal,
        stderr,
        cause: failure
      });
    }

    if (failure) {
      this.recordFailure(request.method, startedAt, 'DECODE', { error: failure.message });
      throw failure;
    }

    this.recordSuccess(request.method, startedAt, this.status);
    return this.result;
  }
}

export function buildEnvironment(
  request: CgiRequest,
  extra: Record<string, string> = {}
): Record<string, string> {
  const environment: Record<string, string> = { ...extra, REQUEST_METHOD: request.method };
  if (request.method === 'GET') {
    environment.QUERY_STRING = request.queryString ?? '';
    return environment;
  }

  if (request.queryString !== undefined) {
    environment.QUERY_STRING = request.queryString;
  }
  environment.CONTENT_LENGTH = String(request.body?.byteLength ?? 0);
  environment.CONTENT_TYPE = request.contentType ?? DEFAULT_MIME_TYPE;
  return environment;
}

function tryDecode(stdout: Buffer): { decoded?: DecodedResponse; failure?: CgiError } {
  try {
    return { decoded: decodeResponse(stdout) };
  } catch (error) {
    if (isCgiError(error)) {
      return { failure: error };
    }
    throw error;
  }
}

function describeExit(result: ProcessResult): string {
  if (result.exitCode === null) {
    return `was terminated by ${result.signal ?? 'a signal'}`;
  }
  return `exited with status ${result.exitCode}`;
}
